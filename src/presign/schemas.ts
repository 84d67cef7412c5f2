/**
 * Wire schemas for backend responses
 * @module media-uploader/presign/schemas
 */

import { z } from 'zod';

/**
 * Backend header maps may carry numbers or booleans; storage wants strings
 */
const HeaderMapSchema = z
  .record(z.union([z.string(), z.number(), z.boolean()]).transform(String))
  .nullish()
  .transform((headers) => headers ?? {});

const MethodSchema = z
  .string()
  .nullish()
  .transform((method) => (method ? method.toUpperCase() : 'PUT'))
  .pipe(z.enum(['PUT', 'POST']));

const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const SimplePresignResponseSchema = z.object({
  url: z.string().url(),
  key: z.string().min(1),
  method: MethodSchema,
  headers: HeaderMapSchema,
  public_url: OptionalTextSchema,
});

export const MultipartStartResponseSchema = z.object({
  key: z.string().min(1),
  upload_id: z.string().min(1),
  part_size: z.number().int().positive().safe(),
});

export const PartUrlResponseSchema = z.object({
  url: z.string().url(),
  method: MethodSchema,
  headers: HeaderMapSchema,
});

export const CompleteResponseSchema = z.object({
  public_url: OptionalTextSchema,
  location: OptionalTextSchema,
  version_id: OptionalTextSchema,
});

/**
 * Error body shape used by the backend for non-2xx answers
 */
export const ErrorBodySchema = z.object({
  detail: z.unknown(),
});

export type SimplePresignResponse = z.infer<typeof SimplePresignResponseSchema>;
export type MultipartStartResponse = z.infer<typeof MultipartStartResponseSchema>;
export type PartUrlResponse = z.infer<typeof PartUrlResponseSchema>;
export type CompleteResponse = z.infer<typeof CompleteResponseSchema>;
