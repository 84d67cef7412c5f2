/**
 * Part bookkeeping for multipart completion
 * @module media-uploader/multipart/parts
 */

import { ProtocolInvariantError } from '../errors/index.js';
import type { PartResult } from '../types/index.js';

/**
 * Part entry in the multipart complete request body
 */
export interface CompletedPartPayload {
  readonly ETag: string;
  readonly PartNumber: number;
}

/**
 * Checks that parts are numbered 1..N without gaps, each with an ETag
 *
 * @param expectedCount - When given, N must equal it
 * @throws {ProtocolInvariantError} If the sequence is empty, out of order,
 * non-contiguous, missing an ETag, or of the wrong length
 */
export function validatePartsSequence(
  parts: readonly PartResult[],
  expectedCount?: number
): void {
  if (parts.length === 0) {
    throw new ProtocolInvariantError({
      message: 'Cannot complete a multipart upload without parts',
      code: 'NO_PARTS',
    });
  }

  parts.forEach((part, index) => {
    if (part.partNumber !== index + 1) {
      throw new ProtocolInvariantError({
        message: `Part numbers must be contiguous from 1: expected ${index + 1}, found ${part.partNumber}`,
        code: 'NON_CONTIGUOUS_PARTS',
        details: { expected: index + 1, found: part.partNumber },
      });
    }
    if (!part.eTag) {
      throw new ProtocolInvariantError({
        message: `Part ${part.partNumber} has no ETag`,
        code: 'MISSING_ETAG',
        details: { partNumber: part.partNumber },
      });
    }
  });

  if (expectedCount !== undefined && parts.length !== expectedCount) {
    throw new ProtocolInvariantError({
      message: `Expected ${expectedCount} parts, recorded ${parts.length}`,
      code: 'PART_COUNT_MISMATCH',
      details: { expected: expectedCount, found: parts.length },
    });
  }
}

/**
 * Builds the `parts` array of the complete request, ascending by part number
 */
export function toCompletionPayload(parts: readonly PartResult[]): CompletedPartPayload[] {
  return [...parts]
    .sort((a, b) => a.partNumber - b.partNumber)
    .map((part) => ({ ETag: part.eTag, PartNumber: part.partNumber }));
}
