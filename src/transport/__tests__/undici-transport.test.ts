/**
 * Tests for the undici transport against a loopback HTTP server
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { CancelledError, NetworkError } from '../../errors/index.js';
import { bodyText, getETag } from '../types.js';
import { UndiciTransport, meterBody } from '../undici-transport.js';

const timers = new Set<NodeJS.Timeout>();

function handle(req: IncomingMessage, res: ServerResponse): void {
  const chunks: Buffer[] = [];
  req.on('data', (chunk: Buffer) => chunks.push(chunk));
  req.on('end', () => {
    const body = Buffer.concat(chunks);

    if (req.url === '/echo') {
      res.setHeader('ETag', '"abc123"');
      res.setHeader('X-Multi', ['a', 'b']);
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ method: req.method, headers: req.headers, length: body.length }));
      return;
    }

    if (req.url === '/fail') {
      res.statusCode = 500;
      res.end('boom');
      return;
    }

    if (req.url === '/slow') {
      const timer = setTimeout(() => res.end('late'), 5000);
      timers.add(timer);
      return;
    }

    res.statusCode = 404;
    res.end();
  });
}

async function listen(server: Server): Promise<string> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return `http://127.0.0.1:${address.port}`;
}

async function shutdown(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve()))
  );
}

describe('UndiciTransport', () => {
  let server: Server;
  let baseUrl: string;
  const transport = new UndiciTransport({ connectTimeout: 2000, requestTimeout: 10000 });

  beforeAll(async () => {
    server = createServer(handle);
    baseUrl = await listen(server);
  });

  afterAll(async () => {
    for (const timer of timers) clearTimeout(timer);
    await transport.close();
    await shutdown(server);
  });

  it('should send the request and buffer the response', async () => {
    const response = await transport.send({
      method: 'PUT',
      url: `${baseUrl}/echo`,
      headers: { 'Content-Type': 'audio/mpeg', 'Content-Length': '5' },
      body: new Uint8Array([1, 2, 3, 4, 5]),
    });

    expect(response.status).toBe(200);
    expect(getETag(response.headers)).toBe('abc123');
    expect(response.headers['x-multi']).toBe('a, b');

    const echoed: unknown = JSON.parse(bodyText(response));
    expect(echoed).toMatchObject({
      method: 'PUT',
      length: 5,
      headers: { 'content-type': 'audio/mpeg', 'content-length': '5' },
    });
  });

  it('should meter the body when progress is requested', async () => {
    const metered = new UndiciTransport({
      connectTimeout: 2000,
      requestTimeout: 10000,
      uploadSliceSize: 4,
    });
    const progress: Array<[number, number]> = [];

    try {
      const response = await metered.send(
        {
          method: 'PUT',
          url: `${baseUrl}/echo`,
          headers: { 'content-length': '10' },
          body: new Uint8Array(10).fill(7),
        },
        { onUploadProgress: (sent, total) => progress.push([sent, total]) }
      );

      expect(JSON.parse(bodyText(response))).toMatchObject({ length: 10 });
      expect(progress).toEqual([
        [4, 10],
        [8, 10],
        [10, 10],
      ]);
    } finally {
      await metered.close();
    }
  });

  it('should resolve non-2xx statuses', async () => {
    const response = await transport.send({ method: 'GET', url: `${baseUrl}/fail`, headers: {} });

    expect(response.status).toBe(500);
    expect(bodyText(response)).toBe('boom');
  });

  it('should map refused connections to NetworkError', async () => {
    const closed = createServer();
    const url = await listen(closed);
    await shutdown(closed);

    const error = await transport
      .send({ method: 'GET', url: `${url}/echo`, headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    if (!(error instanceof NetworkError)) return;
    expect(error.code).toBe('CONNECTION_FAILED');
  });

  it('should time out waiting for headers', async () => {
    const impatient = new UndiciTransport({ connectTimeout: 2000, requestTimeout: 200 });

    try {
      const error = await impatient
        .send({ method: 'GET', url: `${baseUrl}/slow`, headers: {} })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      if (!(error instanceof NetworkError)) return;
      expect(error.code).toBe('TIMEOUT');
      expect(error.message).toBe('Request timed out after 200ms');
    } finally {
      await impatient.close();
    }
  });

  it('should report aborts as cancellation', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const error = await transport
      .send(
        { method: 'GET', url: `${baseUrl}/slow`, headers: {} },
        { signal: controller.signal }
      )
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancelledError);
  });
});

describe('meterBody', () => {
  it('should slice the buffer and report running totals', () => {
    const calls: number[] = [];
    const slices = [...meterBody(new Uint8Array(10), 4, (sent) => calls.push(sent))];

    expect(slices.map((slice) => slice.length)).toEqual([4, 4, 2]);
    expect(calls).toEqual([4, 8, 10]);
  });

  it('should yield nothing for an empty buffer', () => {
    const calls: number[] = [];

    expect([...meterBody(new Uint8Array(0), 4, (sent) => calls.push(sent))]).toEqual([]);
    expect(calls).toEqual([]);
  });
});
