import { Readable } from 'stream';
import { describe, expect, it, vi } from 'vitest';
import { PayloadTooLargeError } from '../src/errors.js';
import { handleNodeRequest, readBody, toRequest } from '../src/http-adapter.js';
import type { NodeRequest, NodeResponse } from '../src/http-adapter.js';

function nodeRequest(chunks: string[], headers: NodeRequest['headers'] = {}): NodeRequest {
  return Object.assign(Readable.from(chunks.map(chunk => Buffer.from(chunk))), {
    method: 'POST',
    url: '/api/classify',
    headers: { host: 'localhost:3001', ...headers },
  });
}

class FakeResponse implements NodeResponse {
  statusCode = 200;
  headersSent = false;
  headers: Record<string, string> = {};
  body = '';

  setHeader(name: string, value: string): void {
    this.headers[name] = value;
  }

  end(chunk: Buffer | string): void {
    this.body = chunk.toString();
    this.headersSent = true;
  }
}

describe('readBody', () => {
  it('joins the chunks of a body', async () => {
    await expect(readBody(Readable.from([Buffer.from('{"a":'), Buffer.from('1}')]))).resolves.toBe('{"a":1}');
  });

  it('stops reading once the limit is passed', async () => {
    const body = Readable.from([Buffer.from('abcd'), Buffer.from('efgh')]);
    await expect(readBody(body, 6)).rejects.toBeInstanceOf(PayloadTooLargeError);
  });

  it('accepts a body of exactly the limit', async () => {
    await expect(readBody(Readable.from([Buffer.from('abcdef')]), 6)).resolves.toBe('abcdef');
  });
});

describe('toRequest', () => {
  it('builds a fetch request from a node request', async () => {
    const request = await toRequest(nodeRequest(['{"title":"Gin"}'], { 'content-type': 'application/json' }), {
      port: 3001,
    });

    expect(request.method).toBe('POST');
    expect(request.url).toBe('http://localhost:3001/api/classify');
    expect(request.headers.get('content-type')).toBe('application/json');
    await expect(request.json()).resolves.toEqual({ title: 'Gin' });
  });

  it('rejects a declared length over the limit before reading', async () => {
    const req = nodeRequest(['{}'], { 'content-length': '5000' });
    await expect(toRequest(req, { port: 3001, maxBodyBytes: 1024 })).rejects.toThrow(
      'Request body exceeds 1024 bytes',
    );
  });
});

describe('handleNodeRequest', () => {
  it('writes the handler response', async () => {
    const res = new FakeResponse();
    const handler = vi.fn(async () => Response.json({ ok: true }, { status: 201 }));

    await handleNodeRequest(nodeRequest(['{}']), res, handler, { port: 3001 });

    expect(res.statusCode).toBe(201);
    expect(res.headers['content-type']).toBe('application/json');
    expect(JSON.parse(res.body)).toEqual({ ok: true });
  });

  it('answers an oversized body with 413 without calling the handler', async () => {
    const res = new FakeResponse();
    const handler = vi.fn(async () => Response.json({ ok: true }));

    await handleNodeRequest(nodeRequest(['x'.repeat(600), 'y'.repeat(600)]), res, handler, {
      port: 3001,
      maxBodyBytes: 1024,
    });

    expect(handler).not.toHaveBeenCalled();
    expect(res.statusCode).toBe(413);
    expect(JSON.parse(res.body)).toEqual({
      error: 'Payload too large',
      message: 'Request body exceeds 1024 bytes',
    });
  });

  it('answers a failing handler with 500', async () => {
    const res = new FakeResponse();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await handleNodeRequest(nodeRequest(['{}']), res, async () => Promise.reject(new Error('boom')), {
      port: 3001,
    });

    expect(res.statusCode).toBe(500);
    expect(res.body).toBe('');
    errors.mockRestore();
  });
});
