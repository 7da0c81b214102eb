import type { IncomingHttpHeaders } from 'node:http';
import type { RequestHandler } from './app.js';
import { PayloadTooLargeError } from './errors.js';

export const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024;

/** The parts of a node IncomingMessage the adapter reads */
export interface NodeRequest extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/** The parts of a node ServerResponse the adapter writes */
export interface NodeResponse {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string): unknown;
  end(chunk: Buffer | string): unknown;
}

export interface AdapterOptions {
  port: number;
  maxBodyBytes?: number;
}

/**
 * Buffers a request body, giving up as soon as it passes `limit` bytes.
 */
export async function readBody(
  req: AsyncIterable<Buffer | string>,
  limit = DEFAULT_MAX_BODY_BYTES,
): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > limit) throw new PayloadTooLargeError(limit);
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function toRequest(req: NodeRequest, options: AdapterOptions): Promise<Request> {
  const limit = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limit) {
    throw new PayloadTooLargeError(limit);
  }

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach(v => headers.append(name, v));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? 'GET';
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? `localhost:${options.port}`}`);
  const body = method === 'GET' || method === 'HEAD' ? undefined : await readBody(req, limit);
  return new Request(url, { method, headers, body });
}

export async function writeResponse(res: NodeResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => res.setHeader(name, value));
  res.end(Buffer.from(await response.arrayBuffer()));
}

function writeFailure(res: NodeResponse, error: unknown): void {
  if (res.headersSent) {
    res.end('');
    return;
  }
  if (error instanceof PayloadTooLargeError) {
    res.statusCode = 413;
    res.setHeader('content-type', 'application/json');
    res.end(JSON.stringify({ error: 'Payload too large', message: error.message }));
    return;
  }
  res.statusCode = 500;
  res.end('');
}

/**
 * Runs one node request through a fetch-style handler.
 */
export async function handleNodeRequest(
  req: NodeRequest,
  res: NodeResponse,
  handler: RequestHandler,
  options: AdapterOptions,
): Promise<void> {
  try {
    const request = await toRequest(req, options);
    await writeResponse(res, await handler(request));
  } catch (error) {
    if (!(error instanceof PayloadTooLargeError)) {
      console.error('Error handling request:', error);
    }
    writeFailure(res, error);
  }
}
