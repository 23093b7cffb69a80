import type { Context } from 'hono';

export function rejectOversizedBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

type BodyReadResult =
  | { ok: true; raw: string }
  | { ok: false; response: Response };

async function readUtf8BodyWithLimit(c: Context, maxBytes: number): Promise<BodyReadResult> {
  const req = c.req.raw;
  if (req.bodyUsed) {
    return { ok: false, response: c.json({ error: 'Request body is not readable' }, 400) };
  }

  const stream = req.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;

      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel().catch(() => undefined);
        return {
          ok: false,
          response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413),
        };
      }
      chunks.push(value);
    }
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  return { ok: true, raw: Buffer.concat(chunks).toString('utf8') };
}

/**
 * Parses a JSON body with a byte-size guard that holds even when
 * Content-Length is absent or wrong. An empty body parses as `{}`; a
 * malformed one is rejected with 400.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const upfront = rejectOversizedBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const read = await readUtf8BodyWithLimit(c, maxBytes);
  if (!read.ok) return read;

  if (!read.raw.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }
}

export interface UploadedFile {
  name: string;
  type: string;
  bytes: Uint8Array;
}

export type UploadParseResult =
  | { ok: true; file: UploadedFile; fields: Record<string, string> }
  | { ok: false; response: Response };

type LimitedFormResult =
  | { ok: true; form: FormData }
  | { ok: false; response: Response };

/**
 * Parses multipart form data while counting bytes as they arrive, so a
 * chunked body without Content-Length cannot be buffered past `maxBytes`.
 */
async function readFormDataWithLimit(c: Context, maxBytes: number): Promise<LimitedFormResult> {
  const req = c.req.raw;
  if (req.bodyUsed || !req.body) {
    return { ok: false, response: c.json({ error: 'Failed to read form data' }, 400) };
  }

  let totalBytes = 0;
  let exceeded = false;
  const limited = req.body.pipeThrough(new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      totalBytes += chunk.byteLength;
      if (totalBytes > maxBytes) {
        exceeded = true;
        controller.error(new Error(`Request body exceeded ${maxBytes} bytes`));
        return;
      }
      controller.enqueue(chunk);
    },
  }));

  const init: RequestInit & { duplex: 'half' } = {
    method: req.method,
    headers: req.headers,
    body: limited,
    duplex: 'half',
  };

  try {
    return { ok: true, form: await new Request(req.url, init).formData() };
  } catch {
    if (exceeded) {
      return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
    }
    return { ok: false, response: c.json({ error: 'Failed to read form data' }, 400) };
  }
}

/**
 * Reads one file field and the text fields of a multipart form. Oversized
 * uploads are rejected with 413 while the body streams in and again on the
 * file itself.
 */
export async function parseMultipartUpload(c: Context, fileField: string, maxBytes: number): Promise<UploadParseResult> {
  // Form overhead on top of the file itself.
  const bodyLimit = maxBytes + 64 * 1024;
  const upfront = rejectOversizedBody(c, bodyLimit);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (!contentType.includes('multipart/form-data')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use multipart/form-data.' }, 415),
    };
  }

  const read = await readFormDataWithLimit(c, bodyLimit);
  if (!read.ok) return read;

  const fields: Record<string, string> = {};
  let upload: File | null = null;
  for (const [key, value] of read.form.entries()) {
    if (typeof value === 'string') {
      fields[key] = value;
    } else if (key === fileField && upload === null) {
      upload = value;
    }
  }

  if (!upload) {
    return { ok: false, response: c.json({ error: `Missing file field "${fileField}"` }, 400) };
  }
  if (upload.size > maxBytes) {
    return { ok: false, response: c.json({ error: `File too large (max ${maxBytes} bytes)` }, 413) };
  }

  return {
    ok: true,
    file: { name: upload.name, type: upload.type, bytes: new Uint8Array(await upload.arrayBuffer()) },
    fields,
  };
}
