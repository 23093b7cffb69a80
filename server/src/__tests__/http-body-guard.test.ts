import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { parseJsonBodyWithLimit, parseMultipartUpload, rejectOversizedBody } from '../lib/http-body-guard.js';

function jsonApp(maxBytes: number) {
  const app = new Hono();
  app.post('/parse', async (c) => {
    const parsed = await parseJsonBodyWithLimit(c, maxBytes);
    if (!parsed.ok) return parsed.response;
    return c.json({ data: parsed.data });
  });
  return app;
}

function uploadApp(maxBytes: number) {
  const app = new Hono();
  app.post('/upload', async (c) => {
    const upload = await parseMultipartUpload(c, 'resume', maxBytes);
    if (!upload.ok) return upload.response;
    return c.json({
      name: upload.file.name,
      type: upload.file.type,
      size: upload.file.bytes.byteLength,
      fields: upload.fields,
    });
  });
  return app;
}

describe('rejectOversizedBody', () => {
  function sizeApp(maxBytes: number) {
    const app = new Hono();
    app.post('/size', (c) => rejectOversizedBody(c, maxBytes) ?? c.json({ ok: true }));
    return app;
  }

  it('returns 413 when content-length exceeds the limit', async () => {
    const res = await sizeApp(50).request('http://test/size', {
      method: 'POST',
      body: 'x'.repeat(200),
      headers: { 'Content-Length': '200' },
    });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request too large (max 50 bytes)' });
  });

  it('allows requests within the limit or without a usable content-length', async () => {
    const within = await sizeApp(1_000).request('http://test/size', { method: 'POST', body: 'small' });
    const malformed = await sizeApp(50).request('http://test/size', {
      method: 'POST',
      headers: { 'Content-Length': 'abc' },
    });
    expect(within.status).toBe(200);
    expect(malformed.status).toBe(200);
  });
});

describe('parseJsonBodyWithLimit', () => {
  it('parses a JSON body', async () => {
    const res = await jsonApp(200).request('http://test/parse', {
      method: 'POST',
      body: JSON.stringify({ company_name: 'Acme' }),
      headers: { 'Content-Type': 'application/json' },
    });
    expect(await res.json()).toEqual({ data: { company_name: 'Acme' } });
  });

  it('treats an empty body as an empty object', async () => {
    const res = await jsonApp(200).request('http://test/parse', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
    });
    expect(await res.json()).toEqual({ data: {} });
  });

  it('returns 400 for invalid JSON', async () => {
    const res = await jsonApp(200).request('http://test/parse', {
      method: 'POST',
      body: '{invalid-json',
      headers: { 'Content-Type': 'application/json' },
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' });
  });

  it('rejects non-JSON content types with 415', async () => {
    const res = await jsonApp(200).request('http://test/parse', {
      method: 'POST',
      body: 'name=alice',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    });
    expect(res.status).toBe(415);
  });

  it('blocks oversized streamed JSON bodies without relying on content-length', async () => {
    const encoder = new TextEncoder();
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('{"payload":"'));
        controller.enqueue(encoder.encode('x'.repeat(120)));
        controller.enqueue(encoder.encode('"}'));
        controller.close();
      },
    });

    const init: RequestInit & { duplex: 'half' } = {
      method: 'POST',
      body: stream,
      headers: { 'Content-Type': 'application/json' },
      duplex: 'half',
    };
    const res = await jsonApp(30).request(new Request('http://test/parse', init));

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request too large (max 30 bytes)' });
  });
});

describe('parseMultipartUpload', () => {
  function form(file: File | null, fields: Record<string, string> = {}) {
    const data = new FormData();
    if (file) data.append('resume', file);
    for (const [key, value] of Object.entries(fields)) data.append(key, value);
    return data;
  }

  it('returns the file bytes and text fields', async () => {
    const file = new File(['%PDF-1.4 test'], 'cv.pdf', { type: 'application/pdf' });
    const res = await uploadApp(1_000).request('http://test/upload', {
      method: 'POST',
      body: form(file, { target_role: 'Data Analyst' }),
    });

    expect(await res.json()).toEqual({
      name: 'cv.pdf',
      type: 'application/pdf',
      size: 13,
      fields: { target_role: 'Data Analyst' },
    });
  });

  it('requires the file field', async () => {
    const res = await uploadApp(1_000).request('http://test/upload', {
      method: 'POST',
      body: form(null, { target_role: 'Data Analyst' }),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Missing file field "resume"' });
  });

  it('rejects files over the limit', async () => {
    const file = new File(['x'.repeat(2_000)], 'cv.pdf', { type: 'application/pdf' });
    const res = await uploadApp(1_000).request('http://test/upload', {
      method: 'POST',
      body: form(file),
    });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'File too large (max 1000 bytes)' });
  });

  it('stops reading a streamed upload once it passes the limit', async () => {
    const file = new File(['x'.repeat(500_000)], 'cv.pdf', { type: 'application/pdf' });
    const encoded = new Response(form(file));
    const contentType = encoded.headers.get('content-type') ?? '';
    const bytes = new Uint8Array(await encoded.arrayBuffer());

    let offset = 0;
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        if (offset >= bytes.byteLength) {
          controller.close();
          return;
        }
        const chunk = bytes.slice(offset, offset + 4_096);
        offset += chunk.byteLength;
        controller.enqueue(chunk);
      },
    });

    const init: RequestInit & { duplex: 'half' } = {
      method: 'POST',
      body: stream,
      headers: { 'Content-Type': contentType },
      duplex: 'half',
    };
    const res = await uploadApp(1_000).request(new Request('http://test/upload', init));

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'Request too large (max 66536 bytes)' });
    expect(offset).toBeLessThan(200_000);
  });

  it('accepts a streamed upload within the limit', async () => {
    const file = new File(['%PDF-1.4 test'], 'cv.pdf', { type: 'application/pdf' });
    const encoded = new Response(form(file, { target_role: 'Data Analyst' }));
    const contentType = encoded.headers.get('content-type') ?? '';
    const init: RequestInit & { duplex: 'half' } = {
      method: 'POST',
      body: encoded.body,
      headers: { 'Content-Type': contentType },
      duplex: 'half',
    };
    const res = await uploadApp(1_000).request(new Request('http://test/upload', init));

    expect(await res.json()).toEqual({
      name: 'cv.pdf',
      type: 'application/pdf',
      size: 13,
      fields: { target_role: 'Data Analyst' },
    });
  });

  it('rejects non-multipart requests', async () => {
    const res = await uploadApp(1_000).request('http://test/upload', {
      method: 'POST',
      body: JSON.stringify({ resume: 'text' }),
      headers: { 'Content-Type': 'application/json' },
    });
    expect(res.status).toBe(415);
  });
});
