import { describe, it, expect, vi, beforeEach } from 'vitest';

const { pdfState } = vi.hoisted(() => ({
  pdfState: {
    pages: [] as string[][],
    fail: false,
    destroyed: 0,
  },
}));

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: vi.fn(() => ({
    promise: pdfState.fail
      ? Promise.reject(new Error('Invalid PDF structure'))
      : Promise.resolve({
          numPages: pdfState.pages.length,
          getPage: async (n: number) => ({
            getTextContent: async () => ({
              items: [...(pdfState.pages[n - 1] ?? []).map((str) => ({ str })), { type: 'beginMarkedContent' }],
            }),
          }),
          destroy: async () => {
            pdfState.destroyed += 1;
          },
        }),
  })),
}));

import { ResumeExtractionError, extractResumeText, looksLikePdf, normalizeText } from '../lib/resume-text.js';

const pdfBytes = new TextEncoder().encode('%PDF-1.7 fake');

beforeEach(() => {
  pdfState.pages = [];
  pdfState.fail = false;
  pdfState.destroyed = 0;
});

describe('looksLikePdf', () => {
  it('checks the magic bytes', () => {
    expect(looksLikePdf(pdfBytes)).toBe(true);
    expect(looksLikePdf(new TextEncoder().encode('PK\u0003\u0004'))).toBe(false);
    expect(looksLikePdf(new Uint8Array())).toBe(false);
  });
});

describe('normalizeText', () => {
  it('strips NULs, trailing spaces and runs of blank lines', () => {
    expect(normalizeText('  Jordan\u0000 Lee  \n\n\n\nEngineer \t\nSQL  ')).toBe('Jordan Lee\n\nEngineer\nSQL');
  });
});

describe('extractResumeText', () => {
  it('joins the text of every page', async () => {
    pdfState.pages = [['Jordan', 'Lee'], ['Python', 'SQL']];

    await expect(extractResumeText(pdfBytes)).resolves.toBe('Jordan Lee\n\nPython SQL');
    expect(pdfState.destroyed).toBe(1);
  });

  it('rejects files that are not PDFs', async () => {
    const error = await extractResumeText(new TextEncoder().encode('plain text')).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ResumeExtractionError);
    expect(error).toMatchObject({ code: 'UNSUPPORTED_TYPE', status: 415 });
  });

  it('reports unreadable PDFs', async () => {
    pdfState.fail = true;
    const error = await extractResumeText(pdfBytes).catch((err: unknown) => err);
    expect(error).toMatchObject({ code: 'UNREADABLE', status: 422 });
  });

  it('reports PDFs without text', async () => {
    pdfState.pages = [[' '], []];
    const error = await extractResumeText(pdfBytes).catch((err: unknown) => err);
    expect(error).toMatchObject({ code: 'EMPTY', status: 422 });
    expect(pdfState.destroyed).toBe(1);
  });
});
