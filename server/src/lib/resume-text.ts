import logger from './logger.js';

export type ResumeExtractionErrorCode = 'UNSUPPORTED_TYPE' | 'TOO_LARGE' | 'EMPTY' | 'UNREADABLE';

const STATUS_BY_CODE: Record<ResumeExtractionErrorCode, 413 | 415 | 422> = {
  UNSUPPORTED_TYPE: 415,
  TOO_LARGE: 413,
  EMPTY: 422,
  UNREADABLE: 422,
};

export class ResumeExtractionError extends Error {
  readonly code: ResumeExtractionErrorCode;

  constructor(code: ResumeExtractionErrorCode, message: string) {
    super(message);
    this.name = 'ResumeExtractionError';
    this.code = code;
  }

  get status(): 413 | 415 | 422 {
    return STATUS_BY_CODE[this.code];
  }
}

/** Turns uploaded bytes into plain resume text. Injected into routes so tests can skip PDF parsing. */
export type ResumeTextExtractor = (bytes: Uint8Array) => Promise<string>;

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-

export function normalizeText(text: string): string {
  return text.replace(/\u0000/g, '').replace(/[ \t]+\n/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
}

export function looksLikePdf(bytes: Uint8Array): boolean {
  return PDF_MAGIC.every((b, i) => bytes[i] === b);
}

function hasText(item: object): item is { str: string } {
  return 'str' in item && typeof item.str === 'string';
}

/**
 * Extracts text from a PDF with pdfjs-dist's legacy build, which runs in Node
 * without a worker. Pages are joined by a blank line.
 */
export const extractResumeText: ResumeTextExtractor = async (bytes) => {
  if (!looksLikePdf(bytes)) {
    throw new ResumeExtractionError('UNSUPPORTED_TYPE', 'Unsupported file type. Please upload a PDF resume.');
  }

  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdfjs takes ownership of the buffer it is given
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    useSystemFonts: true,
  });

  const pdf = await loadingTask.promise.catch((err: unknown) => {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'PDF could not be parsed');
    throw new ResumeExtractionError('UNREADABLE', 'The PDF could not be read. Please upload a different file.');
  });

  try {
    const pages: string[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      pages.push(content.items.map((item) => (hasText(item) ? item.str : '')).join(' '));
    }

    const text = normalizeText(pages.join('\n\n'));
    if (!text) {
      throw new ResumeExtractionError('EMPTY', 'No text found in the PDF. Scanned resumes are not supported.');
    }
    return text;
  } finally {
    await pdf.destroy();
  }
};
