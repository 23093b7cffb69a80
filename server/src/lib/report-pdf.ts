import { jsPDF } from 'jspdf';
import type { CareerAnalysis } from '../agents/types.js';
import type { CoverLetter } from '../agents/cover-letter.js';

type PdfStyle = 'title' | 'subtitle' | 'score' | 'heading' | 'body' | 'bullet' | 'blank';

export interface PdfLine {
  text: string;
  style: PdfStyle;
}

interface PdfStyleConfig {
  bold: boolean;
  size: number;
  indent: number;
  lineHeight: number;
}

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN_LEFT = 54;
const MARGIN_RIGHT = 54;
const MARGIN_TOP = 56;
const MARGIN_BOTTOM = 44;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN_LEFT - MARGIN_RIGHT;

const STYLE_MAP: Record<Exclude<PdfStyle, 'blank'>, PdfStyleConfig> = {
  title: { bold: true, size: 20, indent: 0, lineHeight: 26 },
  subtitle: { bold: false, size: 10, indent: 0, lineHeight: 14 },
  score: { bold: true, size: 28, indent: 0, lineHeight: 34 },
  heading: { bold: true, size: 12, indent: 0, lineHeight: 18 },
  body: { bold: false, size: 10, indent: 0, lineHeight: 14 },
  bullet: { bold: false, size: 10, indent: 16, lineHeight: 14 },
};

/**
 * Reduces text to what jsPDF's standard fonts can encode: Latin-1 plus the
 * quote, dash, bullet and ellipsis characters of WinAnsi. Anything else is
 * NFKD-decomposed and stripped.
 */
export function sanitizePdfText(input: string): string {
  return input
    .replace(/\s+/g, ' ')
    .replace(/[\u2023\u25E6\u2043\u2027]/g, '\u2022')
    .replace(/[\u2713\u2714]/g, '+')
    .replace(/[^\x00-\xFF\u2018\u2019\u201C\u201D\u2013\u2014\u2022\u2026]/g, (ch) =>
      ch.normalize('NFKD').replace(/[^\x00-\xFF]/g, ''))
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .trim();
}

function sanitizeFilenameSegment(s: string): string {
  return s
    .normalize('NFKC')
    .replace(/[^\p{L}\p{N}]/gu, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .slice(0, 40);
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function buildReportFilename(targetRole: string, date: Date): string {
  return `Career_Report_${sanitizeFilenameSegment(targetRole) || 'Role'}_${isoDate(date)}.pdf`;
}

export function buildCoverLetterFilename(company: string, position: string): string {
  const parts = [sanitizeFilenameSegment(company), sanitizeFilenameSegment(position)].filter(Boolean);
  return `Cover_Letter_${parts.join('_') || 'Application'}.pdf`;
}

function scoreLabel(score: number): string {
  if (score >= 75) return 'Strong fit';
  if (score >= 50) return 'Moderate fit';
  return 'Developing fit';
}

export function buildReportLines(analysis: CareerAnalysis, generatedAt: Date): PdfLine[] {
  const lines: PdfLine[] = [
    { text: 'Career Analysis Report', style: 'title' },
    { text: `Target role: ${analysis.target_role}`, style: 'subtitle' },
    { text: `Generated ${isoDate(generatedAt)}`, style: 'subtitle' },
    { text: '', style: 'blank' },
    { text: 'ROLE FIT SCORE', style: 'heading' },
    { text: `${analysis.role_fit_score}/100`, style: 'score' },
    { text: scoreLabel(analysis.role_fit_score), style: 'body' },
    { text: '', style: 'blank' },
  ];

  if (analysis.strengths.length > 0) {
    lines.push({ text: 'STRENGTHS', style: 'heading' });
    for (const strength of analysis.strengths) lines.push({ text: strength, style: 'bullet' });
    lines.push({ text: '', style: 'blank' });
  }

  const { core, supporting } = analysis.skill_gaps;
  if (core.length > 0 || supporting.length > 0) {
    lines.push({ text: 'SKILLS TO DEVELOP', style: 'heading' });
    if (core.length > 0) lines.push({ text: `Core: ${core.join(', ')}`, style: 'body' });
    if (supporting.length > 0) lines.push({ text: `Supporting: ${supporting.join(', ')}`, style: 'body' });
    lines.push({ text: '', style: 'blank' });
  }

  if (analysis.roadmap.length > 0) {
    lines.push({ text: 'LEARNING ROADMAP', style: 'heading' });
    analysis.roadmap.forEach((item, i) => {
      const meta = [item.priority, item.estimated_time].filter(Boolean).join(', ');
      lines.push({ text: `${i + 1}. ${item.skill}${meta ? ` (${meta})` : ''}`, style: 'body' });
      if (item.expected_outcome) lines.push({ text: item.expected_outcome, style: 'bullet' });
    });
    lines.push({ text: '', style: 'blank' });
  }

  if (analysis.analysis_notes) {
    lines.push({ text: 'ANALYSIS NOTES', style: 'heading' });
    lines.push({ text: analysis.analysis_notes, style: 'body' });
    lines.push({ text: '', style: 'blank' });
  }

  if (analysis.reflection.reason) {
    lines.push({ text: 'AI MENTOR INSIGHT', style: 'heading' });
    lines.push({ text: analysis.reflection.reason, style: 'body' });
  }

  return lines;
}

export function buildCoverLetterLines(letter: CoverLetter): PdfLine[] {
  const lines: PdfLine[] = [];
  for (const paragraph of letter.cover_letter.split(/\n\s*\n/)) {
    for (const row of paragraph.split('\n').map((l) => l.trim()).filter(Boolean)) {
      lines.push({ text: row, style: 'body' });
    }
    lines.push({ text: '', style: 'blank' });
  }
  return lines.length > 0 ? lines : [{ text: 'Cover letter unavailable.', style: 'body' }];
}

function renderLines(lines: PdfLine[], pageNumbers: boolean): ArrayBuffer {
  const doc = new jsPDF({
    orientation: 'portrait',
    unit: 'pt',
    format: 'letter',
  });

  let y = MARGIN_TOP;

  function ensureRoom(height: number) {
    if (y + height <= PAGE_HEIGHT - MARGIN_BOTTOM) return;
    doc.addPage();
    y = MARGIN_TOP;
  }

  for (const line of lines) {
    if (line.style === 'blank') {
      y += 10;
      continue;
    }

    const style = STYLE_MAP[line.style];
    doc.setFont('helvetica', style.bold ? 'bold' : 'normal');
    doc.setFontSize(style.size);

    const text = sanitizePdfText(line.text);
    if (!text) continue;

    const baseX = MARGIN_LEFT + style.indent;
    const availableWidth = CONTENT_WIDTH - style.indent;

    if (line.style === 'bullet') {
      const prefixWidth = doc.getTextWidth('- ');
      const wrapped: string[] = doc.splitTextToSize(text, availableWidth - prefixWidth);
      wrapped.forEach((row, i) => {
        ensureRoom(style.lineHeight);
        doc.text(i === 0 ? `- ${row}` : row, i === 0 ? baseX : baseX + prefixWidth, y);
        y += style.lineHeight;
      });
    } else {
      const wrapped: string[] = doc.splitTextToSize(text, availableWidth);
      for (const row of wrapped) {
        ensureRoom(style.lineHeight);
        doc.text(row, baseX, y);
        y += style.lineHeight;
      }
    }

    if (line.style === 'heading') y += 2;
  }

  if (pageNumbers) {
    const totalPages = doc.getNumberOfPages();
    for (let i = 1; i <= totalPages; i++) {
      doc.setPage(i);
      doc.setFont('helvetica', 'normal');
      doc.setFontSize(9);
      const pageText = `Page ${i} of ${totalPages}`;
      const textWidth = doc.getTextWidth(pageText);
      doc.text(pageText, PAGE_WIDTH - MARGIN_RIGHT - textWidth, PAGE_HEIGHT - MARGIN_BOTTOM + 14);
    }
  }

  return doc.output('arraybuffer');
}

export function renderAnalysisReport(analysis: CareerAnalysis, generatedAt: Date = new Date()): ArrayBuffer {
  return renderLines(buildReportLines(analysis, generatedAt), true);
}

export function renderCoverLetterPdf(letter: CoverLetter): ArrayBuffer {
  return renderLines(buildCoverLetterLines(letter), false);
}
