import type { CareerAnalysis } from '../agents/types.js';

export const SHEETS_CREATE_URL = 'https://docs.google.com/spreadsheets/create';

export interface SheetsData {
  tsv: string;
  sheets_url: string;
}

// Tabs and newlines would split a cell.
function cell(value: string | number): string {
  return String(value).replace(/[\t\r\n]+/g, ' ').trim();
}

function row(...cells: Array<string | number>): string {
  return cells.map(cell).join('\t');
}

/** "YYYY-MM-DD HH:MM" in UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/** Tab-separated rows that paste directly into a spreadsheet, three columns wide. */
export function buildAnalysisTsv(analysis: CareerAnalysis, generatedAt: Date = new Date()): string {
  const lines = [
    row('Career Analysis Report', '', ''),
    row('Generated', formatTimestamp(generatedAt), ''),
    row('Target Role', analysis.target_role, ''),
    row('Role Fit Score', `${analysis.role_fit_score}%`, ''),
    row('', '', ''),
    row('STRENGTHS', '', ''),
    ...analysis.strengths.map((s) => row('✓', s, '')),
    row('', '', ''),
    row('SKILLS TO DEVELOP', '', ''),
    ...analysis.skill_gaps.core.map((s) => row('Core', s, '')),
    ...analysis.skill_gaps.supporting.map((s) => row('Supporting', s, '')),
    row('', '', ''),
    row('LEARNING ROADMAP', '', ''),
    row('Skill', 'Priority', 'Estimated Time'),
    ...analysis.roadmap.map((item) => row(item.skill, item.priority, item.estimated_time)),
    row('', '', ''),
    row('AI MENTOR INSIGHT', '', ''),
    row('', analysis.reflection.reason, ''),
  ];
  return lines.join('\n');
}

export function buildSheetsData(analysis: CareerAnalysis, generatedAt: Date = new Date()): SheetsData {
  return {
    tsv: buildAnalysisTsv(analysis, generatedAt),
    sheets_url: SHEETS_CREATE_URL,
  };
}
