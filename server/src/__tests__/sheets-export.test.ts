import { describe, it, expect } from 'vitest';
import { buildAnalysisTsv, buildSheetsData, formatTimestamp } from '../lib/sheets-export.js';
import type { CareerAnalysis } from '../agents/types.js';

const analysis: CareerAnalysis = {
  role_fit_score: 64,
  strengths: ['SQL reporting', 'Stakeholder\tcommunication'],
  skill_gaps: { core: ['statistics'], supporting: ['tableau'] },
  roadmap: [
    { skill: 'Statistics', priority: 'High', estimated_time: '3 weeks', expected_outcome: 'Run A/B tests' },
  ],
  analysis_notes: 'Good base.',
  reflection: { status: 'sufficient', reason: 'Covers the gaps.\nKeep practising.' },
  target_role: 'Data Analyst',
  demo_mode: false,
};

describe('formatTimestamp', () => {
  it('formats UTC minutes', () => {
    expect(formatTimestamp(new Date('2026-05-04T07:08:09Z'))).toBe('2026-05-04 07:08');
  });
});

describe('buildAnalysisTsv', () => {
  it('lays out three tab-separated columns', () => {
    const tsv = buildAnalysisTsv(analysis, new Date('2026-05-04T07:08:09Z'));

    expect(tsv.split('\n')).toEqual([
      'Career Analysis Report\t\t',
      'Generated\t2026-05-04 07:08\t',
      'Target Role\tData Analyst\t',
      'Role Fit Score\t64%\t',
      '\t\t',
      'STRENGTHS\t\t',
      '✓\tSQL reporting\t',
      '✓\tStakeholder communication\t',
      '\t\t',
      'SKILLS TO DEVELOP\t\t',
      'Core\tstatistics\t',
      'Supporting\ttableau\t',
      '\t\t',
      'LEARNING ROADMAP\t\t',
      'Skill\tPriority\tEstimated Time',
      'Statistics\tHigh\t3 weeks',
      '\t\t',
      'AI MENTOR INSIGHT\t\t',
      '\tCovers the gaps. Keep practising.\t',
    ]);
  });
});

describe('buildSheetsData', () => {
  it('pairs the TSV with the new-sheet URL', () => {
    const data = buildSheetsData(analysis, new Date('2026-05-04T07:08:09Z'));
    expect(data.sheets_url).toBe('https://docs.google.com/spreadsheets/create');
    expect(data.tsv.startsWith('Career Analysis Report')).toBe(true);
  });
});
