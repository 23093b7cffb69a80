import { buildSheetsData } from '../lib/sheets-export.js';
import { getRoleQuestions, getInterviewTips } from './interview-questions.js';
import { getJobSearchLinks, getJobTips } from './job-search.js';
import { getCuratedChannels, getLearningResources } from './learning-resources.js';
import type { AnalysisReport, CareerAnalysis } from './types.js';

/** Attaches learning links, job links, the interview bank and the TSV export to an analysis. */
export function buildAnalysisReport(analysis: CareerAnalysis, generatedAt: Date = new Date()): AnalysisReport {
  const role = analysis.target_role;
  return {
    ...analysis,
    learning_resources: getLearningResources(analysis.roadmap),
    curated_channels: getCuratedChannels(role),
    job_links: getJobSearchLinks(role),
    job_tips: getJobTips(role),
    interview_questions: getRoleQuestions(role),
    interview_tips: getInterviewTips(),
    sheets_data: buildSheetsData(analysis, generatedAt),
  };
}
