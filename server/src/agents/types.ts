/**
 * Shared type definitions for the career analysis agents.
 *
 * The LLM-backed pipeline and the keyword fallback produce the same
 * `CareerAnalysis` shape, so routes and exports never branch on the source.
 */

export interface RoadmapItem {
  skill: string;
  priority: string;
  estimated_time: string;
  expected_outcome: string;
}

export interface SkillGaps {
  core: string[];
  supporting: string[];
}

export interface Reflection {
  status: string;
  reason: string;
}

export interface CareerAnalysis {
  role_fit_score: number;
  strengths: string[];
  skill_gaps: SkillGaps;
  roadmap: RoadmapItem[];
  analysis_notes: string;
  reflection: Reflection;
  target_role: string;
  demo_mode: boolean;
  /** Set when the LLM path failed and the keyword fallback stood in. */
  fallback_reason?: string;
}

// ─── Enrichment attached by the analyze route ────────────────────────

export interface VideoLink {
  title: string;
  url: string;
  channel: string;
}

export interface LearningResource {
  skill: string;
  priority: string;
  search_url: string;
  videos: VideoLink[];
}

export interface Channel {
  name: string;
  url: string;
}

export interface JobLink {
  platform: string;
  url: string;
  icon: string;
}

export interface InterviewQuestion {
  question: string;
  tip: string;
  difficulty: string;
  category?: string;
}

export interface InterviewQuestionSet {
  technical: InterviewQuestion[];
  behavioral: InterviewQuestion[];
}

/** A finished analysis plus the links, tips and exports the analyze route attaches. */
export interface AnalysisReport extends CareerAnalysis {
  learning_resources: LearningResource[];
  curated_channels: Channel[];
  job_links: JobLink[];
  job_tips: string[];
  interview_questions: InterviewQuestionSet;
  interview_tips: string[];
  sheets_data: { tsv: string; sheets_url: string };
}
