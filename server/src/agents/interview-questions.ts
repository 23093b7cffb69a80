/**
 * Interview preparation: the curated per-role question bank plus questions
 * personalised to the resume, from the LLM or from keyword heuristics.
 */

import { z } from 'zod';
import { lazyDataFile } from '../lib/data-files.js';
import { decodeStructured } from '../lib/json-decode.js';
import type { LlmExecutor } from '../lib/llm-executor.js';
import { describeError } from '../lib/llm-errors.js';
import logger from '../lib/logger.js';
import { INTERVIEW_SYSTEM_PROMPT, buildInterviewPrompt } from './prompts.js';
import type { InterviewQuestion, InterviewQuestionSet, SkillGaps } from './types.js';

const QuestionSchema = z.object({
  question: z.string().min(1),
  tip: z.string().default(''),
  difficulty: z.string().default('Medium'),
});

const QuestionSetSchema = z.object({
  technical: z.array(QuestionSchema),
  behavioral: z.array(QuestionSchema),
});

const InterviewBankSchema = z.object({
  roles: z.record(QuestionSetSchema),
  defaultQuestions: QuestionSetSchema,
  generalTips: z.array(z.string()),
  resumePatterns: z.array(z.object({
    keyword: z.string(),
    question: z.string(),
    tip: z.string(),
  })),
});

const interviewBank = lazyDataFile('interview-bank.json', InterviewBankSchema);

const LlmQuestionsSchema = z.object({
  questions: z.array(QuestionSchema).min(1),
});

const MAX_PATTERN_QUESTIONS = 5;
const MAX_PERSONALISED_QUESTIONS = 8;

const GENERIC_QUESTIONS: InterviewQuestion[] = [
  {
    question: "Walk me through your resume. What's your career story?",
    tip: 'Create a narrative that connects your experiences to this role.',
    difficulty: 'Easy',
  },
  {
    question: "What's the most impactful project you've worked on?",
    tip: 'Choose a project relevant to the role and quantify your impact.',
    difficulty: 'Medium',
  },
  {
    question: 'What technical skills are you currently developing?',
    tip: "Show continuous learning and mention specific resources you're using.",
    difficulty: 'Easy',
  },
];

export function getRoleQuestions(targetRole: string): InterviewQuestionSet {
  const bank = interviewBank();
  return bank.roles[targetRole] ?? bank.defaultQuestions;
}

export function getInterviewTips(): string[] {
  return [...interviewBank().generalTips];
}

/**
 * Keyword heuristics: up to five questions for technologies found in the
 * resume, then strength questions while under five, then one core-gap
 * question while under six. Falls back to a generic trio when nothing matched.
 */
export function buildResumeQuestions(
  resumeText: string,
  strengths: string[] = [],
  skillGaps: SkillGaps | null = null,
): InterviewQuestion[] {
  const lower = resumeText.toLowerCase();
  const questions: InterviewQuestion[] = [];

  for (const pattern of interviewBank().resumePatterns) {
    if (!lower.includes(pattern.keyword)) continue;
    questions.push({ question: pattern.question, tip: pattern.tip, difficulty: 'Medium' });
    if (questions.length >= MAX_PATTERN_QUESTIONS) break;
  }

  if (strengths.length > 0 && questions.length < 5) {
    for (const strength of strengths.slice(0, 2)) {
      questions.push({
        question: `Your resume mentions '${strength}'. Can you give me a specific example of this?`,
        tip: 'Prepare a concrete story that demonstrates this strength with measurable results.',
        difficulty: 'Medium',
      });
    }
  }

  if (skillGaps && questions.length < 6) {
    for (const gap of skillGaps.core.slice(0, 1)) {
      questions.push({
        question: `This role requires ${gap}. How do you plan to develop this skill?`,
        tip: "Show initiative by mentioning courses, projects, or self-study plans you've started.",
        difficulty: 'Medium',
      });
    }
  }

  return questions.length > 0 ? questions : GENERIC_QUESTIONS.map((q) => ({ ...q }));
}

export interface PersonalisedQuestions {
  questions: InterviewQuestion[];
  llm_powered: boolean;
  fallback_reason?: string;
}

export async function generateResumeQuestions(
  executor: LlmExecutor,
  resumeText: string,
  targetRole: string,
  strengths: string[],
  skillGaps: SkillGaps | null,
): Promise<PersonalisedQuestions> {
  try {
    const { text } = await executor.run({
      system: INTERVIEW_SYSTEM_PROMPT,
      prompt: buildInterviewPrompt(resumeText, targetRole, skillGaps?.core ?? []),
    });
    const parsed = LlmQuestionsSchema.parse(decodeStructured(text));
    return {
      questions: parsed.questions.slice(0, MAX_PERSONALISED_QUESTIONS).map((q) => ({ ...q, category: 'resume' })),
      llm_powered: true,
    };
  } catch (err) {
    const reason = describeError(err);
    logger.warn({ error: reason, targetRole }, 'Interview question generation failed, using resume heuristics');
    return {
      questions: buildResumeQuestions(resumeText, strengths, skillGaps).map((q) => ({ ...q, category: 'resume' })),
      llm_powered: false,
      fallback_reason: reason,
    };
  }
}
