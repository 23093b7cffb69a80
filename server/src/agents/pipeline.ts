/**
 * Career analysis pipeline: four chained LLM steps.
 *
 * 1. Resume understanding: skills, education, experience level, strengths
 * 2. Role fit: score, missing core/supporting skills, notes
 * 3. Learning roadmap for the missing skills
 * 4. Reflection on whether the guidance is sufficient
 *
 * Each step's decoded output is validated with zod and threaded into the next
 * prompt. Any failure along the way (no keys, throttling, upstream error,
 * undecodable or invalid JSON) substitutes the keyword-heuristic analysis.
 */

import { z } from 'zod';
import type { LlmExecutor } from '../lib/llm-executor.js';
import { decodeStructured } from '../lib/json-decode.js';
import { DecodeError, describeError } from '../lib/llm-errors.js';
import logger, { createSessionLogger } from '../lib/logger.js';
import { buildDemoAnalysis } from './demo-analysis.js';
import {
  SYSTEM_PROMPT,
  buildReflectionPrompt,
  buildResumeUnderstandingPrompt,
  buildRoadmapPrompt,
  buildRoleFitPrompt,
} from './prompts.js';
import type { CareerAnalysis } from './types.js';

// ─── Step schemas ────────────────────────────────────────────────────

const stringList = z.array(z.string()).default([]);

export const ResumeUnderstandingSchema = z.object({
  skills: stringList,
  education_level: z.string().default('Unknown'),
  experience_level: z.string().default('Unknown'),
  strengths: stringList,
});

export const RoleFitSchema = z.object({
  role_fit_score: z.coerce.number().min(0).max(100).default(0),
  missing_core_skills: stringList,
  missing_supporting_skills: stringList,
  analysis_notes: z.string().default(''),
});

export const RoadmapSchema = z.object({
  roadmap: z.array(z.object({
    skill: z.string(),
    priority: z.string().default('Medium'),
    estimated_time: z.string().default(''),
    expected_outcome: z.string().default(''),
  })).default([]),
});

export const ReflectionSchema = z.object({
  status: z.string(),
  reason: z.string().default(''),
});

export interface AnalysisOptions {
  sessionId?: string;
}

async function runStep<T extends z.ZodTypeAny>(
  executor: LlmExecutor,
  step: string,
  prompt: string,
  schema: T,
): Promise<z.infer<T>> {
  const { text } = await executor.run({ system: SYSTEM_PROMPT, prompt });
  const decoded = decodeStructured(text);
  const result = schema.safeParse(decoded);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new DecodeError(`${step} response failed validation: ${issues}`, text);
  }
  return result.data;
}

/**
 * Runs the four-step chain. Never throws for string inputs: every failure
 * yields the keyword-heuristic analysis with `fallback_reason` set.
 */
export async function runAnalysis(
  executor: LlmExecutor,
  resumeText: string,
  targetRole: string,
  options: AnalysisOptions = {},
): Promise<CareerAnalysis> {
  const log = options.sessionId ? createSessionLogger(options.sessionId, { targetRole }) : logger.child({ targetRole });

  try {
    log.info('Analysis step 1: resume understanding');
    const understanding = await runStep(
      executor,
      'Resume understanding',
      buildResumeUnderstandingPrompt(resumeText),
      ResumeUnderstandingSchema,
    );

    log.info({ skills: understanding.skills.length }, 'Analysis step 2: role fit');
    const roleFit = await runStep(
      executor,
      'Role fit',
      buildRoleFitPrompt({
        skills: understanding.skills,
        educationLevel: understanding.education_level,
        experienceLevel: understanding.experience_level,
        strengths: understanding.strengths,
        targetRole,
      }),
      RoleFitSchema,
    );

    log.info({ score: roleFit.role_fit_score }, 'Analysis step 3: learning roadmap');
    const roadmap = await runStep(
      executor,
      'Learning roadmap',
      buildRoadmapPrompt(roleFit.missing_core_skills, roleFit.missing_supporting_skills, targetRole),
      RoadmapSchema,
    );

    log.info({ items: roadmap.roadmap.length }, 'Analysis step 4: reflection');
    const reflection = await runStep(
      executor,
      'Reflection',
      buildReflectionPrompt(roleFit.role_fit_score, roadmap.roadmap.length, targetRole),
      ReflectionSchema,
    );

    log.info('Analysis complete');
    return {
      role_fit_score: Math.round(roleFit.role_fit_score),
      strengths: understanding.strengths,
      skill_gaps: {
        core: roleFit.missing_core_skills,
        supporting: roleFit.missing_supporting_skills,
      },
      roadmap: roadmap.roadmap,
      analysis_notes: roleFit.analysis_notes,
      reflection,
      target_role: targetRole,
      demo_mode: false,
    };
  } catch (err) {
    const reason = describeError(err);
    log.warn({ error: reason }, 'LLM analysis failed, using keyword analysis');
    return { ...buildDemoAnalysis(resumeText, targetRole), fallback_reason: reason };
  }
}
