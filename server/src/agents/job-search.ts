/**
 * Job search helpers: platform search links, per-role tips and a personalised
 * search strategy (LLM, or a per-role template when the call fails).
 */

import { z } from 'zod';
import { lazyDataFile } from '../lib/data-files.js';
import { decodeStructured } from '../lib/json-decode.js';
import type { LlmExecutor } from '../lib/llm-executor.js';
import { describeError } from '../lib/llm-errors.js';
import logger from '../lib/logger.js';
import { JOB_STRATEGY_SYSTEM_PROMPT, buildJobStrategyPrompt } from './prompts.js';
import type { JobLink, SkillGaps } from './types.js';

const JobSearchDataSchema = z.object({
  tips: z.record(z.array(z.string())),
  defaultTips: z.array(z.string()),
  alternativeTitles: z.record(z.array(z.string())),
});

const jobSearchData = lazyDataFile('job-search.json', JobSearchDataSchema);

export const JobStrategySchema = z.object({
  alternative_titles: z.array(z.string()).default([]),
  elevator_pitch: z.string().default(''),
  top_selling_points: z.array(z.object({
    point: z.string(),
    how_to_use: z.string().default(''),
  })).default([]),
  target_companies: z.array(z.object({
    type: z.string(),
    why: z.string().default(''),
    examples: z.string().default(''),
  })).default([]),
  resume_keywords: z.array(z.string()).default([]),
  networking_tips: z.array(z.string()).default([]),
  application_strategy: z.object({
    customize_for: z.string().default(''),
    highlight_project: z.string().default(''),
    address_gaps: z.string().default(''),
  }).default({}),
});

export type JobStrategy = z.infer<typeof JobStrategySchema> & {
  llm_powered: boolean;
  demo_mode?: boolean;
  fallback_reason?: string;
};

export function getJobSearchLinks(targetRole: string): JobLink[] {
  const role = encodeURIComponent(targetRole);
  const slug = targetRole.toLowerCase().replace(/ /g, '-');
  return [
    { platform: 'LinkedIn Jobs', url: `https://www.linkedin.com/jobs/search/?keywords=${role}`, icon: 'linkedin' },
    { platform: 'Indeed', url: `https://www.indeed.com/jobs?q=${role}`, icon: 'briefcase' },
    { platform: 'Google Jobs', url: `https://www.google.com/search?q=${role}+jobs&ibp=htl;jobs`, icon: 'search' },
    { platform: 'Glassdoor', url: `https://www.glassdoor.com/Job/jobs.htm?sc.keyword=${role}`, icon: 'door' },
    { platform: 'Naukri', url: `https://www.naukri.com/${slug}-jobs`, icon: 'briefcase' },
  ];
}

export function getJobTips(targetRole: string): string[] {
  const data = jobSearchData();
  return [...(data.tips[targetRole] ?? data.defaultTips)];
}

export function buildTemplateStrategy(targetRole: string): JobStrategy {
  const titles = jobSearchData().alternativeTitles[targetRole] ?? [`Junior ${targetRole}`, `Associate ${targetRole}`];
  return {
    alternative_titles: [...titles],
    elevator_pitch: `I'm a motivated professional targeting ${targetRole} roles, bringing a combination of technical skills and project experience.`,
    top_selling_points: [],
    target_companies: [],
    resume_keywords: [],
    networking_tips: [
      `Join ${targetRole} communities on LinkedIn and Discord`,
      'Attend virtual meetups and tech conferences',
      "Connect with people at companies you're interested in",
    ],
    application_strategy: {
      customize_for: 'Tailor your resume for each specific job posting',
      highlight_project: 'Lead with your most relevant project',
      address_gaps: 'Frame skill gaps as areas of active learning',
    },
    llm_powered: false,
    demo_mode: true,
  };
}

export async function generateJobStrategy(
  executor: LlmExecutor,
  resumeText: string,
  targetRole: string,
  strengths: string[],
  skillGaps: SkillGaps | null,
): Promise<JobStrategy> {
  try {
    const { text } = await executor.run({
      system: JOB_STRATEGY_SYSTEM_PROMPT,
      prompt: buildJobStrategyPrompt(resumeText, targetRole, strengths, skillGaps),
    });
    const strategy = JobStrategySchema.parse(decodeStructured(text));
    return { ...strategy, llm_powered: true };
  } catch (err) {
    const reason = describeError(err);
    logger.warn({ error: reason, targetRole }, 'Job strategy generation failed, using template');
    return { ...buildTemplateStrategy(targetRole), fallback_reason: reason };
  }
}
