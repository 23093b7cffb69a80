/**
 * Cover letter generation: one LLM call, or a fixed template built from the
 * resume's keywords when the call fails.
 */

import type { LlmExecutor } from '../lib/llm-executor.js';
import { describeError } from '../lib/llm-errors.js';
import logger from '../lib/logger.js';
import { titleCase } from './demo-analysis.js';
import { COVER_LETTER_SYSTEM_PROMPT, buildCoverLetterPrompt } from './prompts.js';

const TEMPLATE_SKILLS = ['python', 'java', 'javascript', 'react', 'machine learning', 'sql', 'aws'];

export interface CoverLetterInput {
  resumeText: string;
  jobDescription: string;
  companyName: string;
  position: string;
  candidateName: string;
}

export interface CoverLetter {
  cover_letter: string;
  company: string;
  position: string;
  candidate_name: string;
  demo_mode: boolean;
  fallback_reason?: string;
}

export function buildTemplateCoverLetter(input: CoverLetterInput): CoverLetter {
  const lower = input.resumeText.toLowerCase();
  const skills = TEMPLATE_SKILLS.filter((s) => lower.includes(s)).map(titleCase);
  const skillsText = skills.length > 0 ? skills.slice(0, 4).join(', ') : 'relevant technical skills';
  const { companyName, position, candidateName } = input;

  const letter = `Dear Hiring Manager,

I am writing to express my strong interest in the ${position} position at ${companyName}. With my background in ${skillsText}, I am excited about the opportunity to contribute to your team.

Throughout my career, I have developed expertise in areas that align closely with this role's requirements. My project experience has equipped me with the skills necessary to make an immediate impact, and I am eager to bring my knowledge to ${companyName}.

I am particularly drawn to this opportunity because it allows me to leverage my technical abilities while continuing to grow professionally. I am confident that my combination of skills and enthusiasm makes me a strong candidate for this position.

I would welcome the opportunity to discuss how my experience can contribute to ${companyName}'s success. Thank you for considering my application.

Sincerely,
${candidateName}`;

  return {
    cover_letter: letter,
    company: companyName,
    position,
    candidate_name: candidateName,
    demo_mode: true,
  };
}

export async function generateCoverLetter(executor: LlmExecutor, input: CoverLetterInput): Promise<CoverLetter> {
  try {
    const { text } = await executor.run({
      system: COVER_LETTER_SYSTEM_PROMPT,
      prompt: buildCoverLetterPrompt(input),
    });
    const letter = text.trim();
    if (!letter) throw new Error('Cover letter response was empty');
    return {
      cover_letter: letter,
      company: input.companyName,
      position: input.position,
      candidate_name: input.candidateName,
      demo_mode: false,
    };
  } catch (err) {
    const reason = describeError(err);
    logger.warn({ error: reason, company: input.companyName }, 'Cover letter generation failed, using template');
    return { ...buildTemplateCoverLetter(input), fallback_reason: reason };
  }
}
