/**
 * Keyword-heuristic analysis used when the LLM path is unavailable.
 *
 * Pure and deterministic: the same resume text and role always produce the
 * same result, with the same keys as the pipeline's output.
 */

import { z } from 'zod';
import { lazyDataFile } from '../lib/data-files.js';
import type { CareerAnalysis, RoadmapItem } from './types.js';

const RoleRequirementsSchema = z.object({
  core: z.array(z.string()).min(1),
  supporting: z.array(z.string()).min(1),
});

const RoleRequirementsFileSchema = z.object({
  defaultRole: z.string(),
  skillVocabulary: z.array(z.string()),
  roles: z.record(RoleRequirementsSchema),
});

export type RoleRequirements = z.infer<typeof RoleRequirementsSchema>;

const roleRequirementsData = lazyDataFile('role-requirements.json', RoleRequirementsFileSchema);

const LEADERSHIP_MARKERS = ['leadership', 'led', 'managed'];
const AGILE_MARKERS = ['agile', 'scrum'];
const DEFAULT_STRENGTHS = ['Foundational knowledge present', 'Enthusiasm for learning'];

/** Requirements for a role, falling back to the default role for unknown names. */
export function getRoleRequirements(targetRole: string): RoleRequirements {
  const data = roleRequirementsData();
  return data.roles[targetRole] ?? data.roles[data.defaultRole] ?? { core: [], supporting: [] };
}

export function listKnownRoles(): string[] {
  return Object.keys(roleRequirementsData().roles);
}

/** Capitalises the first letter of every alphabetic run: "node.js" → "Node.Js". */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/** Vocabulary skills that appear (as substrings) in the lowercased text, in vocabulary order. */
export function findSkills(resumeText: string): string[] {
  const lower = resumeText.toLowerCase();
  return roleRequirementsData().skillVocabulary.filter((skill) => lower.includes(skill));
}

function ratio(matched: number, total: number): number {
  return total > 0 ? matched / total : 0;
}

export function buildDemoAnalysis(resumeText: string, targetRole: string): CareerAnalysis {
  const lower = resumeText.toLowerCase();
  const found = findSkills(resumeText);
  const reqs = getRoleRequirements(targetRole);

  const coreMatch = reqs.core.filter((s) => lower.includes(s)).length;
  const supportingMatch = reqs.supporting.filter((s) => lower.includes(s)).length;

  const raw = Math.floor(
    ratio(coreMatch, reqs.core.length) * 70 + ratio(supportingMatch, reqs.supporting.length) * 30,
  );
  const score = Math.max(25, Math.min(95, raw + 20));

  const missingCore = reqs.core.filter((s) => !lower.includes(s));
  const missingSupporting = reqs.supporting.filter((s) => !lower.includes(s));

  const strengths: string[] = [];
  if (found.length > 0) {
    strengths.push(`Technical proficiency in ${found.slice(0, 3).join(', ')}`);
  }
  if (LEADERSHIP_MARKERS.some((m) => lower.includes(m))) {
    strengths.push('Leadership and team management experience');
  }
  if (lower.includes('project')) {
    strengths.push('Project delivery experience');
  }
  if (found.length > 5) {
    strengths.push('Diverse technical skill set');
  }
  if (AGILE_MARKERS.some((m) => lower.includes(m))) {
    strengths.push('Agile methodology experience');
  }

  const roadmap: RoadmapItem[] = [
    ...missingCore.slice(0, 3).map((skill, i) => ({
      skill: titleCase(skill),
      priority: 'High',
      estimated_time: `${(i + 1) * 2} weeks`,
      expected_outcome: `Become proficient in ${skill} for ${targetRole} role`,
    })),
    ...missingSupporting.slice(0, 2).map((skill, i) => ({
      skill: titleCase(skill),
      priority: 'Medium',
      estimated_time: `${i + 1} week`,
      expected_outcome: `Add ${skill} as a supporting skill`,
    })),
  ];

  if (roadmap.length === 0) {
    roadmap.push({
      skill: `Advanced ${found[0] ?? 'Programming'}`,
      priority: 'Medium',
      estimated_time: '3 weeks',
      expected_outcome: 'Deepen existing expertise',
    });
  }

  return {
    role_fit_score: score,
    strengths: (strengths.length > 0 ? strengths : DEFAULT_STRENGTHS).slice(0, 4),
    skill_gaps: {
      core: missingCore.slice(0, 4),
      supporting: missingSupporting.slice(0, 3),
    },
    roadmap,
    analysis_notes: `Based on resume analysis, you show ${score}% alignment with the ${targetRole} role. Focus on the identified skill gaps to improve your candidacy.`,
    reflection: {
      status: 'sufficient',
      reason: `This roadmap addresses the key gaps for ${targetRole}. Following it will significantly improve your role fit.`,
    },
    target_role: targetRole,
    demo_mode: true,
  };
}
