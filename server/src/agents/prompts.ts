/**
 * Prompt templates for the career analysis agents.
 *
 * Every analysis step asks for raw JSON; the decoder rejects anything else,
 * so the shape shown in each prompt is the shape its zod schema accepts.
 */

export const SYSTEM_PROMPT = `You are an autonomous career analysis agent.
Analyze a resume against a target job role.
Identify strengths, skill gaps, and generate a realistic learning roadmap.
Do NOT rewrite the resume.
Do NOT invent experience.
Return clean JSON only.`;

const RAW_JSON = 'Return a JSON object with the following structure (no markdown, just raw JSON):';

// ─── Analysis pipeline ───────────────────────────────────────────────

export function buildResumeUnderstandingPrompt(resumeText: string): string {
  return `Analyze the following resume and extract key information.

RESUME:
${resumeText}

${RAW_JSON}
{
  "skills": ["list of technical and soft skills found"],
  "education_level": "highest education level (e.g., Bachelor's, Master's, PhD, High School)",
  "experience_level": "entry/junior/mid/senior based on years and roles",
  "strengths": ["key strengths identified from the resume"]
}`;
}

export interface RoleFitPromptInput {
  skills: string[];
  educationLevel: string;
  experienceLevel: string;
  strengths: string[];
  targetRole: string;
}

export function buildRoleFitPrompt(input: RoleFitPromptInput): string {
  return `Based on the resume summary and target job role, analyze the candidate's fit.

RESUME SUMMARY:
Skills: ${input.skills.join(', ')}
Education: ${input.educationLevel}
Experience Level: ${input.experienceLevel}
Strengths: ${input.strengths.join(', ')}

TARGET ROLE: ${input.targetRole}

${RAW_JSON}
{
  "role_fit_score": <number from 0-100>,
  "missing_core_skills": ["essential skills for this role that are missing"],
  "missing_supporting_skills": ["nice-to-have skills that are missing"],
  "analysis_notes": "brief explanation of the score and fit assessment"
}`;
}

export function buildRoadmapPrompt(missingCore: string[], missingSupporting: string[], targetRole: string): string {
  return `Create a personalized learning roadmap based on the missing skills.

MISSING CORE SKILLS: ${missingCore.join(', ')}
MISSING SUPPORTING SKILLS: ${missingSupporting.join(', ')}
TARGET ROLE: ${targetRole}

${RAW_JSON}
{
  "roadmap": [
    {
      "skill": "skill name",
      "priority": "High | Medium | Low",
      "estimated_time": "e.g., 2 weeks, 1 month",
      "expected_outcome": "what the candidate will be able to do after learning this"
    }
  ]
}

Order the roadmap by priority (High first, then Medium, then Low).
Include 3-6 items maximum.`;
}

export function buildReflectionPrompt(roleFitScore: number, roadmapCount: number, targetRole: string): string {
  return `Review the analysis and roadmap to determine if the guidance is sufficient.

ROLE FIT SCORE: ${roleFitScore}
LEARNING ROADMAP ITEMS: ${roadmapCount}
TARGET ROLE: ${targetRole}

${RAW_JSON}
{
  "status": "sufficient",
  "reason": "brief explanation of why this guidance is enough for the candidate"
}`;
}

// ─── Cover letter ────────────────────────────────────────────────────

export const COVER_LETTER_SYSTEM_PROMPT = `You are an expert cover letter writer. Write compelling, personalized cover letters
that highlight specific projects, skills, and achievements from the candidate's resume.
Be professional but engaging. Always reference specific details from the resume.`;

export interface CoverLetterPromptInput {
  candidateName: string;
  companyName: string;
  position: string;
  jobDescription: string;
  resumeText: string;
}

export function buildCoverLetterPrompt(input: CoverLetterPromptInput): string {
  return `Write a detailed cover letter for ${input.candidateName} applying to ${input.companyName} for the ${input.position} role.

RESUME:
${input.resumeText.slice(0, 5000)}

JOB DESCRIPTION:
${input.jobDescription.slice(0, 2000)}

Write a 4-5 paragraph cover letter that:
1. Opens with enthusiasm for the ${input.position} role at ${input.companyName}
2. Highlights 2-3 SPECIFIC projects by name with technologies used
3. Mentions relevant technical skills and experience
4. References any notable achievements
5. Closes with a call to action

IMPORTANT:
- Use ONLY information from the resume above
- Mention specific project names
- Include specific technologies
- Do NOT use placeholder text

Write the cover letter now:`;
}

// ─── Interview questions ─────────────────────────────────────────────

export const INTERVIEW_SYSTEM_PROMPT = `You are an experienced technical interviewer.
Write interview questions grounded in the candidate's actual resume.
Always respond with valid JSON only. No markdown formatting.`;

export function buildInterviewPrompt(resumeText: string, targetRole: string, coreGaps: string[]): string {
  const gaps = coreGaps.length > 0 ? `\nSKILL GAPS: ${coreGaps.join(', ')}\n` : '';
  return `Write 6 interview questions a hiring manager for a ${targetRole} role would ask this candidate.

RESUME:
${resumeText.slice(0, 4000)}
${gaps}
Return a JSON object with this EXACT structure:
{
  "questions": [
    {
      "question": "a question that references a specific project, skill or experience from the resume",
      "tip": "how the candidate should approach the answer",
      "difficulty": "Easy | Medium | Hard"
    }
  ]
}`;
}

// ─── Job search strategy ─────────────────────────────────────────────

export const JOB_STRATEGY_SYSTEM_PROMPT = `You are an expert career coach and job search strategist.
Analyze the candidate's resume and provide highly personalized job search advice.
Always respond with valid JSON only. No markdown formatting.`;

export function buildJobStrategyPrompt(
  resumeText: string,
  targetRole: string,
  strengths: string[],
  skillGaps: { core: string[]; supporting: string[] } | null,
): string {
  const context = [
    strengths.length > 0 ? `STRENGTHS: ${strengths.join('; ')}` : '',
    skillGaps ? `SKILL GAPS: ${JSON.stringify(skillGaps)}` : '',
  ].filter(Boolean).join('\n');

  return `Based on this resume, create a personalized job search strategy for a ${targetRole} role.

RESUME:
${resumeText.slice(0, 4000)}

${context}

Return a JSON object with this EXACT structure:
{
  "alternative_titles": ["5-6 alternative job titles this candidate should also search for"],
  "elevator_pitch": "A 2-3 sentence personalized elevator pitch referencing SPECIFIC projects and skills from the resume",
  "top_selling_points": [
    { "point": "a specific selling point from the resume", "how_to_use": "how to present it in applications and interviews" }
  ],
  "target_companies": [
    { "type": "type of company", "why": "why it would value this background", "examples": "2-3 example companies" }
  ],
  "resume_keywords": ["8-10 keywords from the resume that match common ${targetRole} postings"],
  "networking_tips": ["3 specific networking suggestions"],
  "application_strategy": {
    "customize_for": "what to customize for each application",
    "highlight_project": "which project to lead with and why",
    "address_gaps": "how to address skill gaps positively"
  }
}

Make everything SPECIFIC to this candidate's actual resume content. Do NOT give generic advice.`;
}
