import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { listKnownRoles } from '../agents/demo-analysis.js';
import { runAnalysis } from '../agents/pipeline.js';
import { buildAnalysisReport } from '../agents/report.js';
import { generateCoverLetter } from '../agents/cover-letter.js';
import { generateResumeQuestions, getInterviewTips, getRoleQuestions } from '../agents/interview-questions.js';
import { generateJobStrategy, getJobSearchLinks, getJobTips } from '../agents/job-search.js';
import type { AnalysisRepository } from '../lib/analysis-store.js';
import { logAction } from '../lib/analysis-store.js';
import { parseJsonBodyWithLimit, parseMultipartUpload } from '../lib/http-body-guard.js';
import type { LlmExecutor } from '../lib/llm-executor.js';
import { buildCoverLetterFilename, buildReportFilename, renderAnalysisReport, renderCoverLetterPdf } from '../lib/report-pdf.js';
import { ResumeExtractionError, type ResumeTextExtractor } from '../lib/resume-text.js';
import type { SessionData, SessionStore } from '../lib/session-store.js';
import { buildSheetsData } from '../lib/sheets-export.js';
import type { AuthMiddleware } from '../middleware/auth.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';

const ANALYZE_LIMIT_PER_MINUTE = 5;
const COVER_LETTER_LIMIT_PER_MINUTE = 10;
const MAX_COVER_LETTER_BODY_BYTES = 64 * 1024;

const targetRoleSchema = z.string().trim().min(1, 'target_role is required').max(100);

const coverLetterSchema = z.object({
  candidate_name: z.string().trim().max(120).optional().transform((v) => v || 'Candidate'),
  company_name: z.string().trim().min(1).max(200),
  position: z.string().trim().min(1).max(200),
  job_description: z.string().max(20_000).default(''),
});

export interface AnalysisRouteDeps {
  executor: LlmExecutor;
  sessions: SessionStore;
  extractText: ResumeTextExtractor;
  repository: AnalysisRepository | null;
  auth: AuthMiddleware;
  maxResumeUploadBytes: number;
  trustProxy: boolean;
  now?: () => Date;
}

type AnalyzedSession = SessionData & { analysis: NonNullable<SessionData['analysis']>; resumeText: string };

function hasAnalysis(session: SessionData | null): session is AnalyzedSession {
  return session !== null && session.analysis !== null && session.resumeText !== null;
}

function noAnalysis(c: Context) {
  return c.json({ error: 'No analysis in this session' }, 404);
}

function pdfResponse(c: Context, body: ArrayBuffer, filename: string) {
  return c.body(body, 200, {
    'Content-Type': 'application/pdf',
    'Content-Disposition': `attachment; filename="${filename}"`,
  });
}

function looksLikePdfUpload(name: string, type: string): boolean {
  return name.toLowerCase().endsWith('.pdf') || type === 'application/pdf';
}

export function createAnalysisRoutes(deps: AnalysisRouteDeps) {
  const { executor, sessions, repository, auth } = deps;
  const now = deps.now ?? (() => new Date());
  const routes = new Hono();

  const currentSession = (c: Context) => sessions.get(c.get('sessionId'));

  // GET /roles — Roles with curated requirements, for the role picker
  routes.get('/roles', (c) => c.json({ roles: listKnownRoles() }));

  // POST /analyze — Upload a PDF resume and a target role, run the analysis
  routes.post(
    '/analyze',
    auth.optional,
    rateLimitMiddleware(ANALYZE_LIMIT_PER_MINUTE, 60_000, { trustProxy: deps.trustProxy }),
    async (c) => {
      const log = c.get('log');
      const upload = await parseMultipartUpload(c, 'resume', deps.maxResumeUploadBytes);
      if (!upload.ok) return upload.response;

      const role = targetRoleSchema.safeParse(upload.fields.target_role ?? upload.fields.role ?? '');
      if (!role.success) {
        return c.json({ error: 'Invalid request', details: role.error.issues }, 400);
      }

      const { file } = upload;
      if (!looksLikePdfUpload(file.name, file.type)) {
        return c.json({ error: 'Unsupported file type. Please upload a PDF resume.' }, 415);
      }

      let resumeText: string;
      try {
        resumeText = await deps.extractText(file.bytes);
      } catch (err) {
        if (err instanceof ResumeExtractionError) {
          return c.json({ error: err.message }, err.status);
        }
        throw err;
      }

      const sessionId = c.get('sessionId');
      const analysis = await runAnalysis(executor, resumeText, role.data, { sessionId });
      const report = buildAnalysisReport(analysis, now());

      const stored = sessions.update(sessionId, {
        resumeText,
        fileName: file.name,
        targetRole: role.data,
        analysis: report,
        coverLetter: null,
      });
      if (!stored) {
        log.warn({ sessionId }, 'Session expired during analysis; result not stored');
      }

      const user = c.get('user');
      if (user && repository) {
        try {
          await repository.saveAnalysis(user.id, file.name, analysis);
        } catch (err) {
          log.error({ userId: user.id, error: err instanceof Error ? err.message : String(err) }, 'Failed to save analysis history');
        }
        await logAction(repository, user.id, 'UPLOAD_RESUME', file.name);
      }

      log.info({
        targetRole: role.data,
        score: analysis.role_fit_score,
        demoMode: analysis.demo_mode,
        chars: resumeText.length,
      }, 'Resume analysed');
      return c.json(report);
    },
  );

  // GET /analysis — The current session's analysis
  routes.get('/analysis', (c) => {
    const session = currentSession(c);
    if (!hasAnalysis(session)) return noAnalysis(c);
    return c.json(session.analysis);
  });

  // GET /analysis/report — Analysis as a PDF download
  routes.get('/analysis/report', (c) => {
    const session = currentSession(c);
    if (!hasAnalysis(session)) return noAnalysis(c);
    const generatedAt = now();
    const pdf = renderAnalysisReport(session.analysis, generatedAt);
    return pdfResponse(c, pdf, buildReportFilename(session.analysis.target_role, generatedAt));
  });

  // GET /analysis/sheets-data — Tab-separated export for pasting into a spreadsheet
  routes.get('/analysis/sheets-data', (c) => {
    const session = currentSession(c);
    if (!hasAnalysis(session)) return noAnalysis(c);
    return c.json(buildSheetsData(session.analysis, now()));
  });

  // GET /interview — Role question bank plus questions personalised to the resume
  routes.get('/interview', async (c) => {
    const session = currentSession(c);
    if (!hasAnalysis(session)) return noAnalysis(c);
    const { analysis, resumeText } = session;

    const personalised = await generateResumeQuestions(
      executor,
      resumeText,
      analysis.target_role,
      analysis.strengths,
      analysis.skill_gaps,
    );
    const bank = getRoleQuestions(analysis.target_role);

    return c.json({
      target_role: analysis.target_role,
      technical: bank.technical,
      behavioral: bank.behavioral,
      resume_questions: personalised.questions,
      llm_powered: personalised.llm_powered,
      tips: getInterviewTips(),
    });
  });

  // GET /jobs — Job board links, tips and a personalised search strategy
  routes.get('/jobs', async (c) => {
    const session = currentSession(c);
    if (!hasAnalysis(session)) return noAnalysis(c);
    const { analysis, resumeText } = session;

    const strategy = await generateJobStrategy(
      executor,
      resumeText,
      analysis.target_role,
      analysis.strengths,
      analysis.skill_gaps,
    );

    return c.json({
      target_role: analysis.target_role,
      job_links: getJobSearchLinks(analysis.target_role),
      tips: getJobTips(analysis.target_role),
      strategy,
    });
  });

  // POST /cover-letter — Generate a cover letter from the session's resume
  routes.post(
    '/cover-letter',
    auth.optional,
    rateLimitMiddleware(COVER_LETTER_LIMIT_PER_MINUTE, 60_000, { trustProxy: deps.trustProxy }),
    async (c) => {
      const session = currentSession(c);
      if (!hasAnalysis(session)) return noAnalysis(c);

      const body = await parseJsonBodyWithLimit(c, MAX_COVER_LETTER_BODY_BYTES);
      if (!body.ok) return body.response;

      const parsed = coverLetterSchema.safeParse(body.data);
      if (!parsed.success) {
        return c.json({ error: 'Invalid request', details: parsed.error.issues }, 400);
      }

      const letter = await generateCoverLetter(executor, {
        resumeText: session.resumeText,
        jobDescription: parsed.data.job_description,
        companyName: parsed.data.company_name,
        position: parsed.data.position,
        candidateName: parsed.data.candidate_name,
      });
      sessions.update(c.get('sessionId'), { coverLetter: letter });

      const user = c.get('user');
      if (user && repository) {
        await logAction(repository, user.id, 'GENERATE_COVER_LETTER', `${letter.company} - ${letter.position}`);
      }

      return c.json(letter);
    },
  );

  // GET /cover-letter/pdf — The last generated cover letter as a PDF download
  routes.get('/cover-letter/pdf', (c) => {
    const session = currentSession(c);
    if (!session?.coverLetter) {
      return c.json({ error: 'No cover letter in this session' }, 404);
    }
    const letter = session.coverLetter;
    return pdfResponse(c, renderCoverLetterPdf(letter), buildCoverLetterFilename(letter.company, letter.position));
  });

  return routes;
}
