import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { CareerAnalysis } from '../agents/types.js';
import logger from './logger.js';

export type AuditAction = 'UPLOAD_RESUME' | 'GENERATE_COVER_LETTER';

const AnalysisRecordSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  file_name: z.string().nullable(),
  target_role: z.string(),
  role_fit_score: z.number(),
  demo_mode: z.boolean(),
  strengths: z.array(z.string()),
  skill_gaps: z.object({ core: z.array(z.string()), supporting: z.array(z.string()) }),
  created_at: z.string(),
});

const AuditLogRecordSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  action: z.string(),
  details: z.string(),
  created_at: z.string(),
});

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;
export type AuditLogRecord = z.infer<typeof AuditLogRecordSchema>;

/** Per-user analysis history and audit trail. */
export interface AnalysisRepository {
  saveAnalysis(userId: string, fileName: string | null, analysis: CareerAnalysis): Promise<void>;
  listAnalyses(userId: string, limit: number): Promise<AnalysisRecord[]>;
  recordAudit(userId: string, action: AuditAction, details: string): Promise<void>;
  listAuditLogs(userId: string, limit: number): Promise<AuditLogRecord[]>;
}

export class SupabaseAnalysisRepository implements AnalysisRepository {
  constructor(private readonly client: SupabaseClient) {}

  async saveAnalysis(userId: string, fileName: string | null, analysis: CareerAnalysis): Promise<void> {
    const { error } = await this.client.from('analyses').insert({
      user_id: userId,
      file_name: fileName,
      target_role: analysis.target_role,
      role_fit_score: analysis.role_fit_score,
      demo_mode: analysis.demo_mode,
      strengths: analysis.strengths,
      skill_gaps: analysis.skill_gaps,
      roadmap: analysis.roadmap,
    });
    if (error) throw new Error(`Failed to save analysis: ${error.message}`);
  }

  async listAnalyses(userId: string, limit: number): Promise<AnalysisRecord[]> {
    const { data, error } = await this.client
      .from('analyses')
      .select('id, user_id, file_name, target_role, role_fit_score, demo_mode, strengths, skill_gaps, created_at')
      .eq('user_id', userId)
      .order('created_at', { ascending: false })
      .limit(limit);
    if (error) throw new Error(`Failed to load analyses: ${error.message}`);
    return z.array(AnalysisRecordSchema).parse(data ?? []);
  }

  async recordAudit(userId: string, action: AuditAction, details: string): Promise<void> {
    const { error } = await this.client.from('audit_logs').insert({ user_id: userId, action, details });
    if (error) throw new Error(`Failed to write audit log: ${error.message}`);
  }

  async listAuditLogs(userId: string, limit: number): Promise<AuditLogRecord[]> {
    const { data, error } = await this.client
      .from('audit_logs')
      .select('id, user_id, action, details, created_at')
      .eq('user_id', userId)
      .order('created_at', { ascending: false })
      .limit(limit);
    if (error) throw new Error(`Failed to load audit logs: ${error.message}`);
    return z.array(AuditLogRecordSchema).parse(data ?? []);
  }
}

/** Writes an audit entry. Failures are logged and never reach the caller. */
export async function logAction(
  repository: AnalysisRepository,
  userId: string,
  action: AuditAction,
  details = '',
): Promise<void> {
  try {
    await repository.recordAudit(userId, action, details);
  } catch (err) {
    logger.warn({ userId, action, error: err instanceof Error ? err.message : String(err) }, 'Could not write audit log');
  }
}
