/**
 * Session Types — wire shapes of the interactive and judge operations,
 * shared by the gateway and its clients.
 */

import { z } from 'zod';

// ─── Interactive sessions ────────────────────────────────────

export const StepResultSchema = z.object({
  sessionId: z.string(),
  output: z.string(),
  /** Still running and the last drain ended on quiescence. */
  waiting: z.boolean(),
  /** The process has exited; the session is gone. */
  finished: z.boolean(),
  error: z.string().optional(),
});

export type StepResult = z.infer<typeof StepResultSchema>;

export const KillResultSchema = z.object({
  message: z.string(),
});

export type KillResult = z.infer<typeof KillResultSchema>;

export const SessionSummarySchema = z.object({
  id: z.string(),
  command: z.string(),
  pid: z.number().int(),
  createdAt: z.number(),
  lastActivity: z.number(),
  interpreterMode: z.boolean(),
});

export type SessionSummary = z.infer<typeof SessionSummarySchema>;

export const SessionListSchema = z.object({
  sessions: z.array(SessionSummarySchema),
});

// ─── Judge ───────────────────────────────────────────────────

export const JudgeResultSchema = z.object({
  success: z.boolean(),
  /** Rendered transcript, one `user:` or `program:` entry per line. */
  log: z.string(),
  error: z.string().optional(),
  runId: z.string().optional(),
  exitCode: z.number().int().optional(),
  logPath: z.string().optional(),
});

export type JudgeResult = z.infer<typeof JudgeResultSchema>;

// ─── Health ──────────────────────────────────────────────────

export const HealthStatusSchema = z.object({
  status: z.enum(['ok', 'error']),
  version: z.string(),
  uptime: z.number(),
  sessions: z.number().int(),
});

export type HealthStatus = z.infer<typeof HealthStatusSchema>;

// ─── Errors ──────────────────────────────────────────────────

export const ErrorBodySchema = z.object({
  error: z.string(),
  message: z.string(),
  statusCode: z.number().int(),
});
