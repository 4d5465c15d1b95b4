import { z } from 'zod';

import { SEVERITIES } from '../types/violation.js';

const violationSchema = z.object({
  ruleId: z.string().min(1),
  severity: z.enum(SEVERITIES),
  message: z.string(),
  locator: z.string(),
  source: z.enum(['web', 'pdf']),
  wcag: z.array(z.string()).optional(),
  suggestion: z.string().optional(),
});

const skippedSchema = z.object({ checkId: z.string(), reason: z.string() });

const failureSchema = z.object({ code: z.string(), message: z.string() });

const targetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('web'), url: z.string() }),
  z.object({
    kind: z.enum(['pdf', 'html']),
    filename: z.string(),
    byteLength: z.number().int().nonnegative(),
    sha256: z.string(),
  }),
]);

const statusSchema = z.enum(['ok', 'partial', 'failed']);

const severityCountsSchema = z.object({
  critical: z.number().int().nonnegative(),
  serious: z.number().int().nonnegative(),
  moderate: z.number().int().nonnegative(),
  minor: z.number().int().nonnegative(),
});

/** Shape of `findings.json`. */
export const auditResultSchema = z.object({
  schemaVersion: z.literal(1),
  target: targetSchema,
  violations: z.array(violationSchema),
  score: z.number().int().min(0).max(100),
  status: statusSchema,
  startedAt: z.string(),
  finishedAt: z.string(),
  skippedChecks: z.array(skippedSchema),
  error: failureSchema.optional(),
  linkedPdfs: z.array(z.string()).optional(),
});

/** Shape of `summary.json`. */
export const runSummarySchema = z.object({
  schemaVersion: z.literal(1),
  runId: z.string(),
  kind: z.enum(['web', 'pdf', 'html']),
  targetLabel: z.string(),
  target: targetSchema,
  score: z.number().int().min(0).max(100),
  grade: z.string(),
  status: statusSchema,
  startedAt: z.string(),
  finishedAt: z.string(),
  violationCount: z.number().int().nonnegative(),
  bySeverity: severityCountsSchema,
  skippedChecks: z.array(skippedSchema),
  error: failureSchema.optional(),
  linkedPdfs: z.array(z.string()).optional(),
});
