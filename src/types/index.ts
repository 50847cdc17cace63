/**
 * Trackwise: Core Type Definitions
 *
 * Shared schemas for configuration, tracker records, capability results
 * and telemetry. Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 * @version 1.0.0
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// CAPABILITIES
// ═══════════════════════════════════════════════════════════════════════════

export const CapabilityNameSchema = z.enum([
  'FetchOverdueTasks',
  'FetchAllTasks',
  'ListProjects',
  'GetProjectById',
  'fallback',
]);
export type CapabilityName = z.infer<typeof CapabilityNameSchema>;

export const ArgumentKindSchema = z.enum(['assignee', 'projectId', 'none']);
export type ArgumentKind = z.infer<typeof ArgumentKindSchema>;

export const TriggerSpecificitySchema = z.enum(['specific', 'generic']);
export type TriggerSpecificity = z.infer<typeof TriggerSpecificitySchema>;

export const TriggerPhraseSchema = z.object({
  /** Keyword or phrase; `{n}` stands for a run of digits */
  phrase: z.string().min(1),
  specificity: TriggerSpecificitySchema,
});
export type TriggerPhrase = z.infer<typeof TriggerPhraseSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// TRACKER RECORDS
// ═══════════════════════════════════════════════════════════════════════════

const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const TaskRecordSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  assigned_to: z.string(),
  status: z.string(),
  due_date: z.string(),
  project_id: z.number().int().optional(),
});
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

export const ProjectRecordSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string(),
  start_date: IsoDateSchema,
  end_date: IsoDateSchema,
  status: z.string(),
  tasks: z.array(TaskRecordSchema).default([]),
});
export type ProjectRecord = z.infer<typeof ProjectRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CAPABILITY RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export type CapabilityResult =
  | { kind: 'task_list'; assignee: string; scope: 'all' | 'overdue'; tasks: TaskRecord[] }
  | { kind: 'project_list'; status: string; projects: ProjectRecord[] }
  | { kind: 'project_detail'; project: ProjectRecord }
  | { kind: 'not_found'; entity: 'project'; id: number | string }
  | { kind: 'unsupported'; message: string }
  | { kind: 'unavailable'; message: string; retryable: true };

export type CapabilityResultKind = CapabilityResult['kind'];

export const UNSUPPORTED_MESSAGE =
  "Sorry, I couldn't find a tool to help with that. Please try a different query or be more specific.";

export const UNAVAILABLE_MESSAGE =
  'The project tracker is temporarily unavailable. Please try again shortly.';

// ═══════════════════════════════════════════════════════════════════════════
// TELEMETRY
// ═══════════════════════════════════════════════════════════════════════════

export const TelemetryOutcomeSchema = z.enum(['success', 'fallback', 'error']);
export type TelemetryOutcome = z.infer<typeof TelemetryOutcomeSchema>;

export const TelemetryEventSchema = z.object({
  timestamp: z.string().datetime(),
  request_id: z.string().uuid(),
  prompt: z.string(),
  capability: CapabilityNameSchema,
  output: z.string(),
  outcome: TelemetryOutcomeSchema,
  cached: z.boolean(),
});
export type TelemetryEvent = z.infer<typeof TelemetryEventSchema>;

export const TelemetryEntrySchema = TelemetryEventSchema.extend({
  sequence: z.number().int().nonnegative(),
  prev_hash: z.string(),
  hash: z.string().regex(/^[a-f0-9]{64}$/),
});
export type TelemetryEntry = z.infer<typeof TelemetryEntrySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

export const ConfigSchema = z.object({
  tracker: z.object({
    api_root: z.string().url().default('http://localhost:8000'),
    timeout_ms: z.number().int().positive().default(5000),
  }),
  cache: z.object({
    ttl_ms: z.number().int().positive().default(600_000),
    sweep_interval_ms: z.number().int().nonnegative().default(0),
  }),
  telemetry: z.object({
    redact_prompts: z.boolean().default(false),
  }),
  renderer: z.object({
    timeout_ms: z.number().int().positive().default(5000),
  }),
  paths: z.object({
    base_dir: z.string().default('~/.trackwise'),
    telemetry_file: z.string().default('telemetry.jsonl'),
    artifact_dir: z.string().default('artifacts'),
    log_dir: z.string().default('logs'),
    config_file: z.string().default('config.json'),
  }),
  server: z.object({
    host: z.string().default('127.0.0.1'),
    port: z.number().int().min(1024).max(65535).default(8765),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE (Functional Error Handling)
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
