import type { CapabilityResult, ProjectRecord, TaskRecord } from '../types/index.js';
import { PII_PATTERNS, type PiiCategory } from './pii-patterns.js';
export { PII_PATTERNS };

export interface PiiScanResult {
  clean: boolean;
  categories: PiiCategory[];
}

/**
 * Replace every email, SSN and phone number in a string with its category
 * token. Pure and idempotent.
 *
 * @example
 * redact('mail bob@example.com') // 'mail [REDACTED_EMAIL]'
 */
export function redact(text: string): string {
  let result = text;
  for (const piiPattern of PII_PATTERNS) {
    result = result.replace(piiPattern.pattern, piiPattern.replacement);
  }
  return result;
}

/**
 * Report which PII categories occur in a string without modifying it
 */
export function scanPii(text: string): PiiScanResult {
  const categories: PiiCategory[] = [];
  for (const piiPattern of PII_PATTERNS) {
    // search() ignores lastIndex, so the shared global regexes stay stateless
    if (text.search(piiPattern.pattern) !== -1 && !categories.includes(piiPattern.category)) {
      categories.push(piiPattern.category);
    }
  }
  return { clean: categories.length === 0, categories };
}

// ── Record redaction ─────────────────────────────────────────────────────────
// Free-text fields are redacted one by one; ids, statuses and dates pass
// through untouched.

export function redactTask(task: TaskRecord): TaskRecord {
  return {
    ...task,
    title: redact(task.title),
    assigned_to: redact(task.assigned_to),
  };
}

export function redactProject(project: ProjectRecord): ProjectRecord {
  return {
    ...project,
    name: redact(project.name),
    description: redact(project.description),
    tasks: project.tasks.map(redactTask),
  };
}

export function redactResult(result: CapabilityResult): CapabilityResult {
  switch (result.kind) {
    case 'task_list':
      return { ...result, assignee: redact(result.assignee), tasks: result.tasks.map(redactTask) };
    case 'project_list':
      return { ...result, projects: result.projects.map(redactProject) };
    case 'project_detail':
      return { ...result, project: redactProject(result.project) };
    case 'unsupported':
    case 'unavailable':
      return { ...result, message: redact(result.message) };
    case 'not_found':
      return result;
  }
}
