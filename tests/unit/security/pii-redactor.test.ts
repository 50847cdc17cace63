import { describe, it, expect } from 'vitest';
import { redact, redactResult, scanPii } from '../../../src/security/pii-redactor.js';
import type { CapabilityResult } from '../../../src/types/index.js';

describe('redact', () => {
  it('should redact email addresses', () => {
    expect(redact('mail bob@example.com today')).toBe('mail [REDACTED_EMAIL] today');
    expect(redact('cc first.last+ops@mail.example.org')).toBe('cc [REDACTED_EMAIL]');
  });

  it('should redact social security numbers', () => {
    expect(redact('SSN 123-45-6789 on file')).toBe('SSN [REDACTED_SSN] on file');
  });

  it('should redact phone numbers in common formats', () => {
    expect(redact('call (555) 123-4567')).toBe('call [REDACTED_PHONE]');
    expect(redact('call 555.123.4567 now')).toBe('call [REDACTED_PHONE] now');
    expect(redact('Call +1 555 123 4567')).toBe('Call [REDACTED_PHONE]');
  });

  it('should leave dates and short numbers alone', () => {
    const text = 'Task 12 due 2026-03-01 in project 4';
    expect(redact(text)).toBe(text);
  });

  it('should redact several categories in one string', () => {
    expect(redact('bob@example.com / 555-123-4567 / 123-45-6789')).toBe(
      '[REDACTED_EMAIL] / [REDACTED_PHONE] / [REDACTED_SSN]'
    );
  });

  it('should be idempotent', () => {
    const samples = [
      'reach alice@example.com or (555) 123-4567',
      'SSN 123-45-6789, backup 555.987.6543',
      'nothing sensitive here',
    ];

    for (const sample of samples) {
      const once = redact(sample);
      expect(redact(once)).toBe(once);
    }
  });
});

describe('scanPii', () => {
  it('should report categories in pattern order', () => {
    expect(scanPii('reach bob@example.com or 555-123-4567')).toEqual({
      clean: false,
      categories: ['email', 'phone'],
    });
  });

  it('should report clean text', () => {
    expect(scanPii('show project 2')).toEqual({ clean: true, categories: [] });
  });

  it('should give the same answer when called repeatedly', () => {
    const text = 'mail bob@example.com';
    expect(scanPii(text)).toEqual(scanPii(text));
  });
});

describe('redactResult', () => {
  it('should redact free-text fields of tasks', () => {
    const result: CapabilityResult = {
      kind: 'task_list',
      assignee: 'Alice',
      scope: 'all',
      tasks: [
        { id: 3, title: 'Email bob@example.com the plan', assigned_to: 'Alice', status: 'pending', due_date: '2026-03-01' },
      ],
    };

    expect(redactResult(result)).toEqual({
      ...result,
      tasks: [
        { id: 3, title: 'Email [REDACTED_EMAIL] the plan', assigned_to: 'Alice', status: 'pending', due_date: '2026-03-01' },
      ],
    });
  });

  it('should redact project descriptions and nested tasks', () => {
    const result: CapabilityResult = {
      kind: 'project_detail',
      project: {
        id: 2,
        name: 'Apollo',
        description: 'Owner phone 555-123-4567',
        start_date: '2026-01-01',
        end_date: '2026-06-30',
        status: 'active',
        tasks: [{ id: 1, title: 'Verify 123-45-6789', assigned_to: 'Bob', status: 'pending', due_date: '2026-02-01' }],
      },
    };

    const redacted = redactResult(result);

    expect(redacted.kind).toBe('project_detail');
    if (redacted.kind !== 'project_detail') return;
    expect(redacted.project.description).toBe('Owner phone [REDACTED_PHONE]');
    expect(redacted.project.tasks[0].title).toBe('Verify [REDACTED_SSN]');
    expect(redacted.project.start_date).toBe('2026-01-01');
  });

  it('should not mutate its input', () => {
    const result: CapabilityResult = {
      kind: 'project_list',
      status: 'active',
      projects: [
        {
          id: 1,
          name: 'Apollo',
          description: 'Contact ops@example.com',
          start_date: '2026-01-01',
          end_date: '2026-06-30',
          status: 'active',
          tasks: [],
        },
      ],
    };

    redactResult(result);

    expect(result.projects[0].description).toBe('Contact ops@example.com');
  });

  it('should pass not_found through unchanged', () => {
    const result: CapabilityResult = { kind: 'not_found', entity: 'project', id: 9 };
    expect(redactResult(result)).toBe(result);
  });
});
