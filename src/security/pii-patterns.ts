/**
 * PII detection patterns for the response redactor.
 *
 * Order matters: emails run first so a digit-bearing local part is consumed
 * before the number patterns see it, and SSNs run before phones.
 * No replacement token contains a digit or an `@`, which keeps redaction
 * idempotent.
 *
 * @module security/pii-patterns
 */

export type PiiCategory = 'email' | 'ssn' | 'phone';

export interface PiiPattern {
  id: string;
  category: PiiCategory;
  pattern: RegExp;
  replacement: string;
  description: string;
}

export const PII_PATTERNS: readonly PiiPattern[] = [
  {
    id: 'PII-001',
    category: 'email',
    pattern: /\b[\w.+-]+@[\w-]+(?:\.[\w-]+)*\.[A-Za-z]{2,}\b/g,
    replacement: '[REDACTED_EMAIL]',
    description: 'Email address',
  },
  {
    id: 'PII-002',
    category: 'ssn',
    pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
    replacement: '[REDACTED_SSN]',
    description: 'US social security number (ddd-dd-dddd)',
  },
  {
    id: 'PII-003',
    category: 'phone',
    pattern: /(?<![\w+(])(?:\+?1[\s.-]?)?(?:\(\d{3}\)\s?|\d{3}[\s.-]?)\d{3}[\s.-]?\d{4}(?!\w)/g,
    replacement: '[REDACTED_PHONE]',
    description: 'North American phone number, bare ten digits or separated',
  },
];
