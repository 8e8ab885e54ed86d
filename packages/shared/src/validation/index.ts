/**
 * Attestation Business Rules
 *
 * Rules run in a fixed order and each adds at most one issue. A rule whose
 * input is missing (or cannot be read as a date) is skipped: unknown data
 * does not fail a document by itself.
 */

import { differenceInCalendarDays, format, isValid, parse } from 'date-fns';
import { logger } from '../logger';
import { getMessage } from '../messages';
import type { ExtractedAttestation, Language, ValidationIssue, ValidationRule } from '../types';

export interface ValidationOptions {
  /** Reference "today"; defaults to the current time */
  now?: Date;
}

const DATE_FORMATS = [
  'yyyy-MM-dd',
  'dd-MM-yyyy',
  'dd/MM/yyyy',
  'dd.MM.yyyy',
  'd-M-yyyy',
  'd/M/yyyy',
  // two-digit years land in 1950-2049
  'dd-MM-yy',
  'dd/MM/yy',
  'dd.MM.yy',
];

/** `yyyy` also takes one to three digits; such years are not real document dates. */
const MIN_DOCUMENT_YEAR = 1900;

const DISPLAY_DATE_FORMAT = 'dd-MM-yyyy';

/**
 * Parse a document date. ISO timestamps keep their calendar date.
 */
export function parseDocumentDate(value: string | null | undefined): Date | null {
  if (!value) return null;

  const trimmed = value.trim();
  const candidate = /^\d{4}-\d{2}-\d{2}T/.test(trimmed) ? trimmed.slice(0, 10) : trimmed;

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(candidate, pattern, new Date(2000, 0, 1));
    if (isValid(parsed) && parsed.getFullYear() >= MIN_DOCUMENT_YEAR) return parsed;
  }

  logger.warn('Could not parse document date', { value: trimmed });
  return null;
}

export function formatDisplayDate(date: Date): string {
  return format(date, DISPLAY_DATE_FORMAT);
}

function isInFuture(date: Date, now: Date): boolean {
  return differenceInCalendarDays(date, now) > 0;
}

function futureDateIssue(rule: ValidationRule, date: Date | null, now: Date): ValidationIssue | null {
  if (!date || !isInFuture(date, now)) return null;
  return { rule, date: formatDisplayDate(date) };
}

/**
 * Evaluate every rule against an attestation, in evaluation order.
 */
export function validateAttestation(
  attestation: ExtractedAttestation,
  options: ValidationOptions = {}
): ValidationIssue[] {
  const now = options.now ?? new Date();
  const issues: ValidationIssue[] = [];

  const startDate = parseDocumentDate(attestation.incapacity.start_date);
  const endDate = parseDocumentDate(attestation.incapacity.end_date);
  const certificateDate = parseDocumentDate(attestation.certificate_date);

  if (!attestation.has_signature) {
    issues.push({ rule: 'signature_missing' });
  }

  const checks = [
    futureDateIssue('start_date_future', startDate, now),
    futureDateIssue('end_date_future', endDate, now),
    startDate && endDate && differenceInCalendarDays(endDate, startDate) < 0
      ? { rule: 'end_before_start' as const, date: formatDisplayDate(endDate) }
      : null,
    futureDateIssue('certificate_date_future', certificateDate, now),
  ];

  for (const issue of checks) {
    if (issue) issues.push(issue);
  }

  logger.info('Validated attestation rules', {
    issue_count: issues.length,
    rules: issues.map((issue) => issue.rule),
  });

  return issues;
}

const RULE_MESSAGES = {
  signature_missing: 'validation_signature_missing',
  start_date_future: 'validation_start_date_future',
  end_date_future: 'validation_end_date_future',
  end_before_start: 'validation_end_before_start',
  certificate_date_future: 'validation_cert_date_future',
} as const satisfies Record<ValidationRule, string>;

/**
 * Render issues as display text in the requested language.
 */
export function renderValidationIssues(issues: readonly ValidationIssue[], language: Language): string[] {
  return issues.map((issue) =>
    getMessage(RULE_MESSAGES[issue.rule], language, issue.date ? { date: issue.date } : {})
  );
}
