import type { VerificationOutcome, VerificationReport } from './verification.types';
import { countBy } from '../utils/object_utils';

export const ACCEPTANCE_STATUSES: ReadonlySet<string> = new Set(['pass', 'passed', 'ok', 'valid', 'success']);
export const FAILURE_STATUSES: ReadonlySet<string> = new Set(['fail', 'failed', 'error', 'invalid']);

/**
 * Tallies rule statuses (lower-cased) from the summary and the issues.
 */
export function countRuleStatuses(report: VerificationReport): Partial<Record<string, number>> {
  const statuses = [
    ...Object.values(report.summary ?? {}),
    ...(report.issues ?? []).map(issue => issue.status),
  ];
  return countBy(statuses, status => status?.trim().toLowerCase());
}

/**
 * Classifies a checking-service report.
 *
 * - indeterminate: no summary entries and no issues
 * - failure: any rule reports a failure status
 * - success: every summary status is an acceptance status and there are no issues
 * - success_with_notes: anything else (warnings, skipped rules, informational issues)
 */
export function classifyVerificationReport(report: VerificationReport): VerificationOutcome {
  const summaryStatuses = Object.values(report.summary ?? {}).map(status => status.trim().toLowerCase());
  const issues = report.issues ?? [];

  if (summaryStatuses.length === 0 && issues.length === 0) {
    return 'indeterminate';
  }

  const issueStatuses = issues
    .map(issue => issue.status?.trim().toLowerCase())
    .filter((status): status is string => status !== undefined);

  if ([...summaryStatuses, ...issueStatuses].some(status => FAILURE_STATUSES.has(status))) {
    return 'failure';
  }

  if (issues.length === 0 && summaryStatuses.every(status => ACCEPTANCE_STATUSES.has(status))) {
    return 'success';
  }

  return 'success_with_notes';
}
