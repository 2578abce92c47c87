import type { Logger } from '../logger';

/**
 * Report returned by the OMC checking service.
 * Both parts are optional; a report with neither is indeterminate.
 */
export type VerificationReport = {
  /** Rule name to the status the rule reported. */
  summary?: Record<string, string>;
  issues?: VerificationIssue[];
};

export type VerificationIssue = {
  rule?: string;
  status?: string;
  message: string;
};

export type VerificationOutcome = 'success' | 'failure' | 'indeterminate' | 'success_with_notes';

export type VerificationResult = {
  outcome: VerificationOutcome;
  report: VerificationReport;
  /** Rule statuses tallied by lower-cased status. */
  statusCounts: Partial<Record<string, number>>;
};

export type VerificationClientOptions = {
  timeoutMs?: number;
  fieldName?: string;
  logger?: Logger;
};

export interface IVerificationClient {
  verify(serializedDocument: string, fileName: string): Promise<VerificationResult>;
}
