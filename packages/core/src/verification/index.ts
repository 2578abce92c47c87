export type {
  VerificationReport,
  VerificationIssue,
  VerificationOutcome,
  VerificationResult,
  VerificationClientOptions,
  IVerificationClient,
} from './verification.types';
export {
  classifyVerificationReport,
  countRuleStatuses,
  ACCEPTANCE_STATUSES,
  FAILURE_STATUSES,
} from './report_classifier';
export { OmcVerificationClient } from './verification_client';
