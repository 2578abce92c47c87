import type {
  IVerificationClient,
  VerificationClientOptions,
  VerificationResult
} from './verification.types';
import { VerificationError, describeCause, isErrorLike } from '../errors';
import { isVerificationReport, validateVerificationReportDetailed } from '../validation';
import { classifyVerificationReport, countRuleStatuses } from './report_classifier';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_FIELD_NAME = 'file';

/**
 * HTTP client for an OMC checking service.
 *
 * Submits the serialized document as a single multipart file and classifies
 * the JSON report. There is no retry; every failure surfaces as a
 * VerificationError and the submitted document is never modified.
 */
export class OmcVerificationClient implements IVerificationClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fieldName: string;
  private readonly logger: Logger;

  constructor(endpoint: string, options: VerificationClientOptions = {}) {
    this.endpoint = endpoint;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fieldName = options.fieldName ?? DEFAULT_FIELD_NAME;
    this.logger = options.logger ?? createLogger('[Verification] ');
  }

  async verify(serializedDocument: string, fileName: string): Promise<VerificationResult> {
    const form = new FormData();
    form.append(this.fieldName, new Blob([serializedDocument], { type: 'application/json' }), fileName);

    this.logger.debug(`Submitting ${fileName} to ${this.endpoint}`);

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = isErrorLike(error) && error.name === 'TimeoutError'
        ? `no response within ${this.timeoutMs}ms`
        : describeCause(error);
      throw new VerificationError(`${this.endpoint}: ${reason}`, 'NETWORK_ERROR');
    }

    if (!response.ok) {
      throw new VerificationError(`${this.endpoint} answered ${response.status} ${response.statusText}`, 'HTTP_ERROR');
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new VerificationError(
        `report is not JSON: ${describeCause(error)}`,
        'MALFORMED_REPORT'
      );
    }

    if (!isVerificationReport(body)) {
      const { errors } = validateVerificationReportDetailed(body);
      const details = errors.map(issue => `${issue.field}: ${issue.message}`).join(', ');
      throw new VerificationError(`unexpected report shape (${details})`, 'MALFORMED_REPORT');
    }

    const outcome = classifyVerificationReport(body);
    this.logger.debug(`Report classified as ${outcome}`);

    return {
      outcome,
      report: body,
      statusCounts: countRuleStatuses(body),
    };
  }
}
