import {
  AssetLinksContent,
  AssetLinksStatus,
  AssetLinksValidation,
  IssueCode,
  ValidationIssue,
  ValidationStatus,
} from '../types.js';
import { FetchFailureReason, FetchOutcome, HttpResponse, NetworkTransport } from '../utils/http.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { hasErrorIssues, parseAssetLinks } from './asset-links-parser.js';
import { canonicalizeFingerprint, fingerprintsForPackage } from './fingerprint.js';
import { assetLinksUrl, isCheckableDomain, normalizeDomain } from './domain.js';

export interface ValidateOptions {
  signal?: AbortSignal;
  packageName?: string;
  expectedFingerprint?: string;
}

const FAILURE_ISSUE_CODES: Record<FetchFailureReason, IssueCode> = {
  timeout: 'NETWORK_TIMEOUT',
  tls: 'SSL_ERROR',
  dns: 'DNS_RESOLUTION_FAILED',
  cancelled: 'NETWORK_ERROR',
  network: 'NETWORK_ERROR',
};

function declaresFingerprint(content: AssetLinksContent, packageName: string, fingerprint: string): boolean {
  const expected = canonicalizeFingerprint(fingerprint);
  return fingerprintsForPackage(content, packageName).some(
    declared => canonicalizeFingerprint(declared) === expected
  );
}

export class AssetLinksValidator {
  constructor(
    private readonly network: NetworkTransport,
    private readonly logger: Logger = silentLogger
  ) {}

  async validate(domain: string, options: ValidateOptions = {}): Promise<AssetLinksValidation> {
    const normalized = normalizeDomain(domain);
    const url = assetLinksUrl(normalized);

    if (!isCheckableDomain(normalized)) {
      return this.result(normalized, url, 'NOT_CHECKED', [
        { severity: 'ERROR', code: 'INVALID_DOMAIN', message: `Not a host name: ${domain.trim()}` },
      ]);
    }

    let outcome: FetchOutcome;
    try {
      outcome = await this.network.fetch(url, { signal: options.signal });
    } catch (error) {
      outcome = {
        kind: 'failure',
        reason: 'network',
        message: error instanceof Error ? error.message : String(error),
      };
    }

    if (outcome.kind === 'failure') {
      this.logger.debug('assetlinks.json fetch failed', { url, reason: outcome.reason });
      return this.result(normalized, url, 'NETWORK_ERROR', [
        { severity: 'ERROR', code: FAILURE_ISSUE_CODES[outcome.reason], message: outcome.message },
      ]);
    }

    const { response } = outcome;
    if (response.status === 200) {
      return this.validateDocument(normalized, url, response, options);
    }

    if (response.status === 404) {
      return this.result(normalized, url, 'NOT_FOUND', [
        { severity: 'ERROR', code: 'FILE_NOT_FOUND', message: `assetlinks.json not found at ${url}` },
      ]);
    }

    if (response.status >= 300 && response.status < 400) {
      const location = response.headers['location'];
      return this.result(normalized, url, 'REDIRECT', [
        {
          severity: 'ERROR',
          code: 'REDIRECT_DETECTED',
          message: `assetlinks.json is served through a redirect (HTTP ${response.status})`,
          details: location ? `Location: ${location}` : 'No Location header',
        },
      ]);
    }

    return this.result(normalized, url, 'NETWORK_ERROR', [
      { severity: 'ERROR', code: 'NETWORK_ERROR', message: `HTTP error: ${response.status}` },
    ]);
  }

  private validateDocument(
    domain: string,
    url: string,
    response: HttpResponse,
    options: ValidateOptions
  ): AssetLinksValidation {
    const issues: ValidationIssue[] = [];
    const contentType = response.headers['content-type'] ?? '';
    const wrongContentType = !contentType.toLowerCase().includes('application/json');

    if (wrongContentType) {
      issues.push({
        severity: 'WARNING',
        code: 'WRONG_CONTENT_TYPE',
        message: 'assetlinks.json must be served with Content-Type: application/json',
        details: contentType || 'No Content-Type header',
      });
    }

    const parsed = parseAssetLinks(response.body);
    issues.push(...parsed.issues);

    if (parsed.kind === 'error') {
      return this.result(domain, url, 'INVALID_JSON', issues, null, response.body);
    }

    const { packageName, expectedFingerprint } = options;
    let status: ValidationStatus = 'VALID';

    if (hasErrorIssues(issues)) {
      status = 'INVALID_JSON';
    } else if (wrongContentType) {
      status = 'INVALID_CONTENT_TYPE';
    } else if (
      packageName &&
      expectedFingerprint &&
      !declaresFingerprint(parsed.content, packageName, expectedFingerprint)
    ) {
      issues.push({
        severity: 'ERROR',
        code: 'FINGERPRINT_NOT_DECLARED',
        message: `Fingerprint is not declared for ${packageName}`,
        details: expectedFingerprint,
      });
      status = 'FINGERPRINT_MISMATCH';
    }

    return this.result(domain, url, status, issues, parsed.content, response.body);
  }

  private result(
    domain: string,
    url: string,
    status: AssetLinksStatus,
    issues: ValidationIssue[],
    content: AssetLinksContent | null = null,
    rawJson: string | null = null
  ): AssetLinksValidation {
    return { domain, url, status, issues, content, rawJson };
  }
}
