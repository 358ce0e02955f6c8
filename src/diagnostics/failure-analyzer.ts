import {
  AssetLinksStatus,
  FailureReason,
  FingerprintComparisonResult,
  ValidationIssue,
  VerificationState,
} from '../types.js';
import { assetLinksUrl, fetchHost, normalizeDomain } from './domain.js';
import { formatFingerprint } from './fingerprint.js';
import { isSuccessfulState } from './verification-state.js';

export interface FailureAnalysis {
  reasons: FailureReason[];
  suggestions: string[];
}

/**
 * Explains why a domain failed verification. The manifest status and the
 * fingerprint comparison are examined independently, so one domain can carry
 * several reasons. A successful state is never annotated.
 */
export function analyzeFailure(
  verificationState: VerificationState,
  fingerprintResult: FingerprintComparisonResult,
  manifestStatus: AssetLinksStatus,
  packageName: string,
  domain: string,
  issues: ValidationIssue[] = []
): FailureAnalysis {
  const reasons: FailureReason[] = [];
  const suggestions: string[] = [];

  if (isSuccessfulState(verificationState)) {
    return { reasons, suggestions };
  }

  const url = assetLinksUrl(domain);
  const add = (reason: FailureReason, suggestion: string) => {
    reasons.push(reason);
    suggestions.push(suggestion);
  };

  switch (manifestStatus) {
    case 'NOT_FOUND':
      add(
        'ASSET_LINKS_MISSING',
        `Publish ${url} declaring ${packageName} and the SHA-256 fingerprint of its signing certificate.`
      );
      break;
    case 'INVALID_JSON':
      add(
        'ASSET_LINKS_INVALID_JSON',
        `Fix ${url}: it must be a JSON array of statements, each with a relation and a target carrying namespace, package_name and sha256_cert_fingerprints.`
      );
      break;
    case 'NETWORK_ERROR':
      add(
        'ASSET_LINKS_NETWORK_ERROR',
        `Make sure ${url} is reachable over HTTPS with a valid certificate and answers with HTTP 200.`
      );
      if (issues.some(issue => issue.code === 'DNS_RESOLUTION_FAILED')) {
        add('DNS_FAILURE', `The host ${fetchHost(normalizeDomain(domain))} does not resolve. Check its DNS records.`);
      }
      break;
    case 'REDIRECT':
      add(
        'ASSET_LINKS_REDIRECT',
        `Serve ${url} directly with HTTP 200. Redirects are not followed during App Links verification.`
      );
      break;
    case 'INVALID_CONTENT_TYPE':
      suggestions.push(`Serve ${url} with Content-Type: application/json.`);
      break;
    case 'FINGERPRINT_MISMATCH':
    case 'VALID':
    case 'NOT_CHECKED':
      break;
  }

  switch (fingerprintResult.kind) {
    case 'MISMATCH':
      add(
        'FINGERPRINT_MISMATCH',
        `Add ${formatFingerprint(fingerprintResult.localFingerprint)} to sha256_cert_fingerprints for ${packageName} in ${url}. Declared: ${fingerprintResult.remoteFingerprints.join(', ')}.`
      );
      break;
    case 'NO_REMOTE_FINGERPRINT':
      add(
        'PACKAGE_NOT_IN_ASSET_LINKS',
        `Add a statement for ${packageName} with the SHA-256 fingerprint of its signing certificate to ${url}.`
      );
      break;
    case 'MATCH':
    case 'NO_LOCAL_FINGERPRINT':
    case 'REMOTE_UNAVAILABLE':
      break;
  }

  if (reasons.length === 0) {
    add(
      'UNKNOWN',
      `No cause found. Run 'adb shell pm verify-app-links --re-verify ${packageName}' and check the device log for verification errors.`
    );
  }

  return { reasons, suggestions };
}
