import {
  AssetLinksStatus,
  DomainDiagnosticResult,
  DomainVerification,
  FingerprintComparisonResult,
  OperationCancelledError,
  Outcome,
  ValidationIssue,
  VerificationDiagnostics,
} from '../types.js';
import { CommandTransport } from '../utils/adb.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { AppLinksService } from './app-links-service.js';
import { AssetLinksValidator } from './asset-links-validator.js';
import { CertificateInspector } from './certificate-inspector.js';
import { isCheckableDomain } from './domain.js';
import { analyzeFailure } from './failure-analyzer.js';
import { compareFingerprints } from './fingerprint.js';
import { isSuccessfulState } from './verification-state.js';

export interface DiagnosticsServiceDependencies {
  commands: CommandTransport;
  validator: AssetLinksValidator;
  certificates: CertificateInspector;
  logger?: Logger;
}

const CANCELLED = Symbol('cancelled');

// Resolves to CANCELLED as soon as the signal aborts; the pending work is left to settle on its own
function unlessAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T | typeof CANCELLED> {
  if (!signal) {
    return work;
  }
  if (signal.aborted) {
    return Promise.resolve(CANCELLED);
  }

  return new Promise<T | typeof CANCELLED>((resolve, reject) => {
    const onAbort = () => resolve(CANCELLED);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      error => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class DiagnosticsService {
  private readonly appLinks: AppLinksService;
  private readonly validator: AssetLinksValidator;
  private readonly certificates: CertificateInspector;
  private readonly logger: Logger;

  constructor(dependencies: DiagnosticsServiceDependencies) {
    this.appLinks = new AppLinksService(dependencies.commands);
    this.validator = dependencies.validator;
    this.certificates = dependencies.certificates;
    this.logger = dependencies.logger ?? silentLogger;
  }

  async diagnose(
    deviceSerial: string,
    packageName: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<Outcome<VerificationDiagnostics>> {
    const { signal } = options;
    const cancelled = (): Outcome<VerificationDiagnostics> => ({
      success: false,
      error: new OperationCancelledError(`Diagnostics for ${packageName}`),
    });

    if (signal?.aborted) {
      return cancelled();
    }

    const listing = await this.appLinks.getAppLinks(deviceSerial, { packageName, signal });
    if (!listing.success) {
      return listing;
    }

    const { apiLevel, dialect, appLinks } = listing.value;
    this.logger.debug('Selected verification command dialect', { deviceSerial, apiLevel, dialect });

    const domains = appLinks.flatMap(link => link.domains);
    const localFingerprint = await this.localFingerprint(deviceSerial, packageName, domains, signal);
    if (signal?.aborted) {
      return cancelled();
    }

    const results = await unlessAborted(
      Promise.all(domains.map(entry => this.diagnoseDomain(entry, packageName, localFingerprint, signal))),
      signal
    );
    if (results === CANCELLED) {
      return cancelled();
    }

    const verifiedDomains = results.filter(result => isSuccessfulState(result.verificationState)).length;

    return {
      success: true,
      value: {
        packageName,
        deviceSerial,
        apiLevel,
        dialect,
        localFingerprint,
        domainResults: results,
        totalDomains: results.length,
        verifiedDomains,
        failedDomains: results.length - verifiedDomains,
      },
    };
  }

  // The inspector is authoritative; the listing's Signatures line is the fallback
  private async localFingerprint(
    deviceSerial: string,
    packageName: string,
    domains: DomainVerification[],
    signal?: AbortSignal
  ): Promise<string | null> {
    let inspected: string | null = null;

    try {
      inspected = await this.certificates.getLocalFingerprint(deviceSerial, packageName, signal);
    } catch (error) {
      this.logger.warn('Certificate inspection failed', {
        packageName,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return inspected ?? domains.find(entry => entry.fingerprint !== null)?.fingerprint ?? null;
  }

  private async diagnoseDomain(
    entry: DomainVerification,
    packageName: string,
    localFingerprint: string | null,
    signal?: AbortSignal
  ): Promise<DomainDiagnosticResult> {
    let assetLinksStatus: AssetLinksStatus = 'NOT_CHECKED';
    let issues: ValidationIssue[] = [];
    let fingerprintComparison: FingerprintComparisonResult;

    if (isCheckableDomain(entry.domain)) {
      const validation = await this.validator.validate(entry.domain, {
        signal,
        packageName,
        expectedFingerprint: localFingerprint ?? undefined,
      });
      assetLinksStatus = validation.status;
      issues = validation.issues;
      fingerprintComparison = compareFingerprints(localFingerprint, packageName, validation.content);
    } else {
      fingerprintComparison = compareFingerprints(localFingerprint, packageName, null);
    }

    const analysis = analyzeFailure(
      entry.state,
      fingerprintComparison,
      assetLinksStatus,
      packageName,
      entry.domain,
      issues
    );

    this.logger.debug('Diagnosed domain', {
      domain: entry.domain,
      state: entry.state,
      assetLinksStatus,
      reasons: analysis.reasons,
    });

    return {
      domain: entry.domain,
      verificationState: entry.state,
      assetLinksStatus,
      fingerprintComparison,
      failureReasons: analysis.reasons,
      suggestions: analysis.suggestions,
    };
  }
}
