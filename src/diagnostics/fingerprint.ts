import { AssetLinksContent, FingerprintComparisonResult } from '../types.js';

export function canonicalizeFingerprint(fingerprint: string): string {
  return fingerprint.trim().toUpperCase().replace(/:/g, '');
}

// AA:BB:CC... form used by keytool and the Play Console
export function formatFingerprint(fingerprint: string): string {
  const canonical = canonicalizeFingerprint(fingerprint);
  return canonical.match(/.{1,2}/g)?.join(':') ?? canonical;
}

export function isSha256Fingerprint(fingerprint: string): boolean {
  return /^[0-9A-F]{64}$/.test(canonicalizeFingerprint(fingerprint));
}

export function fingerprintsForPackage(content: AssetLinksContent, packageName: string): string[] {
  return content.statements
    .filter(statement => statement.target.packageName === packageName)
    .flatMap(statement => statement.target.sha256CertFingerprints);
}

export function compareFingerprints(
  localFingerprint: string | null,
  packageName: string,
  content: AssetLinksContent | null
): FingerprintComparisonResult {
  if (!localFingerprint) {
    return { kind: 'NO_LOCAL_FINGERPRINT' };
  }

  if (!content) {
    return { kind: 'REMOTE_UNAVAILABLE' };
  }

  const remoteFingerprints = fingerprintsForPackage(content, packageName);
  if (remoteFingerprints.length === 0) {
    return { kind: 'NO_REMOTE_FINGERPRINT' };
  }

  const local = canonicalizeFingerprint(localFingerprint);
  if (remoteFingerprints.some(remote => canonicalizeFingerprint(remote) === local)) {
    return { kind: 'MATCH' };
  }

  return { kind: 'MISMATCH', localFingerprint, remoteFingerprints };
}

export function isFingerprintMatch(result: FingerprintComparisonResult): boolean {
  return result.kind === 'MATCH';
}
