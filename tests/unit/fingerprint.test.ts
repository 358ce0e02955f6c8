import {
  canonicalizeFingerprint,
  compareFingerprints,
  formatFingerprint,
  isFingerprintMatch,
  isSha256Fingerprint,
} from '../../src/diagnostics/fingerprint';
import { AssetLinksContent } from '../../src/types';
import { fingerprint, otherFingerprint } from '../mocks/adb.mock';

const content = (packageName: string, fingerprints: string[]): AssetLinksContent => ({
  statements: [
    {
      relation: ['delegate_permission/common.handle_all_urls'],
      target: { namespace: 'android_app', packageName, sha256CertFingerprints: fingerprints },
    },
  ],
});

describe('canonicalizeFingerprint', () => {
  it('should ignore case and separators', () => {
    expect(canonicalizeFingerprint('ab:cd:ef')).toBe('ABCDEF');
    expect(canonicalizeFingerprint('ABCDEF')).toBe('ABCDEF');
  });

  it('should be idempotent', () => {
    const once = canonicalizeFingerprint(fingerprint.toLowerCase());

    expect(canonicalizeFingerprint(once)).toBe(once);
  });

  it('should format canonical values with separators', () => {
    expect(formatFingerprint('abcdef')).toBe('AB:CD:EF');
    expect(formatFingerprint(fingerprint.replace(/:/g, ''))).toBe(fingerprint);
  });

  it('should recognise SHA-256 fingerprints', () => {
    expect(isSha256Fingerprint(fingerprint)).toBe(true);
    expect(isSha256Fingerprint('AB:CD')).toBe(false);
    expect(isSha256Fingerprint(`${fingerprint.slice(0, -2)}ZZ`)).toBe(false);
  });
});

describe('compareFingerprints', () => {
  it('should report a missing local fingerprint first', () => {
    expect(compareFingerprints(null, 'com.example.app', content('com.example.app', [fingerprint]))).toEqual({
      kind: 'NO_LOCAL_FINGERPRINT',
    });
    expect(compareFingerprints(null, 'com.example.app', null)).toEqual({ kind: 'NO_LOCAL_FINGERPRINT' });
  });

  it('should report unavailable remote content', () => {
    expect(compareFingerprints(fingerprint, 'com.example.app', null)).toEqual({ kind: 'REMOTE_UNAVAILABLE' });
  });

  it('should report a package the manifest does not declare', () => {
    expect(compareFingerprints(fingerprint, 'com.example.app', content('com.example.other', [fingerprint]))).toEqual({
      kind: 'NO_REMOTE_FINGERPRINT',
    });
  });

  it('should match regardless of encoding', () => {
    const compactLower = fingerprint.replace(/:/g, '').toLowerCase();
    const result = compareFingerprints(compactLower, 'com.example.app', content('com.example.app', [otherFingerprint, fingerprint]));

    expect(result).toEqual({ kind: 'MATCH' });
    expect(isFingerprintMatch(result)).toBe(true);
  });

  it('should carry the original values on mismatch', () => {
    const local = fingerprint.toLowerCase();
    const result = compareFingerprints(local, 'com.example.app', content('com.example.app', [otherFingerprint]));

    expect(result).toEqual({ kind: 'MISMATCH', localFingerprint: local, remoteFingerprints: [otherFingerprint] });
    expect(isFingerprintMatch(result)).toBe(false);
  });
});
