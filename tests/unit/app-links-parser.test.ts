import { extractSignatureFingerprint, parseAppLinks } from '../../src/diagnostics/app-links-parser';
import { parseDomainPreferredApps } from '../../src/diagnostics/domain-preferred-apps-parser';
import {
  isSuccessfulState,
  stateFromAppLinksToken,
  stateFromLegacyStatus,
} from '../../src/diagnostics/verification-state';

const getAppLinksOutput = `  com.example.app:
    ID: 6a1f0c52-3d0e-4b8e-9f6b-2a9c1d7e5b34
    Signatures: [14:6D:E9:83:C5:73:06:50]
    Domain verification state:
      example.com: verified
      www.example.com: none
      old.example.com: legacy_failure
      beta.example.com: 1024
    User 0:
      Verification link handling allowed: true
      Selection state:
        Enabled:
          example.com
  com.example.other:
    ID: 0b9d2a44-1c3e-47a2-8e1f-6d5c4b3a2f10
    Signatures: []
    Domain verification state:
      other.example.org: approved
`;

describe('parseAppLinks', () => {
  it('should parse packages, domains and the signing fingerprint', () => {
    expect(parseAppLinks(getAppLinksOutput)).toEqual([
      {
        packageName: 'com.example.app',
        domains: [
          { domain: 'example.com', state: 'VERIFIED', fingerprint: '14:6D:E9:83:C5:73:06:50' },
          { domain: 'www.example.com', state: 'UNVERIFIED', fingerprint: '14:6D:E9:83:C5:73:06:50' },
          { domain: 'old.example.com', state: 'LEGACY_FAILURE', fingerprint: '14:6D:E9:83:C5:73:06:50' },
          { domain: 'beta.example.com', state: 'UNKNOWN', fingerprint: '14:6D:E9:83:C5:73:06:50' },
        ],
      },
      {
        packageName: 'com.example.other',
        domains: [{ domain: 'other.example.org', state: 'APPROVED', fingerprint: null }],
      },
    ]);
  });

  it('should drop a package without domain lines', () => {
    const output = 'com.example.app:\n  ID: 1\n  Signatures: [AA:BB]\n  Domain verification state:\n';

    expect(parseAppLinks(output)).toEqual([]);
  });

  it('should return an empty list for empty and unrecognized input', () => {
    expect(parseAppLinks('')).toEqual([]);
    expect(parseAppLinks('error: device not found')).toEqual([]);
    expect(parseAppLinks('adb: no devices/emulators found\n\n')).toEqual([]);
  });

  it('should keep duplicate domain lines', () => {
    const output = `com.example.app:
  Domain verification state:
    example.com: verified
    example.com: verified
`;

    expect(parseAppLinks(output)[0].domains).toHaveLength(2);
  });

  it('should ignore lines that are not domain entries', () => {
    const output = `com.example.app:
  Domain verification state:
    no separator here
    : verified
    bad domain: none
    example.com: verified
`;

    expect(parseAppLinks(output)).toEqual([
      {
        packageName: 'com.example.app',
        domains: [{ domain: 'example.com', state: 'VERIFIED', fingerprint: null }],
      },
    ]);
  });

  it('should keep the domains read before output was truncated', () => {
    const output = 'com.example.app:\n  Signatures: [AA:BB]\n  Domain verification state:\n    example.com: veri';

    expect(parseAppLinks(output)).toEqual([
      {
        packageName: 'com.example.app',
        domains: [{ domain: 'example.com', state: 'UNKNOWN', fingerprint: 'AA:BB' }],
      },
    ]);
  });
});

describe('extractSignatureFingerprint', () => {
  it('should read the fingerprint of the requested package', () => {
    expect(extractSignatureFingerprint(getAppLinksOutput, 'com.example.app')).toBe('14:6D:E9:83:C5:73:06:50');
  });

  it('should read the fingerprint of a package without domains', () => {
    const output = 'com.example.app:\n  ID: 1\n  Signatures: [AA:BB]\n  Domain verification state:\n';

    expect(extractSignatureFingerprint(output, 'com.example.app')).toBe('AA:BB');
  });

  it('should return null for empty brackets or a missing package', () => {
    expect(extractSignatureFingerprint(getAppLinksOutput, 'com.example.other')).toBeNull();
    expect(extractSignatureFingerprint(getAppLinksOutput, 'com.missing')).toBeNull();
  });
});

describe('parseDomainPreferredApps', () => {
  it('should emit one entry per domain with the status state', () => {
    const output = 'Package: com.x\n  Domains: a.com b.com\n  Status: always : 2\n';

    expect(parseDomainPreferredApps(output)).toEqual([
      {
        packageName: 'com.x',
        domains: [
          { domain: 'a.com', state: 'APPROVED', fingerprint: null },
          { domain: 'b.com', state: 'APPROVED', fingerprint: null },
        ],
      },
    ]);
  });

  it('should split domains on any whitespace', () => {
    const output = 'Package: com.x\n\tDomains:\ta.com\tb.com  c.com\n\tStatus: never\n';

    expect(parseDomainPreferredApps(output)[0].domains.map(entry => entry.domain)).toEqual([
      'a.com',
      'b.com',
      'c.com',
    ]);
  });

  it('should map every status token', () => {
    const output = `App verification status:

  Package: com.a
  Domains: a.com
  Status:  never : 200000003

  Package: com.b
  Domains: b.com
  Status:  ask : 0

  Package: com.c
  Domains: c.com
  Status:  undefined

  Package: com.d
  Domains: d.com
  Status:  always-ask : 4
`;

    expect(parseDomainPreferredApps(output).map(link => [link.packageName, link.domains[0].state])).toEqual([
      ['com.a', 'DENIED'],
      ['com.b', 'UNVERIFIED'],
      ['com.c', 'LEGACY_FAILURE'],
      ['com.d', 'LEGACY_FAILURE'],
    ]);
  });

  it('should not emit a package without a Status line', () => {
    const output = 'Package: com.dangling\n  Domains: a.com\n\nPackage: com.x\n  Domains: b.com\n  Status: always : 2\n';

    expect(parseDomainPreferredApps(output).map(link => link.packageName)).toEqual(['com.x']);
  });

  it('should skip blocks without domains and return nothing for empty input', () => {
    expect(parseDomainPreferredApps('Package: com.x\n  Domains:\n  Status: always\n')).toEqual([]);
    expect(parseDomainPreferredApps('')).toEqual([]);
    expect(parseDomainPreferredApps('error: closed')).toEqual([]);
  });

  it('should preserve duplicated blocks', () => {
    const block = 'Package: com.x\n  Domains: a.com\n  Status: always : 2\n';

    expect(parseDomainPreferredApps(block + block)).toHaveLength(2);
  });
});

describe('verification states', () => {
  it('should treat only VERIFIED and APPROVED as successful', () => {
    expect(isSuccessfulState('VERIFIED')).toBe(true);
    expect(isSuccessfulState('APPROVED')).toBe(true);
    expect(isSuccessfulState('DENIED')).toBe(false);
    expect(isSuccessfulState('UNVERIFIED')).toBe(false);
    expect(isSuccessfulState('LEGACY_FAILURE')).toBe(false);
    expect(isSuccessfulState('UNKNOWN')).toBe(false);
  });

  it('should map app-links tokens case-insensitively', () => {
    expect(stateFromAppLinksToken('Verified')).toBe('VERIFIED');
    expect(stateFromAppLinksToken('denied')).toBe('DENIED');
    expect(stateFromAppLinksToken('restored')).toBe('UNKNOWN');
  });

  it('should map legacy status values by their first token', () => {
    expect(stateFromLegacyStatus(' always : 200000002')).toBe('APPROVED');
    expect(stateFromLegacyStatus('ask')).toBe('UNVERIFIED');
    expect(stateFromLegacyStatus('always-ask : 4')).toBe('LEGACY_FAILURE');
    expect(stateFromLegacyStatus('')).toBe('LEGACY_FAILURE');
  });
});
