import { AppLink, DomainVerification } from '../types.js';
import { stateFromAppLinksToken } from './verification-state.js';

/*
 * Parser for `pm get-app-links` (API 31+):
 *
 *   com.example.app:
 *     ID: 01234567-89ab-cdef-0123-456789abcdef
 *     Signatures: [AA:BB:...]
 *     Domain verification state:
 *       example.com: verified
 *       www.example.com: none
 *     User 0:
 *       ...
 */

const PACKAGE_LINE = /^[A-Za-z][A-Za-z0-9_]*(\.[A-Za-z][A-Za-z0-9_]*)+:$/;
const DOMAIN_SECTION_HEADER = 'Domain verification state:';

type Section = 'package' | 'domains';

interface PackageBlock {
  packageName: string;
  fingerprint: string | null;
  domains: Array<{ domain: string; token: string }>;
}

function parseSignatures(line: string): string | null {
  const value = line.substring('Signatures:'.length).replace(/[[\]]/g, '').trim();
  const first = value.split(',')[0].trim();
  return first || null;
}

function isMetadataLine(line: string): boolean {
  return line === '' || line.startsWith('ID:') || line.startsWith('Signatures:') || line.startsWith('User');
}

function parseDomainLine(line: string): { domain: string; token: string } | null {
  const separator = line.lastIndexOf(':');
  if (separator <= 0) {
    return null;
  }

  const domain = line.substring(0, separator).trim();
  if (!domain || domain.includes(' ')) {
    return null;
  }

  return { domain, token: line.substring(separator + 1).trim() };
}

function toAppLink(block: PackageBlock): AppLink {
  return {
    packageName: block.packageName,
    domains: block.domains.map(
      (entry): DomainVerification => ({
        domain: entry.domain,
        state: stateFromAppLinksToken(entry.token),
        fingerprint: block.fingerprint,
      })
    ),
  };
}

function scan(output: string, onBlock: (block: PackageBlock) => void): void {
  let current: PackageBlock | null = null;
  let section: Section = 'package';

  const flush = () => {
    if (current) onBlock(current);
    current = null;
  };

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (PACKAGE_LINE.test(line)) {
      flush();
      current = { packageName: line.slice(0, -1), fingerprint: null, domains: [] };
      section = 'package';
      continue;
    }

    if (!current) continue;

    if (line.startsWith('Signatures:')) {
      current.fingerprint = parseSignatures(line);
      section = 'package';
    } else if (line === DOMAIN_SECTION_HEADER) {
      section = 'domains';
    } else if (section === 'domains') {
      if (isMetadataLine(line)) {
        section = 'package';
        continue;
      }
      const entry = parseDomainLine(line);
      if (entry) current.domains.push(entry);
    }
  }

  flush();
}

export function parseAppLinks(output: string): AppLink[] {
  const appLinks: AppLink[] = [];

  scan(output, block => {
    if (block.domains.length > 0) {
      appLinks.push(toAppLink(block));
    }
  });

  return appLinks;
}

// Signing certificate of a package, including packages that declare no domains
export function extractSignatureFingerprint(output: string, packageName: string): string | null {
  let fingerprint: string | null = null;

  scan(output, block => {
    if (fingerprint === null && block.packageName === packageName) {
      fingerprint = block.fingerprint;
    }
  });

  return fingerprint;
}
