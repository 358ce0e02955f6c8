import { URL } from 'url';

const WELL_KNOWN_PATH = '/.well-known/assetlinks.json';
const HOST_PATTERN = /^(?:\*\.)?[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*$/;

function hostOf(input: string): string {
  return input.split(/[/?#]/)[0];
}

// Accepts a bare host or any URL on the host; only the host name is kept
export function normalizeDomain(input: string): string {
  const trimmed = input.trim();

  if (/^https?:\/\//i.test(trimmed)) {
    try {
      return new URL(trimmed).hostname;
    } catch {
      return hostOf(trimmed.replace(/^https?:\/\//i, '')).trim();
    }
  }

  return hostOf(trimmed).trim();
}

export function isCheckableDomain(domain: string): boolean {
  return HOST_PATTERN.test(domain);
}

// Wildcard hosts are verified against their base host
export function fetchHost(domain: string): string {
  return domain.startsWith('*.') ? domain.slice(2) : domain;
}

export function assetLinksUrl(domain: string): string {
  return `https://${fetchHost(normalizeDomain(domain))}${WELL_KNOWN_PATH}`;
}
