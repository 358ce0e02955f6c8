import { AppLink } from '../types.js';
import { stateFromLegacyStatus } from './verification-state.js';

/*
 * Parser for `dumpsys package domain-preferred-apps` (API < 31):
 *
 *   Package: com.example.app
 *   Domains: example.com www.example.com
 *   Status:  always : 200000002
 *
 * A block is emitted when its Status line is reached.
 */

interface PendingBlock {
  packageName: string | null;
  domains: string[];
}

const emptyBlock = (): PendingBlock => ({ packageName: null, domains: [] });

export function parseDomainPreferredApps(output: string): AppLink[] {
  const appLinks: AppLink[] = [];
  let pending = emptyBlock();

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line.startsWith('Package:')) {
      pending = { packageName: line.substring('Package:'.length).trim() || null, domains: [] };
    } else if (line.startsWith('Domains:')) {
      pending.domains = line
        .substring('Domains:'.length)
        .split(/\s+/)
        .filter(domain => domain.length > 0);
    } else if (line.startsWith('Status:')) {
      const state = stateFromLegacyStatus(line.substring('Status:'.length));
      const { packageName, domains } = pending;

      if (packageName && domains.length > 0) {
        appLinks.push({
          packageName,
          domains: domains.map(domain => ({ domain, state, fingerprint: null })),
        });
      }

      pending = emptyBlock();
    }
  }

  return appLinks;
}
