import { AppLink, CommandDialect } from '../types.js';
import { escapeShellArg } from '../utils/adb.js';
import { parseAppLinks } from './app-links-parser.js';
import { parseDomainPreferredApps } from './domain-preferred-apps-parser.js';

// Android 12 replaced domain-preferred-apps with the pm *-app-links commands
export const APP_LINKS_MIN_API_LEVEL = 31;

export interface VerificationCommandStrategy {
  readonly dialect: CommandDialect;
  listVerificationCommand(packageName?: string): string;
  forceReverifyCommand(packageName: string): string;
  verificationLogFilter(): string;
  parse(output: string): AppLink[];
}

export const appLinksStrategy: VerificationCommandStrategy = {
  dialect: 'app-links',
  listVerificationCommand: packageName =>
    packageName ? `pm get-app-links ${escapeShellArg(packageName)}` : 'pm get-app-links',
  forceReverifyCommand: packageName => `pm verify-app-links --re-verify ${escapeShellArg(packageName)}`,
  verificationLogFilter: () => 'IntentFilterIntentOp:V DomainVerification:V *:S',
  parse: parseAppLinks,
};

export const domainPreferredAppsStrategy: VerificationCommandStrategy = {
  dialect: 'domain-preferred-apps',
  // grep exits 1 when nothing matches; an empty listing is not a failure
  listVerificationCommand: packageName =>
    packageName
      ? `dumpsys package domain-preferred-apps | grep -A 5 ${escapeShellArg(packageName)} || true`
      : 'dumpsys package domain-preferred-apps',
  forceReverifyCommand: packageName => `pm set-app-links --package ${escapeShellArg(packageName)} 0 all`,
  verificationLogFilter: () => 'IntentFilterIntentOp:V SingleTaskInstance:V *:S',
  parse: parseDomainPreferredApps,
};

export function selectStrategy(apiLevel: number): VerificationCommandStrategy {
  return apiLevel >= APP_LINKS_MIN_API_LEVEL ? appLinksStrategy : domainPreferredAppsStrategy;
}
