import { VerificationState } from '../types.js';

export function isSuccessfulState(state: VerificationState): boolean {
  return state === 'VERIFIED' || state === 'APPROVED';
}

// Tokens printed by `pm get-app-links`
export function stateFromAppLinksToken(token: string): VerificationState {
  switch (token.trim().toLowerCase()) {
    case 'verified':
      return 'VERIFIED';
    case 'approved':
      return 'APPROVED';
    case 'denied':
      return 'DENIED';
    case 'none':
      return 'UNVERIFIED';
    case 'legacy_failure':
      return 'LEGACY_FAILURE';
    default:
      return 'UNKNOWN';
  }
}

// `Status:` values printed by `dumpsys package domain-preferred-apps`, e.g. "always : 200000002"
export function stateFromLegacyStatus(status: string): VerificationState {
  const token = status.trim().toLowerCase().split(/[\s:]+/)[0];

  switch (token) {
    case 'always':
      return 'APPROVED';
    case 'never':
      return 'DENIED';
    case 'ask':
      return 'UNVERIFIED';
    default:
      return 'LEGACY_FAILURE';
  }
}
