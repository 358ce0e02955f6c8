import { DeepLinkEvent, LogEntry, LogFilter, LogLevel, LogLevelSchema } from '../types.js';

export const DEFAULT_DEEP_LINK_TAGS = [
  'ActivityTaskManager',
  'IntentResolver',
  'PackageManager',
  'BrowserActivity',
  'ResolverActivity',
];

const DESCRIPTION_LIMIT = 120;

// `logcat -v time`: "10-19 12:34:56.789 I/ActivityTaskManager( 1234): START u0 {...}"
const LOG_LINE = /^(\d{2}-\d{2}\s+\d{2}:\d{2}:\d{2}\.\d+)\s+([VDIWEF])\/(.+?)\s*\(\s*\d+\):\s*(.*)$/;
const URI_FRAGMENT = /dat=([^\s}]+)/;
const COMPONENT_FRAGMENT = /cmp=([^\s}]+)/;
const ERROR_PATTERN = /error|exception|not found|permission denied/i;

const LEVEL_BY_LETTER: Record<string, LogLevel> = {
  V: 'VERBOSE',
  D: 'DEBUG',
  I: 'INFO',
  W: 'WARNING',
  E: 'ERROR',
  F: 'FATAL',
};

const LEVEL_LETTERS: Record<LogLevel, string> = {
  VERBOSE: 'V',
  DEBUG: 'D',
  INFO: 'I',
  WARNING: 'W',
  ERROR: 'E',
  FATAL: 'F',
  UNKNOWN: 'V',
};

export function defaultLogFilter(): LogFilter {
  return { tags: [...DEFAULT_DEEP_LINK_TAGS], keywords: [], minLevel: 'VERBOSE' };
}

function truncate(message: string): string {
  return message.length > DESCRIPTION_LIMIT ? message.substring(0, DESCRIPTION_LIMIT) : message;
}

export function classifyDeepLinkEvent(tag: string, message: string): DeepLinkEvent | null {
  const uri = URI_FRAGMENT.exec(message)?.[1];
  const component = COMPONENT_FRAGMENT.exec(message)?.[1];

  if (tag.includes('ActivityTaskManager') && message.includes('START')) {
    let description = 'Activity started';
    if (uri) description += ` - URI: ${uri}`;
    if (component) description += ` - Component: ${component}`;
    return { type: 'STARTED', description };
  }

  if (
    (tag.includes('IntentResolver') && message.includes('Resolv')) ||
    (tag.includes('PackageManager') && message.includes('verification'))
  ) {
    return {
      type: 'RESOLVED',
      description: uri ? `Intent resolved for: ${uri}` : `Intent resolution: ${truncate(message)}`,
    };
  }

  if (
    (tag.includes('BrowserActivity') || tag.includes('ResolverActivity')) &&
    (message.toLowerCase().includes('intent') || message.toLowerCase().includes('click'))
  ) {
    return { type: 'CLICKED', description: `Deep link clicked: ${truncate(message)}` };
  }

  if (tag.includes('ActivityTaskManager') && (message.includes('Displayed') || message.includes('RESULT'))) {
    return { type: 'RESULT', description: message.trim() };
  }

  if (ERROR_PATTERN.test(message)) {
    return { type: 'ERROR', description: message.trim() };
  }

  return null;
}

// Divider lines ("--------- beginning of main") and blank lines yield null
export function parseLogLine(line: string): LogEntry | null {
  if (!line.trim()) {
    return null;
  }

  const match = LOG_LINE.exec(line);
  if (!match) {
    if (line.startsWith('---')) {
      return null;
    }
    return { timestamp: '', level: 'UNKNOWN', tag: '', message: line.trim(), deepLinkEvent: null };
  }

  const [, timestamp, letter, rawTag, message] = match;
  const tag = rawTag.trim();

  return {
    timestamp,
    level: LEVEL_BY_LETTER[letter] ?? 'UNKNOWN',
    tag,
    message,
    deepLinkEvent: classifyDeepLinkEvent(tag, message),
  };
}

export function matchesLogFilter(entry: LogEntry, filter: LogFilter): boolean {
  const levels = LogLevelSchema.options;
  if (levels.indexOf(entry.level) < levels.indexOf(filter.minLevel)) {
    return false;
  }

  if (filter.keywords.length === 0) {
    return true;
  }

  const haystack = `${entry.tag} ${entry.message}`.toLowerCase();
  return filter.keywords.some(keyword => haystack.includes(keyword.toLowerCase()));
}

export function buildLogcatArgs(filter: LogFilter, lines: number): string[] {
  const args = ['logcat', '-d', '-v', 'time', '-t', String(lines)];

  if (filter.tags.length > 0) {
    args.push('-s', ...filter.tags.map(tag => `${tag}:${LEVEL_LETTERS[filter.minLevel]}`));
  }

  return args;
}
