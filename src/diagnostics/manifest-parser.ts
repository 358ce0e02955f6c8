import { ActivityInfo, DeepLinkInfo, IntentDataInfo, IntentFilterInfo, ManifestInfo } from '../types.js';

export const ACTION_VIEW = 'android.intent.action.VIEW';
export const CATEGORY_BROWSABLE = 'android.intent.category.BROWSABLE';
export const CATEGORY_DEFAULT = 'android.intent.category.DEFAULT';

const RESOLVER_TABLE_HEADER = 'Activity Resolver Table:';
const SECTION_END_HEADERS = [
  'Receiver Resolver Table:',
  'Service Resolver Table:',
  'Provider Resolver Table:',
  'Preferred Activities',
  'Permissions:',
  'Registered ContentProviders:',
  'ContentProvider Authorities:',
  'Key Set Manager:',
  'Packages:',
];

// "        a1b2c3 com.example.app/.MainActivity filter 9f8e7d"
const ACTIVITY_LINE = /^\s+\w+\s+([A-Za-z0-9_.$]+\/[A-Za-z0-9_.$]+)\s+filter\s+(\w+)/;
const AUTHORITY_LINE = /^Authority:\s*"([^"]+)":\s*(-?\d+)/;
const PATTERN_MATCHER = /PatternMatcher\{(\w+):\s*([^}]+)\}/;

type PathKind = 'path' | 'pathPrefix' | 'pathPattern';

interface FilterBuilder {
  activityName: string;
  filterId: string;
  actions: string[];
  categories: string[];
  schemes: string[];
  authorities: Array<{ host: string; port: string | null }>;
  paths: Array<{ kind: PathKind; value: string }>;
  autoVerify: boolean;
}

function quotedValue(line: string, prefix: string): string {
  return line.substring(prefix.length).trim().replace(/^"|"$/g, '');
}

function pathKindFromMatcher(type: string): PathKind | null {
  switch (type) {
    case 'LITERAL':
      return 'path';
    case 'PREFIX':
      return 'pathPrefix';
    case 'GLOB':
    case 'ADVANCED_GLOB':
      return 'pathPattern';
    default:
      return null;
  }
}

function applyFilterLine(filter: FilterBuilder, line: string): void {
  if (line.startsWith('Action:')) {
    filter.actions.push(quotedValue(line, 'Action:'));
  } else if (line.startsWith('Category:')) {
    filter.categories.push(quotedValue(line, 'Category:'));
  } else if (line.startsWith('Scheme:')) {
    filter.schemes.push(quotedValue(line, 'Scheme:'));
  } else if (line.startsWith('Authority:')) {
    const match = AUTHORITY_LINE.exec(line);
    if (match) {
      filter.authorities.push({ host: match[1], port: match[2] === '-1' ? null : match[2] });
    }
  } else if (line.startsWith('PathPrefix:')) {
    filter.paths.push({ kind: 'pathPrefix', value: quotedValue(line, 'PathPrefix:') });
  } else if (line.startsWith('PathPattern:')) {
    filter.paths.push({ kind: 'pathPattern', value: quotedValue(line, 'PathPattern:') });
  } else if (line.startsWith('Path:')) {
    const match = PATTERN_MATCHER.exec(line);
    const kind = match ? pathKindFromMatcher(match[1]) : null;
    if (match && kind) {
      filter.paths.push({ kind, value: match[2].trim() });
    }
  } else if (/^AutoVerify\s*=\s*true/i.test(line)) {
    filter.autoVerify = true;
  }
}

function dataEntry(
  scheme: string | null,
  authority: { host: string; port: string | null } | null,
  path: { kind: PathKind; value: string } | null
): IntentDataInfo {
  return {
    scheme,
    host: authority?.host ?? null,
    port: authority?.port ?? null,
    path: path?.kind === 'path' ? path.value : null,
    pathPrefix: path?.kind === 'pathPrefix' ? path.value : null,
    pathPattern: path?.kind === 'pathPattern' ? path.value : null,
  };
}

// One entry per scheme x authority x path; a missing dimension contributes a single null
function buildData(filter: FilterBuilder): IntentDataInfo[] {
  if (filter.schemes.length === 0 && filter.authorities.length === 0 && filter.paths.length === 0) {
    return [];
  }

  const schemes = filter.schemes.length > 0 ? filter.schemes : [null];
  const authorities = filter.authorities.length > 0 ? filter.authorities : [null];
  const paths = filter.paths.length > 0 ? filter.paths : [null];

  return schemes.flatMap(scheme =>
    authorities.flatMap(authority => paths.map(path => dataEntry(scheme, authority, path)))
  );
}

function toIntentFilter(filter: FilterBuilder): IntentFilterInfo {
  return {
    actions: filter.actions,
    categories: filter.categories,
    data: buildData(filter),
    autoVerify: filter.autoVerify,
  };
}

function resolverTableLines(lines: string[]): string[] {
  const start = lines.findIndex(line => line.trim() === RESOLVER_TABLE_HEADER);
  if (start === -1) {
    return [];
  }

  const end = lines.findIndex(
    (line, index) => index > start && SECTION_END_HEADERS.some(header => line.trim().startsWith(header))
  );

  return lines.slice(start + 1, end === -1 ? lines.length : end);
}

function isFilterContentLine(line: string): boolean {
  return line.startsWith('          ') || line.startsWith('\t');
}

function isDeepLinkFilter(filter: IntentFilterInfo): boolean {
  return (
    filter.actions.includes(ACTION_VIEW) &&
    filter.categories.includes(CATEGORY_BROWSABLE) &&
    filter.categories.includes(CATEGORY_DEFAULT)
  );
}

export function extractDeepLinks(activities: ActivityInfo[]): DeepLinkInfo[] {
  const deepLinks: DeepLinkInfo[] = [];

  for (const activity of activities) {
    for (const filter of activity.intentFilters.filter(isDeepLinkFilter)) {
      for (const data of filter.data) {
        if (data.scheme === null) continue;
        deepLinks.push({
          scheme: data.scheme,
          host: data.host,
          path: data.path,
          pathPrefix: data.pathPrefix,
          pathPattern: data.pathPattern,
          activityName: activity.name,
          autoVerify: filter.autoVerify,
        });
      }
    }
  }

  return deepLinks;
}

/**
 * Parses `dumpsys package <pkg>` output into the package's activities and
 * deep links. The resolver table prints a filter once per scheme it handles,
 * so filters are folded by their identifier.
 */
export function parseManifest(packageName: string, dumpText: string): ManifestInfo {
  const lines = dumpText.split(/\r?\n/);
  const versionName = /versionName=(\S+)/.exec(dumpText);
  const versionCode = /versionCode=(\d+)/.exec(dumpText);

  const activities = new Map<string, { filterIds: Set<string>; intentFilters: IntentFilterInfo[] }>();
  let current: FilterBuilder | null = null;

  const flush = (filter: FilterBuilder | null) => {
    if (!filter) return;

    const activity = activities.get(filter.activityName) ?? { filterIds: new Set<string>(), intentFilters: [] };
    activities.set(filter.activityName, activity);

    if (!activity.filterIds.has(filter.filterId)) {
      activity.filterIds.add(filter.filterId);
      activity.intentFilters.push(toIntentFilter(filter));
    }
  };

  for (const line of resolverTableLines(lines)) {
    const activityMatch = ACTIVITY_LINE.exec(line);
    if (activityMatch) {
      flush(current);
      current = {
        activityName: activityMatch[1],
        filterId: activityMatch[2],
        actions: [],
        categories: [],
        schemes: [],
        authorities: [],
        paths: [],
        autoVerify: false,
      };
    } else if (!line.trim()) {
      continue;
    } else if (current && isFilterContentLine(line)) {
      applyFilterLine(current, line.trim());
    } else {
      flush(current);
      current = null;
    }
  }
  flush(current);

  const activityInfos: ActivityInfo[] = [...activities.entries()].map(([name, activity]) => ({
    name,
    intentFilters: activity.intentFilters,
  }));

  return {
    packageName,
    versionName: versionName ? versionName[1] : null,
    versionCode: versionCode ? Number.parseInt(versionCode[1], 10) : null,
    activities: activityInfos,
    deepLinks: extractDeepLinks(activityInfos),
  };
}
