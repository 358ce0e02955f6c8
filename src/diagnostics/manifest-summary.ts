import { DeepLinkInfo, ManifestInfo } from '../types.js';

export interface ManifestSummary {
  schemes: string[];
  hosts: string[];
  supportsAppLinks: boolean;
  appLinks: string[];
  customSchemeLinks: string[];
}

export function isWebScheme(scheme: string): boolean {
  const normalized = scheme.toLowerCase();
  return normalized === 'http' || normalized === 'https';
}

// Only auto-verified web links take part in domain verification
export function isAppLink(link: DeepLinkInfo): boolean {
  return isWebScheme(link.scheme) && link.autoVerify;
}

export function deepLinkPatternDescription(link: DeepLinkInfo): string {
  let path = '';
  if (link.path !== null) {
    path = link.path;
  } else if (link.pathPrefix !== null) {
    path = `${link.pathPrefix}*`;
  } else if (link.pathPattern !== null) {
    path = link.pathPattern;
  }

  return `${link.scheme}://${link.host ?? '*'}${path}`;
}

const distinct = (values: string[]): string[] => [...new Set(values)];

export function summarizeManifest(manifest: ManifestInfo): ManifestSummary {
  const { deepLinks } = manifest;
  const appLinks = deepLinks.filter(isAppLink);

  return {
    schemes: distinct(deepLinks.map(link => link.scheme)),
    hosts: distinct(deepLinks.flatMap(link => (link.host === null ? [] : [link.host]))),
    supportsAppLinks: appLinks.length > 0,
    appLinks: distinct(appLinks.map(deepLinkPatternDescription)),
    customSchemeLinks: distinct(
      deepLinks.filter(link => !isWebScheme(link.scheme)).map(deepLinkPatternDescription)
    ),
  };
}
