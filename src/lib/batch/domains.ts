import { hostOf } from '../utils.js';

export const DEFAULT_PRIMARY_DOMAIN_SUFFIX = 'asimov.academy';

/**
 * Collapses every host ending in `suffix` into the suffix itself so that all
 * subdomains of one organisation share a report group. Other hosts are
 * returned unchanged.
 */
export function primaryDomain(
  host: string,
  suffix: string = DEFAULT_PRIMARY_DOMAIN_SUFFIX,
): string {
  if (suffix && host.endsWith(suffix)) {
    return suffix;
  }
  return host;
}

export function primaryDomainOfUrl(
  url: string,
  suffix: string = DEFAULT_PRIMARY_DOMAIN_SUFFIX,
): string {
  return primaryDomain(hostOf(url), suffix);
}

/**
 * Orders URLs by (primary domain, url) so progress output is grouped by site.
 */
export function sortWorkItems(
  urls: readonly string[],
  suffix: string = DEFAULT_PRIMARY_DOMAIN_SUFFIX,
): string[] {
  return urls
    .map((url) => ({ url, domain: primaryDomainOfUrl(url, suffix) }))
    .sort(
      (a, b) =>
        compareStrings(a.domain, b.domain) || compareStrings(a.url, b.url),
    )
    .map(({ url }) => url);
}

// Code-unit ordering, independent of the runtime locale
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
