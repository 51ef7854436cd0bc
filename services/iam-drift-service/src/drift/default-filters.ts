/**
 * Default URI Filters
 *
 * Grants held by Google-managed service agents. Terraform never declares
 * them, so they are dropped from drift results.
 */

import defaultPatterns from './default-uri-filters.json';

export type UriFilters = readonly RegExp[];

export function compileUriFilters(patterns: readonly string[]): UriFilters {
  return Object.freeze(patterns.map(pattern => new RegExp(pattern)));
}

export const DEFAULT_URI_FILTERS: UriFilters = compileUriFilters(defaultPatterns);

export function matchesUriFilter(uri: string, filters: UriFilters): boolean {
  return filters.some(filter => filter.test(uri));
}

export function filterDefaultUris(uris: Iterable<string>, filters: UriFilters = DEFAULT_URI_FILTERS): string[] {
  return [...uris].filter(uri => !matchesUriFilter(uri, filters));
}
