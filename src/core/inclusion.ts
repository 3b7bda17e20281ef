/**
 * Inclusion Resolver
 *
 * Result is (include ?? labels) minus exclude, always in the order of
 * `labels`. Exclusion wins over inclusion.
 *
 * @module core/inclusion
 */

import type { Label } from '../types/index.js';
import { ConfigurationError } from './errors.js';

function checkKnown(labels: readonly Label[], filter: readonly Label[] | null | undefined, kind: string): void {
  if (!filter) return;
  const known = new Set(labels);
  const unknown = [...new Set(filter.filter(l => !known.has(l)))];
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown component label(s) in ${kind}: ${unknown.join(', ')}`);
  }
}

/**
 * Ordered subset of component labels selected by include/exclude filters
 */
export function resolveInclusion(
  labels: readonly Label[],
  include?: readonly Label[] | null,
  exclude?: readonly Label[] | null
): Label[] {
  checkKnown(labels, include, 'include');
  checkKnown(labels, exclude, 'exclude');

  const included = include ? new Set(include) : null;
  const excluded = new Set(exclude ?? []);
  return labels.filter(l => (included === null || included.has(l)) && !excluded.has(l));
}
