import type { Logger } from './logger';
import { incDiscarded } from './metrics';

export interface FilterSpec {
  /** Hostname must contain a match (search, not full match). */
  regex?: RegExp;
  minLength?: number;
  maxLength?: number;
  /** Hostname must not contain any of these, compared lowercase. */
  excludeWords?: string[];
}

type Constraint = 'regex' | 'min-length' | 'max-length' | 'exclude-words';

/** Exclude words trimmed and lowercased; blank entries would match every host, so they are dropped. */
function excludeWordList(spec: FilterSpec): string[] {
  return (spec.excludeWords ?? []).map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0);
}

export function isFilterActive(spec?: FilterSpec | null): spec is FilterSpec {
  if (!spec) return false;
  return (
    spec.regex !== undefined ||
    spec.minLength !== undefined ||
    spec.maxLength !== undefined ||
    excludeWordList(spec).length > 0
  );
}

/** First constraint `host` violates, or null when it passes all of them. */
export function failedConstraint(host: string, spec: FilterSpec): Constraint | null {
  // String#search ignores the global flag and lastIndex
  if (spec.regex && host.search(spec.regex) === -1) return 'regex';
  if (spec.minLength !== undefined && host.length < spec.minLength) return 'min-length';
  if (spec.maxLength !== undefined && host.length > spec.maxLength) return 'max-length';
  const words = excludeWordList(spec);
  if (words.length > 0) {
    const folded = host.toLowerCase();
    if (words.some((w) => folded.includes(w))) return 'exclude-words';
  }
  return null;
}

/**
 * Keep hostnames that satisfy every constraint present in `spec`, in input order.
 * Without an active spec the input is returned as is.
 */
export function filterSubdomains(hosts: readonly string[], spec?: FilterSpec | null, logger?: Logger): string[] {
  if (!isFilterActive(spec)) return [...hosts];

  logger?.info('Applying filters to subdomains');
  const kept: string[] = [];
  for (const host of hosts) {
    const failed = failedConstraint(host, spec);
    if (failed === null) {
      kept.push(host);
    } else {
      incDiscarded('filter', failed);
    }
  }
  logger?.info({ before: hosts.length, after: kept.length }, `Filtered subdomains: ${kept.length} remaining`);
  return kept;
}

/** Human readable list of the active constraints, for the console. */
export function describeFilters(spec: FilterSpec): string[] {
  const parts: string[] = [];
  if (spec.regex) parts.push(`regex=${spec.regex.source}`);
  if (spec.minLength !== undefined) parts.push(`min_length=${spec.minLength}`);
  if (spec.maxLength !== undefined) parts.push(`max_length=${spec.maxLength}`);
  const words = excludeWordList(spec);
  if (words.length > 0) parts.push(`exclude_words=${words.join(',')}`);
  return parts;
}
