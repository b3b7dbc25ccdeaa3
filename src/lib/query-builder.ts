import { resolveAttribute } from './attribute-resolver.js';
import type { SearchFieldConfig } from './config.js';

/**
 * A search term and the configured field it came from
 */
export interface ResolvedTerm {
  fieldName: string;
  value: string;
}

/**
 * Build the OR-search term set for a record.
 *
 * Only enabled fields are considered, in configured order. Comma-separated values
 * (several serial numbers in one field) become one term per part, and a value
 * already produced by an earlier field is not repeated.
 */
export function buildTerms(record: unknown, fields: readonly SearchFieldConfig[]): ResolvedTerm[] {
  const terms: ResolvedTerm[] = [];
  const seen = new Set<string>();

  for (const field of fields) {
    if (!field.enabled || !field.attribute) continue;

    const value = resolveAttribute(record, field.attribute);
    if (value === undefined) continue;

    for (const part of value.split(',')) {
      const term = part.trim();
      if (!term || seen.has(term)) continue;
      seen.add(term);
      terms.push({ fieldName: field.name, value: term });
    }
  }

  return terms;
}

/**
 * Term values in order, as passed to search services
 */
export function termValues(terms: readonly ResolvedTerm[]): string[] {
  return terms.map((term) => term.value);
}

/**
 * Deterministic signature of the enabled field set, used in cache keys
 */
export function fieldSetSignature(fields: readonly SearchFieldConfig[]): string {
  return fields
    .filter((field) => field.enabled)
    .map((field) => `${field.name}=${field.attribute}`)
    .join('|');
}

/**
 * How a configured field resolves on a record, enabled or not
 */
export interface FieldResolution {
  name: string;
  attribute: string;
  enabled: boolean;
  value: string | undefined;
}

export function describeFields(record: unknown, fields: readonly SearchFieldConfig[]): FieldResolution[] {
  return fields.map((field) => ({
    name: field.name,
    attribute: field.attribute,
    enabled: field.enabled,
    value: resolveAttribute(record, field.attribute),
  }));
}
