import { resolveAttribute } from './attribute-resolver.js';
import { type Config, fieldsForRecordType } from './config.js';
import { buildTerms } from './query-builder.js';
import type { InventoryRecord } from './records.js';

/**
 * Match a device-type pattern against a manufacturer slug or name.
 * Patterns are case-insensitive regular expressions; an invalid pattern is
 * treated as a plain substring.
 */
export function matchesDeviceTypePattern(pattern: string, candidates: readonly string[]): boolean {
  const needle = pattern.toLowerCase();
  let regex: RegExp | undefined;
  try {
    regex = new RegExp(needle);
  } catch {
    regex = undefined;
  }

  return candidates.some((candidate) => {
    const haystack = candidate.toLowerCase();
    return regex ? regex.test(haystack) : haystack.includes(needle);
  });
}

/**
 * Whether a device's manufacturer passes the configured deviceTypes filter.
 * Virtual machines and an empty filter always pass.
 */
export function matchesDeviceTypes(record: InventoryRecord, deviceTypes: readonly string[]): boolean {
  if (record.type !== 'device' || deviceTypes.length === 0) return true;
  // Records exported without a device type are not filtered
  if (record.attributes.device_type === undefined || record.attributes.device_type === null) return true;

  const candidates = [
    resolveAttribute(record.attributes, 'device_type.manufacturer.slug') ?? '',
    resolveAttribute(record.attributes, 'device_type.manufacturer.name') ?? '',
  ];

  return deviceTypes.some((pattern) => matchesDeviceTypePattern(pattern, candidates));
}

export type EligibilityReason = 'eligible' | 'device-type' | 'no-terms';

/**
 * Decide whether related issues and pages should be looked up for a record
 */
export function checkEligibility(record: InventoryRecord, config: Config): EligibilityReason {
  if (!matchesDeviceTypes(record, config.deviceTypes)) return 'device-type';
  if (buildTerms(record.attributes, fieldsForRecordType(config, record.type)).length === 0) return 'no-terms';
  return 'eligible';
}

export function isRecordEligible(record: InventoryRecord, config: Config): boolean {
  return checkEligibility(record, config) === 'eligible';
}
