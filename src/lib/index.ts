export { resolveAttribute } from './attribute-resolver.js';
export {
  type AggregatedResults,
  Aggregator,
  type AggregatorOptions,
  aggregateRecord,
  createAggregator,
  createServiceEntries,
  type ServiceEntry,
  type ServiceFailure,
  type ServiceSummary,
} from './aggregator.js';
export {
  type AuthConfig,
  type Config,
  type ConfigInput,
  ConfigManager,
  type ConfluenceConfig,
  DEFAULT_SEARCH_FIELDS,
  DEFAULT_VM_SEARCH_FIELDS,
  emptyConfluenceConfig,
  emptyJiraConfig,
  fieldsForRecordType,
  type JiraConfig,
  parseConfig,
  parseConfigEffect,
  redactConfig,
  type SearchFieldConfig,
} from './config.js';
export {
  checkEligibility,
  type EligibilityReason,
  isRecordEligible,
  matchesDeviceTypePattern,
  matchesDeviceTypes,
} from './eligibility.js';
export {
  type ConnectionTestReport,
  type Formatter,
  getFormatter,
  type OutputFormat,
} from './formatters.js';
export * from './errors.js';
export {
  buildTerms,
  describeFields,
  type FieldResolution,
  fieldSetSignature,
  type ResolvedTerm,
  termValues,
} from './query-builder.js';
export {
  type InventoryRecord,
  loadRecordFile,
  loadRecordFileEffect,
  parseRecordEffect,
  parseRecordType,
  type RecordType,
} from './records.js';
export {
  buildCacheKey,
  type CacheEntry,
  type CacheKeyParts,
  type CacheLookup,
  ResultCache,
} from './result-cache.js';
export * from './service-clients/index.js';
