import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { Effect, pipe, Schema } from 'effect';
import { ConfigError, FileSystemError, ParseError, ValidationError } from './errors.js';
import type { RecordType } from './records.js';
import { runPromiseOrThrow, runSyncOrThrow } from './run-effect.js';

/**
 * Schema for service base URLs; trailing slashes are stripped on decode
 */
const ServiceUrlSchema = Schema.transform(
  Schema.String.pipe(
    Schema.pattern(/^https?:\/\/\S+$/),
    Schema.annotations({
      message: () => 'URL must start with http:// or https://',
    }),
  ),
  Schema.String,
  {
    strict: true,
    decode: (url) => url.replace(/\/+$/, ''),
    encode: (url) => url,
  },
);

/**
 * A missing or empty URL leaves the service unconfigured
 */
const OptionalServiceUrl = Schema.optional(Schema.Union(Schema.Literal(''), ServiceUrlSchema));

const NonEmptyString = Schema.String.pipe(Schema.minLength(1));

/**
 * Personal access token sent as a bearer credential
 */
const TokenAuthSchema = Schema.Struct({
  type: Schema.Literal('token'),
  token: NonEmptyString,
});

/**
 * Username/password (or Cloud email/API token) sent as basic auth
 */
const BasicAuthSchema = Schema.Struct({
  type: Schema.Literal('basic'),
  username: NonEmptyString,
  password: Schema.String,
});

const AuthSchema = Schema.Union(TokenAuthSchema, BasicAuthSchema);

export type AuthConfig = Schema.Schema.Type<typeof AuthSchema>;

const MaxResultsSchema = Schema.Number.pipe(Schema.int(), Schema.between(1, 100));

const StringList = Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] });

const JiraConfigSchema = Schema.Struct({
  url: OptionalServiceUrl,
  auth: Schema.optional(AuthSchema),
  verifySsl: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  legacySsl: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  maxResults: Schema.optionalWith(MaxResultsSchema, { default: () => 10 }),
  projects: StringList,
  issueTypes: StringList,
});

export type JiraConfig = Schema.Schema.Type<typeof JiraConfigSchema>;

const ConfluenceConfigSchema = Schema.Struct({
  url: OptionalServiceUrl,
  auth: Schema.optional(AuthSchema),
  verifySsl: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  legacySsl: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  maxResults: Schema.optionalWith(MaxResultsSchema, { default: () => 10 }),
  spaces: StringList,
});

export type ConfluenceConfig = Schema.Schema.Type<typeof ConfluenceConfigSchema>;

/**
 * Defaults for a service section absent from the config file
 */
export function emptyJiraConfig(): JiraConfig {
  return Schema.decodeUnknownSync(JiraConfigSchema)({});
}

export function emptyConfluenceConfig(): ConfluenceConfig {
  return Schema.decodeUnknownSync(ConfluenceConfigSchema)({});
}

/**
 * Dotted attribute path: non-empty segments without whitespace
 */
const AttributePathSchema = Schema.String.pipe(
  Schema.pattern(/^[^.\s]+(\.[^.\s]+)*$/),
  Schema.annotations({
    message: () => 'Attribute must be a dot-separated path such as "role.name"',
  }),
);

const SearchFieldSchema = Schema.Struct({
  name: NonEmptyString,
  attribute: AttributePathSchema,
  enabled: Schema.optionalWith(Schema.Boolean, { default: () => true }),
});

export type SearchFieldConfig = Schema.Schema.Type<typeof SearchFieldSchema>;

export const DEFAULT_SEARCH_FIELDS: readonly SearchFieldConfig[] = [
  { name: 'Hostname', attribute: 'name', enabled: true },
  { name: 'Serial', attribute: 'serial', enabled: true },
  { name: 'Asset Tag', attribute: 'asset_tag', enabled: false },
  { name: 'Role', attribute: 'role.name', enabled: false },
  { name: 'Primary IP', attribute: 'primary_ip4.address', enabled: false },
];

export const DEFAULT_VM_SEARCH_FIELDS: readonly SearchFieldConfig[] = [
  { name: 'Name', attribute: 'name', enabled: true },
  { name: 'Primary IP', attribute: 'primary_ip4.address', enabled: true },
];

/**
 * Configuration schema for ixr
 */
const ConfigSchema = Schema.Struct({
  jira: Schema.optional(JiraConfigSchema),
  confluence: Schema.optional(ConfluenceConfigSchema),
  timeout: Schema.optionalWith(Schema.Number.pipe(Schema.between(5, 120)), { default: () => 30 }),
  cacheTimeout: Schema.optionalWith(Schema.Number.pipe(Schema.between(0, 3600)), { default: () => 300 }),
  searchFields: Schema.optionalWith(Schema.Array(SearchFieldSchema), { default: () => DEFAULT_SEARCH_FIELDS }),
  vmSearchFields: Schema.optionalWith(Schema.Array(SearchFieldSchema), { default: () => DEFAULT_VM_SEARCH_FIELDS }),
  deviceTypes: StringList,
});

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type ConfigInput = Schema.Schema.Encoded<typeof ConfigSchema>;

/**
 * Decode and apply defaults to raw configuration data
 */
export function parseConfigEffect(input: unknown): Effect.Effect<Config, ValidationError> {
  return Schema.decodeUnknown(ConfigSchema)(input).pipe(
    Effect.mapError((error) => new ValidationError(`Invalid config schema: ${error}`)),
  );
}

/**
 * Synchronous variant of parseConfigEffect; throws ValidationError
 */
export function parseConfig(input: unknown): Config {
  return runSyncOrThrow(parseConfigEffect(input));
}

/**
 * ConfigManager reads the ixr configuration
 * Configuration is stored in ~/.ixr/config.json unless IXR_CONFIG_PATH points elsewhere
 */
export class ConfigManager {
  private configDir: string;
  private configFile: string;

  constructor() {
    this.configDir = process.env.IXR_CONFIG_PATH ? process.env.IXR_CONFIG_PATH : join(homedir(), '.ixr');
    this.configFile = join(this.configDir, 'config.json');
  }

  /**
   * Get the path to the config file
   */
  getConfigPath(): string {
    return this.configFile;
  }

  /**
   * Check if configuration exists
   */
  hasConfig(): boolean {
    return existsSync(this.configFile);
  }

  /**
   * Effect-based configuration retrieval with detailed error handling
   */
  getConfigEffect(): Effect.Effect<Config, ConfigError | FileSystemError | ParseError | ValidationError> {
    return pipe(
      Effect.sync(() => existsSync(this.configFile)),
      Effect.flatMap(
        (fileExists): Effect.Effect<Config, ConfigError | FileSystemError | ParseError | ValidationError> => {
          if (!fileExists) {
            return Effect.fail(new ConfigError(`No configuration found at ${this.configFile}`));
          }

          return pipe(
            Effect.try({
              try: () => readFileSync(this.configFile, 'utf-8'),
              catch: (error) => new FileSystemError(`Failed to read config file: ${error}`),
            }),
            Effect.flatMap((configData) =>
              Effect.try({
                try: (): unknown => JSON.parse(configData),
                catch: (error) => new ParseError(`Invalid JSON in config file: ${error}`),
              }),
            ),
            Effect.flatMap(parseConfigEffect),
          );
        },
      ),
    );
  }

  /**
   * Async wrapper for getConfigEffect
   */
  async getConfig(): Promise<Config> {
    return runPromiseOrThrow(this.getConfigEffect());
  }
}

/**
 * Field set used for a record type
 */
export function fieldsForRecordType(config: Config, type: RecordType): readonly SearchFieldConfig[] {
  return type === 'device' ? config.searchFields : config.vmSearchFields;
}

const MASK = '********';

function redactAuth(auth: AuthConfig | undefined): AuthConfig | undefined {
  if (!auth) return undefined;
  return auth.type === 'token' ? { ...auth, token: MASK } : { ...auth, password: MASK };
}

/**
 * Copy of a configuration with credentials masked, for display
 */
export function redactConfig(config: Config): Config {
  return {
    ...config,
    jira: config.jira ? { ...config.jira, auth: redactAuth(config.jira.auth) } : undefined,
    confluence: config.confluence ? { ...config.confluence, auth: redactAuth(config.confluence.auth) } : undefined,
  };
}
