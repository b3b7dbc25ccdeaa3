import { readFileSync } from 'node:fs';
import { Effect, pipe, Schema } from 'effect';
import { RecordError } from './errors.js';
import { runPromiseOrThrow } from './run-effect.js';

export type RecordType = 'device' | 'virtual_machine';

/**
 * A read-only inventory record (device or virtual machine) as exported by the inventory API
 */
export interface InventoryRecord {
  readonly type: RecordType;
  readonly id: string;
  readonly attributes: Readonly<Record<string, unknown>>;
}

const RecordIdentitySchema = Schema.Struct({
  id: Schema.Union(Schema.String.pipe(Schema.minLength(1)), Schema.Number),
});

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the CLI spelling of a record type; "vm" is accepted for virtual machines
 */
export function parseRecordType(value: string | undefined): RecordType | undefined {
  switch (value?.toLowerCase()) {
    case undefined:
    case 'device':
      return 'device';
    case 'vm':
    case 'virtual_machine':
    case 'virtual-machine':
      return 'virtual_machine';
    default:
      return undefined;
  }
}

/**
 * Validate a decoded JSON value as an inventory record
 */
export function parseRecordEffect(
  value: unknown,
  type: RecordType,
  source = '<input>',
): Effect.Effect<InventoryRecord, RecordError> {
  if (!isPlainObject(value)) {
    return Effect.fail(new RecordError(source, `Record in ${source} must be a JSON object`));
  }
  const attributes = value;

  return pipe(
    Schema.decodeUnknown(RecordIdentitySchema)(value),
    Effect.mapError((error) => new RecordError(source, `Record in ${source} has no usable id: ${error}`)),
    Effect.map(({ id }) => ({ type, id: String(id), attributes })),
  );
}

/**
 * Read and validate a record from a JSON file
 */
export function loadRecordFileEffect(path: string, type: RecordType): Effect.Effect<InventoryRecord, RecordError> {
  return pipe(
    Effect.try({
      try: () => readFileSync(path, 'utf-8'),
      catch: (error) => new RecordError(path, `Failed to read record file: ${error}`),
    }),
    Effect.flatMap((content) =>
      Effect.try({
        try: (): unknown => JSON.parse(content),
        catch: (error) => new RecordError(path, `Invalid JSON in record file: ${error}`),
      }),
    ),
    Effect.flatMap((value) => parseRecordEffect(value, type, path)),
  );
}

/**
 * Async wrapper for loadRecordFileEffect
 */
export async function loadRecordFile(path: string, type: RecordType): Promise<InventoryRecord> {
  return runPromiseOrThrow(loadRecordFileEffect(path, type));
}
