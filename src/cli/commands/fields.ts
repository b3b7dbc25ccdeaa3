import chalk from 'chalk';
import { fieldsForRecordType } from '../../lib/config.js';
import { EXIT_CODES, RecordError } from '../../lib/errors.js';
import { getFormatter, type OutputFormat } from '../../lib/formatters.js';
import { describeFields } from '../../lib/query-builder.js';
import { loadRecordFile, type RecordType } from '../../lib/records.js';
import { loadConfigOrDefaults } from '../utils/load-config.js';

export interface FieldsCommandOptions {
  file?: string;
  type: RecordType;
  format: OutputFormat;
}

/**
 * Fields command - shows how each configured search field resolves on a record
 */
export async function fieldsCommand(options: FieldsCommandOptions): Promise<void> {
  if (!options.file) {
    console.error(chalk.red('A record file is required.'));
    console.log(chalk.gray('Usage: ixr fields <record.json> [--type device|vm]'));
    process.exit(EXIT_CODES.INVALID_ARGUMENTS);
  }

  const config = await loadConfigOrDefaults();

  try {
    const record = await loadRecordFile(options.file, options.type);
    const fields = describeFields(record.attributes, fieldsForRecordType(config, record.type));
    console.log(getFormatter(options.format).formatFields(record, fields));
  } catch (error) {
    if (error instanceof RecordError) {
      console.error(chalk.red(error.message));
      process.exit(EXIT_CODES.RECORD_ERROR);
    }
    throw error;
  }
}
