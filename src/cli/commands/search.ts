/**
 * ixr search command - Find issues and pages related to inventory records
 */

import chalk from 'chalk';
import ora from 'ora';
import { aggregateRecord, createAggregator } from '../../lib/aggregator.js';
import { checkEligibility } from '../../lib/eligibility.js';
import { EXIT_CODES, RecordError } from '../../lib/errors.js';
import { getFormatter, type OutputFormat } from '../../lib/formatters.js';
import { warn } from '../../lib/logger.js';
import { type InventoryRecord, loadRecordFile, type RecordType } from '../../lib/records.js';
import { loadConfigOrExit } from '../utils/load-config.js';

export interface SearchCommandOptions {
  /** Record JSON files */
  files: string[];
  /** Record type of every file */
  type: RecordType;
  format: OutputFormat;
}

/**
 * Search command entry point
 */
export async function searchCommand(options: SearchCommandOptions): Promise<void> {
  if (options.files.length === 0) {
    console.error(chalk.red('At least one record file is required.'));
    console.log(chalk.gray('Usage: ixr search <record.json> [--type device|vm]'));
    process.exit(EXIT_CODES.INVALID_ARGUMENTS);
  }

  const config = await loadConfigOrExit();
  const formatter = getFormatter(options.format);
  // One aggregator for the whole run so repeated records hit the cache
  const aggregator = createAggregator(config);

  if (!aggregator.hasConfiguredServices) {
    warn('No services configured. Set a "url" in the "jira" or "confluence" section of the config file.');
  }

  const outputs: string[] = [];
  let failed = false;

  for (const file of options.files) {
    let record: InventoryRecord;
    try {
      record = await loadRecordFile(file, options.type);
    } catch (error) {
      if (error instanceof RecordError) {
        console.error(chalk.red(error.message));
        failed = true;
        continue;
      }
      throw error;
    }

    if (checkEligibility(record, config) === 'device-type') {
      outputs.push(formatter.formatSkipped(record, 'manufacturer does not match the configured device types'));
      continue;
    }

    const spinner = options.format === 'human' ? ora(`Searching for ${file}...`).start() : null;
    const results = await aggregateRecord(aggregator, record, config);
    spinner?.stop();

    outputs.push(formatter.formatResults(record, results));
  }

  if (options.format === 'json' && outputs.length > 1) {
    console.log(`[\n${outputs.join(',\n')}\n]`);
  } else if (outputs.length > 0) {
    console.log(outputs.join('\n\n'));
  }

  if (failed) {
    process.exit(EXIT_CODES.RECORD_ERROR);
  }
}
