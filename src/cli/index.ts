#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { EXIT_CODES, getExitCodeForError, isIxrError } from '../lib/errors.js';
import { parseRecordType, type RecordType } from '../lib/records.js';
import { configCommand } from './commands/config.js';
import { fieldsCommand } from './commands/fields.js';
import { searchCommand } from './commands/search.js';
import { testConnectionCommand } from './commands/test-connection.js';
import { showConfigHelp, showFieldsHelp, showHelp, showSearchHelp, showTestConnectionHelp } from './help.js';
import { findPositional, findPositionals, getFlagValue, getOutputFormat } from './utils/args.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', '..', 'package.json');

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return 'unknown';
}

const FLAGS_WITH_VALUES = ['--type'];

function recordTypeOrExit(args: string[]): RecordType {
  const value = getFlagValue(args, '--type');
  const type = parseRecordType(value);
  if (!type) {
    console.error(`Invalid record type: ${value}`);
    console.log('Use --type device or --type vm');
    process.exit(EXIT_CODES.INVALID_ARGUMENTS);
  }
  return type;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Handle no arguments or help
  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    process.exit(EXIT_CODES.SUCCESS);
  }

  // Handle version
  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`ixr version ${readVersion()}`);
    process.exit(EXIT_CODES.SUCCESS);
  }

  const command = args[0];
  const subArgs = args.slice(1);

  // Check for verbose mode
  if (args.includes('--verbose') && process.env.IXR_DEBUG !== '1') {
    process.env.IXR_DEBUG = '1';
  }

  try {
    switch (command) {
      case 'search':
        if (args.includes('--help')) {
          showSearchHelp();
          process.exit(EXIT_CODES.SUCCESS);
        }
        await searchCommand({
          files: findPositionals(subArgs, FLAGS_WITH_VALUES),
          type: recordTypeOrExit(subArgs),
          format: getOutputFormat(subArgs),
        });
        break;

      case 'fields':
        if (args.includes('--help')) {
          showFieldsHelp();
          process.exit(EXIT_CODES.SUCCESS);
        }
        await fieldsCommand({
          file: findPositional(subArgs, FLAGS_WITH_VALUES),
          type: recordTypeOrExit(subArgs),
          format: getOutputFormat(subArgs),
        });
        break;

      case 'test-connection':
        if (args.includes('--help')) {
          showTestConnectionHelp();
          process.exit(EXIT_CODES.SUCCESS);
        }
        await testConnectionCommand({
          service: findPositional(subArgs, []),
          format: getOutputFormat(subArgs),
        });
        break;

      case 'config':
        if (args.includes('--help')) {
          showConfigHelp();
          process.exit(EXIT_CODES.SUCCESS);
        }
        await configCommand({ json: args.includes('--json') });
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.log('Run "ixr help" for usage information');
        process.exit(EXIT_CODES.INVALID_ARGUMENTS);
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
    process.exit(isIxrError(error) ? getExitCodeForError(error) : EXIT_CODES.GENERAL_ERROR);
  }
}

// Run the CLI
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.GENERAL_ERROR);
});
