import chalk from 'chalk';
import { type Config, ConfigManager, parseConfig } from '../../lib/config.js';
import { ConfigError, EXIT_CODES, FileSystemError, ParseError, ValidationError } from '../../lib/errors.js';

/**
 * Load the configuration, or print the problem and exit
 */
export async function loadConfigOrExit(): Promise<Config> {
  const configManager = new ConfigManager();
  try {
    return await configManager.getConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red('Not configured.'));
      console.log(chalk.gray(`Create ${configManager.getConfigPath()} (see "ixr config --help").`));
      process.exit(EXIT_CODES.CONFIG_ERROR);
    }
    if (error instanceof ValidationError || error instanceof ParseError || error instanceof FileSystemError) {
      console.error(chalk.red(error.message));
      process.exit(EXIT_CODES.CONFIG_ERROR);
    }
    throw error;
  }
}

/**
 * Configuration when present, built-in defaults otherwise
 */
export async function loadConfigOrDefaults(): Promise<Config> {
  const configManager = new ConfigManager();
  return configManager.hasConfig() ? loadConfigOrExit() : parseConfig({});
}
