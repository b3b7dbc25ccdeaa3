import chalk from 'chalk';
import { ConfigManager, redactConfig } from '../../lib/config.js';
import { loadConfigOrExit } from '../utils/load-config.js';

export interface ConfigCommandOptions {
  json?: boolean;
}

/**
 * Config command - shows the active configuration with credentials masked
 */
export async function configCommand(options: ConfigCommandOptions = {}): Promise<void> {
  const configManager = new ConfigManager();
  const config = redactConfig(await loadConfigOrExit());

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log(chalk.bold('Configuration:'), chalk.gray(configManager.getConfigPath()));
  console.log('');

  for (const [label, service] of [
    ['Jira', config.jira],
    ['Confluence', config.confluence],
  ] as const) {
    if (!service?.url) {
      console.log(`${label}: ${chalk.gray('not configured')}`);
      continue;
    }
    const auth = service.auth ? service.auth.type : 'anonymous';
    const tls = [service.verifySsl ? 'verify' : 'no-verify', service.legacySsl ? 'legacy-renegotiation' : '']
      .filter(Boolean)
      .join(', ');
    console.log(`${label}: ${chalk.cyan(service.url)}  auth=${auth}  tls=${tls}  max=${service.maxResults}`);
  }
  if (config.jira) {
    console.log(`  Projects: ${config.jira.projects.join(', ') || 'all'}`);
    console.log(`  Issue types: ${config.jira.issueTypes.join(', ') || 'all'}`);
  }
  if (config.confluence) {
    console.log(`  Spaces: ${config.confluence.spaces.join(', ') || 'all'}`);
  }

  console.log('');
  console.log(`Timeout: ${config.timeout}s  Cache: ${config.cacheTimeout ? `${config.cacheTimeout}s` : 'disabled'}`);
  console.log(`Device types: ${config.deviceTypes.join(', ') || 'all'}`);

  console.log('');
  console.log(chalk.bold('Device search fields:'));
  for (const field of config.searchFields) {
    console.log(`  ${field.enabled ? chalk.green('✓') : chalk.gray('-')} ${field.name} [${field.attribute}]`);
  }
  console.log(chalk.bold('Virtual machine search fields:'));
  for (const field of config.vmSearchFields) {
    console.log(`  ${field.enabled ? chalk.green('✓') : chalk.gray('-')} ${field.name} [${field.attribute}]`);
  }
}
