import chalk from 'chalk';
import ora from 'ora';
import { createServiceEntries } from '../../lib/aggregator.js';
import { EXIT_CODES } from '../../lib/errors.js';
import { type ConnectionTestReport, getFormatter, type OutputFormat } from '../../lib/formatters.js';
import { loadConfigOrExit } from '../utils/load-config.js';

export interface TestConnectionCommandOptions {
  /** Service name (jira, confluence); all configured services when omitted */
  service?: string;
  format: OutputFormat;
}

/**
 * Test-connection command - verifies URL and credentials of each configured service
 */
export async function testConnectionCommand(options: TestConnectionCommandOptions): Promise<void> {
  const config = await loadConfigOrExit();
  const wanted = options.service?.toLowerCase();
  // A named service is tested even when unconfigured, so its report says what is missing
  const services = createServiceEntries(config)
    .map((entry) => entry.service)
    .filter((service) => (wanted ? service.name === wanted : service.configured));

  if (wanted && services.length === 0) {
    console.error(chalk.red(`Unknown service "${options.service}". Use jira or confluence.`));
    process.exit(EXIT_CODES.INVALID_ARGUMENTS);
  }
  if (services.length === 0) {
    console.error(chalk.red('No services configured.'));
    process.exit(EXIT_CODES.CONFIG_ERROR);
  }

  const spinner = options.format === 'human' ? ora('Checking connections...').start() : null;
  const reports: ConnectionTestReport[] = await Promise.all(
    services.map(async (service) => ({
      service: service.name,
      label: service.label,
      ...(await service.testConnection()),
    })),
  );
  spinner?.stop();

  console.log(getFormatter(options.format).formatConnectionTests(reports));

  if (reports.some((report) => !report.ok)) {
    process.exit(EXIT_CODES.NETWORK_ERROR);
  }
}
