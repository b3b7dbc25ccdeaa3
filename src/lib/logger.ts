import chalk from 'chalk';

/**
 * Whether debug output was requested (IXR_DEBUG=1, set by --verbose)
 */
export function isDebugEnabled(): boolean {
  return process.env.IXR_DEBUG === '1';
}

/**
 * Write a debug line to stderr when debugging is enabled
 */
export function debug(message: string): void {
  if (isDebugEnabled()) process.stderr.write(`${chalk.gray('[debug]')} ${message}\n`);
}

export function warn(message: string): void {
  console.warn(chalk.yellow(message));
}
