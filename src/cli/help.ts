import chalk from 'chalk';

export function showSearchHelp(): void {
  console.log(`
${chalk.bold('ixr search - Find issues and pages that mention inventory records')}

${chalk.yellow('Usage:')}
  ixr search <record.json> [record.json...] [options]

${chalk.yellow('Description:')}
  Resolves the configured search fields on each record and searches every
  configured service with OR logic. Results are cached for the configured
  cacheTimeout, so the same record searched twice in one run hits the cache.
  Devices whose manufacturer does not match "deviceTypes" are skipped.

${chalk.yellow('Arguments:')}
  record.json               Record exported from the inventory REST API

${chalk.yellow('Options:')}
  --type <device|vm>        Record type of every file (default: device)
  --json                    Output in JSON format
  --xml                     Output in XML format for LLM parsing
  --help                    Show this help message

${chalk.yellow('Examples:')}
  ixr search sw01.json                  Search for a device
  ixr search web01.json --type vm       Search for a virtual machine
  ixr search sw01.json sw02.json --json Search for two devices, JSON output
`);
}

export function showFieldsHelp(): void {
  console.log(`
${chalk.bold('ixr fields - Show how search fields resolve on a record')}

${chalk.yellow('Usage:')}
  ixr fields <record.json> [options]

${chalk.yellow('Description:')}
  Lists every configured search field for the record type with its
  attribute path, resolved value and enabled state. Works without a
  config file, in which case the default fields are shown.

${chalk.yellow('Options:')}
  --type <device|vm>        Record type (default: device)
  --json                    Output in JSON format
  --xml                     Output in XML format for LLM parsing
  --help                    Show this help message

${chalk.yellow('Examples:')}
  ixr fields sw01.json
  ixr fields web01.json --type vm --json
`);
}

export function showTestConnectionHelp(): void {
  console.log(`
${chalk.bold('ixr test-connection - Check service URLs and credentials')}

${chalk.yellow('Usage:')}
  ixr test-connection [jira|confluence] [options]

${chalk.yellow('Description:')}
  Calls each configured service (or only the named one) with the configured
  credentials and reports who it is connected as. Exits with code 4 if any
  service fails.

${chalk.yellow('Options:')}
  --json                    Output in JSON format
  --xml                     Output in XML format for LLM parsing
  --help                    Show this help message

${chalk.yellow('Examples:')}
  ixr test-connection
  ixr test-connection jira
`);
}

export function showConfigHelp(): void {
  console.log(`
${chalk.bold('ixr config - Show the active configuration')}

${chalk.yellow('Usage:')}
  ixr config [options]

${chalk.yellow('Description:')}
  Prints the config file path and a summary of the configuration.
  Tokens and passwords are masked.

${chalk.yellow('Options:')}
  --json                    Output the parsed configuration as JSON
  --help                    Show this help message

${chalk.yellow('Config file')} ${chalk.gray('(~/.ixr/config.json)')}:
  {
    "jira": {
      "url": "https://jira.example.com",
      "auth": { "type": "token", "token": "..." },
      "projects": ["NET"],
      "maxResults": 10
    },
    "confluence": {
      "url": "https://wiki.example.com",
      "auth": { "type": "basic", "username": "svc", "password": "..." },
      "spaces": ["OPS"]
    },
    "timeout": 30,
    "cacheTimeout": 300,
    "deviceTypes": ["cisco", "juniper"]
  }
`);
}

export function showHelp(): void {
  console.log(`
${chalk.bold('ixr - Inventory cross-reference CLI')}

Find Jira issues and Confluence pages that mention inventory devices and
virtual machines.

${chalk.yellow('Commands:')}
  ixr search                Search services for one or more records
  ixr fields                Show resolved search fields of a record
  ixr test-connection       Check service URLs and credentials
  ixr config                Show the active configuration

${chalk.yellow('Global Options:')}
  --help, -h                Show help message
  --version, -v             Show version number
  --verbose                 Enable verbose output

${chalk.yellow('Environment Variables:')}
  IXR_CONFIG_PATH           Override config directory location
  IXR_DEBUG                 Enable debug logging
  NO_COLOR                  Disable colored output

${chalk.yellow('Examples:')}
  ixr search sw01.json      Search for a device
  ixr fields sw01.json      Show which values would be searched
  ixr test-connection       Verify configured services

${chalk.gray('For more information on a command, run: ixr <command> --help')}
`);
}
