import chalk from 'chalk';
import type { AggregatedResults, ServiceSummary } from './aggregator.js';
import type { FieldResolution } from './query-builder.js';
import type { InventoryRecord } from './records.js';
import type { ConnectionTestResult, NormalizedResult } from './service-clients/types.js';

export type OutputFormat = 'human' | 'json' | 'xml';

export interface ConnectionTestReport extends ConnectionTestResult {
  service: string;
  label: string;
}

/**
 * Base formatter interface
 */
export interface Formatter {
  formatResults(record: InventoryRecord, results: AggregatedResults): string;
  formatSkipped(record: InventoryRecord, reason: string): string;
  formatFields(record: InventoryRecord, fields: FieldResolution[]): string;
  formatConnectionTests(reports: ConnectionTestReport[]): string;
}

/**
 * XML escape helper
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Display name for a record: its name attribute, or type and id
 */
export function recordLabel(record: InventoryRecord): string {
  const name = record.attributes.name;
  const kind = record.type === 'device' ? 'device' : 'virtual machine';
  return typeof name === 'string' && name ? `${name} (${kind} ${record.id})` : `${kind} ${record.id}`;
}

function issueLine(issue: NormalizedResult): string[] {
  const meta = [issue.extra.status, issue.extra.type, issue.extra.assignee].filter(Boolean).join(' · ');
  const heading = `  ${chalk.cyan.bold(issue.id)}  ${issue.title}${meta ? chalk.gray(`  [${meta}]`) : ''}`;
  return [heading, chalk.gray(`     ${issue.url}`)];
}

function pageLine(page: NormalizedResult): string[] {
  const location = [page.extra.spaceName || page.extra.spaceKey, page.extra.breadcrumb].filter(Boolean).join(' > ');
  const lines = [`  ${chalk.cyan.bold(page.title || page.id)}${location ? chalk.gray(`  (${location})`) : ''}`];
  lines.push(chalk.gray(`     ${page.url}`));
  return lines;
}

/**
 * Section heading such as "Issues (10 of 42, cached):", or undefined when no service of the source is configured
 */
function sectionHeading(title: string, shown: number, summaries: readonly ServiceSummary[]): string | undefined {
  const searched = summaries.filter((summary) => summary.configured);
  if (summaries.length > 0 && searched.length === 0) return undefined;

  const total = searched.reduce((sum, summary) => sum + summary.total, 0);
  const count = total > shown ? `${shown} of ${total}` : String(shown);
  const cached = searched.length > 0 && searched.every((summary) => summary.cached) ? ', cached' : '';
  return `${title} (${count}${cached}):`;
}

function pushSection<T>(
  lines: string[],
  title: string,
  items: readonly T[],
  summaries: readonly ServiceSummary[],
  render: (item: T) => string[],
): void {
  const heading = sectionHeading(title, items.length, summaries);
  if (heading === undefined) {
    lines.push(chalk.bold(`${title}:`));
    lines.push(chalk.gray(`  ${summaries.map((summary) => summary.label).join(', ')} not configured.`));
    return;
  }
  lines.push(chalk.bold(heading));
  if (items.length === 0) lines.push(chalk.gray(`  No ${title.toLowerCase()} found.`));
  for (const item of items) lines.push(...render(item));
}

/**
 * Human-readable formatter with colors
 */
export class HumanFormatter implements Formatter {
  formatResults(record: InventoryRecord, results: AggregatedResults): string {
    const lines = [chalk.bold(recordLabel(record))];

    if (results.terms.length === 0) {
      lines.push(chalk.yellow('No search terms could be resolved for this record.'));
      return lines.join('\n');
    }

    lines.push(chalk.gray(`Search terms: ${results.terms.map((t) => `${t.value} (${t.fieldName})`).join(', ')}`));
    lines.push('');

    const bySource = (source: ServiceSummary['source']) =>
      results.services.filter((summary) => summary.source === source);
    pushSection(lines, 'Issues', results.issues, bySource('issue'), issueLine);
    lines.push('');
    pushSection(lines, 'Pages', results.pages, bySource('page'), pageLine);

    if (results.failures.length > 0) {
      lines.push('');
      for (const failure of results.failures) {
        lines.push(chalk.yellow(`Warning: ${failure.label} unavailable: ${failure.error.message}`));
      }
    }

    return lines.join('\n');
  }

  formatSkipped(record: InventoryRecord, reason: string): string {
    return `${chalk.bold(recordLabel(record))}\n${chalk.yellow(`Skipped: ${reason}`)}`;
  }

  formatFields(record: InventoryRecord, fields: FieldResolution[]): string {
    const lines = [chalk.bold(recordLabel(record)), ''];
    if (fields.length === 0) {
      lines.push(chalk.yellow('No search fields configured.'));
      return lines.join('\n');
    }
    for (const field of fields) {
      const value = field.value === undefined ? chalk.gray('not set') : chalk.cyan(field.value);
      const state = field.enabled ? '' : chalk.gray(' (disabled)');
      lines.push(`  ${field.name} [${field.attribute}]: ${value}${state}`);
    }
    return lines.join('\n');
  }

  formatConnectionTests(reports: ConnectionTestReport[]): string {
    if (reports.length === 0) {
      return chalk.yellow('No services configured.');
    }
    return reports
      .map((report) =>
        report.ok
          ? chalk.green(`✓ ${report.label}: ${report.detail}`)
          : chalk.red(`✗ ${report.label}: ${report.detail}`),
      )
      .join('\n');
  }
}

/**
 * JSON formatter for scripting
 */
export class JsonFormatter implements Formatter {
  formatResults(record: InventoryRecord, results: AggregatedResults): string {
    return JSON.stringify(
      {
        record: { type: record.type, id: record.id },
        terms: results.terms,
        issues: results.issues,
        pages: results.pages,
        services: results.services,
        failures: results.failures.map((failure) => ({
          service: failure.service,
          source: failure.source,
          error: failure.error._tag,
          message: failure.error.message,
        })),
      },
      null,
      2,
    );
  }

  formatSkipped(record: InventoryRecord, reason: string): string {
    return JSON.stringify({ record: { type: record.type, id: record.id }, skipped: reason }, null, 2);
  }

  formatFields(record: InventoryRecord, fields: FieldResolution[]): string {
    return JSON.stringify(
      {
        record: { type: record.type, id: record.id },
        fields: fields.map((field) => ({ ...field, value: field.value ?? null })),
      },
      null,
      2,
    );
  }

  formatConnectionTests(reports: ConnectionTestReport[]): string {
    return JSON.stringify(reports, null, 2);
  }
}

/**
 * XML formatter for LLM consumption
 */
export class XmlFormatter implements Formatter {
  formatResults(record: InventoryRecord, results: AggregatedResults): string {
    const lines = [`<results record-type="${record.type}" record-id="${escapeXml(record.id)}">`];

    lines.push('  <terms>');
    for (const term of results.terms) {
      lines.push(`    <term field="${escapeXml(term.fieldName)}">${escapeXml(term.value)}</term>`);
    }
    lines.push('  </terms>');

    lines.push(`  <issues count="${results.issues.length}">`);
    for (const issue of results.issues) {
      lines.push(`    <issue key="${escapeXml(issue.id)}" status="${escapeXml(issue.extra.status ?? '')}">`);
      lines.push(`      <summary>${escapeXml(issue.title)}</summary>`);
      lines.push(`      <url>${escapeXml(issue.url)}</url>`);
      lines.push('    </issue>');
    }
    lines.push('  </issues>');

    lines.push(`  <pages count="${results.pages.length}">`);
    for (const page of results.pages) {
      lines.push(`    <page id="${escapeXml(page.id)}" space="${escapeXml(page.extra.spaceKey ?? '')}">`);
      lines.push(`      <title>${escapeXml(page.title)}</title>`);
      lines.push(`      <url>${escapeXml(page.url)}</url>`);
      lines.push('    </page>');
    }
    lines.push('  </pages>');

    for (const summary of results.services) {
      const attrs = [
        `name="${escapeXml(summary.service)}"`,
        `configured="${summary.configured}"`,
        `total="${summary.total}"`,
        `returned="${summary.returned}"`,
        `cached="${summary.cached}"`,
      ];
      lines.push(`  <service ${attrs.join(' ')} />`);
    }

    for (const failure of results.failures) {
      lines.push(`  <failure service="${escapeXml(failure.service)}">${escapeXml(failure.error.message)}</failure>`);
    }

    lines.push('</results>');
    return lines.join('\n');
  }

  formatSkipped(record: InventoryRecord, reason: string): string {
    const id = escapeXml(record.id);
    return `<results record-type="${record.type}" record-id="${id}" skipped="${escapeXml(reason)}" />`;
  }

  formatFields(record: InventoryRecord, fields: FieldResolution[]): string {
    const lines = [`<fields record-type="${record.type}" record-id="${escapeXml(record.id)}">`];
    for (const field of fields) {
      const attrs = [
        `name="${escapeXml(field.name)}"`,
        `attribute="${escapeXml(field.attribute)}"`,
        `enabled="${field.enabled}"`,
      ].join(' ');
      lines.push(
        field.value === undefined
          ? `  <field ${attrs} />`
          : `  <field ${attrs}>${escapeXml(field.value)}</field>`,
      );
    }
    lines.push('</fields>');
    return lines.join('\n');
  }

  formatConnectionTests(reports: ConnectionTestReport[]): string {
    const lines = ['<connections>'];
    for (const report of reports) {
      const attrs = `service="${escapeXml(report.service)}" ok="${report.ok}"`;
      lines.push(`  <connection ${attrs}>${escapeXml(report.detail)}</connection>`);
    }
    lines.push('</connections>');
    return lines.join('\n');
  }
}

/**
 * Get the appropriate formatter based on output mode
 */
export function getFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'xml':
      return new XmlFormatter();
    default:
      return new HumanFormatter();
  }
}
