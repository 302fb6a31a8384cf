/**
 * Report of the 4xx/5xx status codes each operation declares
 */

import { ConfigurationError } from './errors.js';
import { getObject, type Endpoint } from './types/openapi.js';

export interface ErrorsReportEntry {
  path: string;
  method: string;
  errorCodes: string[];
}

export const ERRORS_REPORT_FORMATS = ['text', 'csv', 'md'] as const;

export type ErrorsReportFormat = (typeof ERRORS_REPORT_FORMATS)[number];

const RANGE_CODES = new Set(['4XX', '5XX']);
const RULE = '-'.repeat(60);

export function isErrorsReportFormat(value: string): value is ErrorsReportFormat {
  return ERRORS_REPORT_FORMATS.some(format => format === value);
}

/**
 * Numeric codes in [400, 600) plus the `4XX`/`5XX` ranges, sorted.
 * `default`, `2XX` and other keys are ignored.
 */
export function extractErrorCodes(endpoint: Endpoint): string[] {
  const codes = new Set<string>();

  for (const key of Object.keys(getObject(endpoint.operation, 'responses') ?? {})) {
    if (/^\d+$/.test(key)) {
      const code = Number(key);
      if (code >= 400 && code < 600) codes.add(key);
    } else if (RANGE_CODES.has(key.toUpperCase())) {
      codes.add(key.toUpperCase());
    }
  }

  return Array.from(codes).sort();
}

export function buildErrorsReport(endpoints: Endpoint[]): ErrorsReportEntry[] {
  return endpoints.map(endpoint => ({
    path: endpoint.path,
    method: endpoint.method,
    errorCodes: extractErrorCodes(endpoint),
  }));
}

interface ReportTotals {
  withErrors: ErrorsReportEntry[];
  withoutErrors: ErrorsReportEntry[];
  totalCodes: number;
  uniqueCodes: string[];
}

function totals(entries: ErrorsReportEntry[]): ReportTotals {
  const unique = new Set(entries.flatMap(entry => entry.errorCodes));
  return {
    withErrors: entries.filter(entry => entry.errorCodes.length > 0),
    withoutErrors: entries.filter(entry => entry.errorCodes.length === 0),
    totalCodes: entries.reduce((sum, entry) => sum + entry.errorCodes.length, 0),
    uniqueCodes: Array.from(unique).sort(),
  };
}

function formatText(entries: ErrorsReportEntry[]): string {
  if (entries.length === 0) return 'No endpoints found.';

  const { withErrors, withoutErrors, totalCodes, uniqueCodes } = totals(entries);
  const lines: string[] = ['Endpoint error codes report', '='.repeat(60), ''];

  if (withErrors.length > 0) {
    lines.push(`Endpoints with error codes (${withErrors.length}):`, RULE);
    for (const entry of withErrors) {
      lines.push(`${entry.method.padEnd(6)} ${entry.path.padEnd(40)} [${entry.errorCodes.join(', ')}]`);
    }
    lines.push('');
  }

  if (withoutErrors.length > 0) {
    lines.push(`Endpoints without error codes (${withoutErrors.length}):`, RULE);
    for (const entry of withoutErrors) {
      lines.push(`${entry.method.padEnd(6)} ${entry.path}`);
    }
    lines.push('');
  }

  lines.push('Statistics:', RULE);
  lines.push(`Total endpoints: ${entries.length}`);
  lines.push(`With error codes: ${withErrors.length}`);
  lines.push(`Without error codes: ${withoutErrors.length}`);
  lines.push(`Total error codes: ${totalCodes}`);
  lines.push(`Unique error codes: ${uniqueCodes.length}`);
  if (uniqueCodes.length > 0) {
    lines.push(`Codes: ${uniqueCodes.join(', ')}`);
  }

  return lines.join('\n');
}

function formatCsv(entries: ErrorsReportEntry[]): string {
  const lines = ['method,path,error_codes'];
  for (const entry of entries) {
    lines.push(`${entry.method},${entry.path},${entry.errorCodes.join(';')}`);
  }
  return lines.join('\n');
}

function formatMarkdown(entries: ErrorsReportEntry[]): string {
  const title = '# Endpoint error codes report';
  if (entries.length === 0) return `${title}\n\nNo endpoints found.`;

  const { withErrors, withoutErrors, totalCodes, uniqueCodes } = totals(entries);
  const lines: string[] = [title, ''];

  if (withErrors.length > 0) {
    lines.push(`## Endpoints with error codes (${withErrors.length})`, '');
    lines.push('| Method | Path | Error codes |', '|--------|------|-------------|');
    for (const entry of withErrors) {
      lines.push(`| ${entry.method} | \`${entry.path}\` | ${entry.errorCodes.join(', ')} |`);
    }
    lines.push('');
  }

  if (withoutErrors.length > 0) {
    lines.push(`## Endpoints without error codes (${withoutErrors.length})`, '');
    lines.push('| Method | Path |', '|--------|------|');
    for (const entry of withoutErrors) {
      lines.push(`| ${entry.method} | \`${entry.path}\` |`);
    }
    lines.push('');
  }

  lines.push('## Statistics', '');
  lines.push(`- **Total endpoints:** ${entries.length}`);
  lines.push(`- **With error codes:** ${withErrors.length}`);
  lines.push(`- **Without error codes:** ${withoutErrors.length}`);
  lines.push(`- **Total error codes:** ${totalCodes}`);
  lines.push(`- **Unique error codes:** ${uniqueCodes.length}`);
  if (uniqueCodes.length > 0) {
    lines.push(`- **Codes:** ${uniqueCodes.join(', ')}`);
  }

  return lines.join('\n');
}

export function formatErrorsReport(entries: ErrorsReportEntry[], format: string = 'text'): string {
  if (!isErrorsReportFormat(format)) {
    throw new ConfigurationError(
      `Unknown report format '${format}'. Expected one of: ${ERRORS_REPORT_FORMATS.join(', ')}`,
      { format }
    );
  }

  switch (format) {
    case 'csv':
      return formatCsv(entries);
    case 'md':
      return formatMarkdown(entries);
    case 'text':
      return formatText(entries);
  }
}
