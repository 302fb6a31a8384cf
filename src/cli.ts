/**
 * Command-line interface (`oas-docs`)
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import type { ApiDocService } from './doc-service.js';
import { ERRORS_REPORT_FORMATS, formatErrorsReport, isErrorsReportFormat } from './errors-report.js';
import { ConfigurationError } from './errors.js';
import { formatVerificationResult, formatVerificationSummary } from './report-formatter.js';
import { readMarkdownFile, writeOutputFile } from './spec-loader.js';
import { calculateStats, formatEndpointList, formatStats } from './stats.js';
import { getString, isJsonObject } from './types/openapi.js';

export interface CliOutput {
  write(text: string): void;
}

interface EndpointCommandOptions {
  spec: string;
  path: string;
  method: string;
  expandSchemas?: boolean;
  output?: string;
}

interface SchemaCommandOptions {
  spec: string;
  name: string;
  output?: string;
}

interface ListCommandOptions {
  spec: string;
  summary?: boolean;
  groupByTags?: boolean;
  stats?: boolean;
  output?: string;
}

interface GenerateCommandOptions {
  spec: string;
  endpoints?: string;
  allSchemas?: boolean;
  output?: string;
}

interface VerifyCommandOptions {
  spec: string;
  markdown: string;
  path?: string;
  method?: string;
  endpoints?: string;
  output?: string;
}

interface ErrorsReportCommandOptions {
  spec: string;
  format: string;
  output?: string;
}

const stdout: CliOutput = {
  write: text => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
};

function packageVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../package.json');
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  return (isJsonObject(parsed) && getString(parsed, 'version')) || '0.0.0';
}

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function createProgram(service: ApiDocService, out: CliOutput = stdout): Command {
  const program = new Command();

  /** Print `text`, or save it and report where */
  const emit = async (text: string, output: string | undefined, savedMessage = 'Saved to'): Promise<void> => {
    if (output) {
      const written = await writeOutputFile(output, text);
      out.write(`${savedMessage}: ${written}`);
    } else {
      out.write(text);
    }
  };

  program
    .name('oas-docs')
    .description('Markdown documentation and completeness checks for OpenAPI specifications')
    .version(packageVersion())
    .showHelpAfterError();

  program
    .command('endpoint')
    .description('Show the operation object for one endpoint')
    .requiredOption('-s, --spec <file>', 'OpenAPI specification (JSON or YAML)')
    .requiredOption('-p, --path <path>', 'Endpoint path')
    .option('-m, --method <method>', 'HTTP method', 'get')
    .option('--expand-schemas', 'Also print every schema the endpoint uses')
    .option('-o, --output <file>', 'Write the result to a file')
    .action(async (options: EndpointCommandOptions) => {
      const info = await service.getEndpointInfo(options.spec, options.path, options.method, {
        expandSchemas: options.expandSchemas,
      });

      const lines = [`Endpoint ${info.endpoint.method} ${info.endpoint.path}:`, pretty(info.endpoint.operation)];
      if (options.expandSchemas) {
        lines.push('', '### Related schemas');
        if (info.schemas.length === 0) {
          lines.push('', 'No related schemas found');
        }
        for (const schema of info.schemas) {
          lines.push('', `#### Schema: ${schema.name}`, pretty(schema.definition));
        }
      }

      await emit(lines.join('\n'), options.output);
    });

  program
    .command('schema')
    .description('Show one schema from components.schemas')
    .requiredOption('-s, --spec <file>', 'OpenAPI specification (JSON or YAML)')
    .requiredOption('-n, --name <name>', 'Schema name')
    .option('-o, --output <file>', 'Write the result to a file')
    .action(async (options: SchemaCommandOptions) => {
      const schema = await service.getSchemaInfo(options.spec, options.name);
      await emit(`Schema '${schema.name}':\n${pretty(schema.definition)}`, options.output);
    });

  program
    .command('list')
    .description('List every endpoint')
    .requiredOption('-s, --spec <file>', 'OpenAPI specification (JSON or YAML)')
    .option('--summary', 'Append each operation summary')
    .option('--group-by-tags', 'Group endpoints under their tags')
    .option('--stats', 'Print API statistics')
    .option('-o, --output <file>', 'Write the result to a file')
    .action(async (options: ListCommandOptions) => {
      const endpoints = await service.listEndpoints(options.spec);
      const sections: string[] = [];

      if (options.stats) {
        sections.push(formatStats(calculateStats(endpoints)));
      }
      if (!options.stats || options.summary || options.groupByTags) {
        sections.push(formatEndpointList(endpoints, {
          withSummary: options.summary,
          groupByTag: options.groupByTags,
        }));
      }

      await emit(sections.join('\n\n'), options.output);
    });

  program
    .command('generate-md')
    .description('Generate Markdown documentation')
    .requiredOption('-s, --spec <file>', 'OpenAPI specification (JSON or YAML)')
    .option('-e, --endpoints <file>', 'Only document the endpoints listed in this file')
    .option('--all-schemas', 'Include every schema, not only the ones endpoints use')
    .option('-o, --output <file>', 'Write the documentation to a file')
    .action(async (options: GenerateCommandOptions) => {
      const markdown = await service.generateDocumentation(options.spec, {
        endpointsFile: options.endpoints,
        includeAllSchemas: options.allSchemas,
      });
      await emit(markdown, options.output, '✅ Documentation saved to');
    });

  program
    .command('verify')
    .description('Check generated Markdown for information missing from the spec')
    .requiredOption('-s, --spec <file>', 'OpenAPI specification (JSON or YAML)')
    .requiredOption('-m, --markdown <file>', 'Markdown documentation to check')
    .option('-p, --path <path>', 'Check only this endpoint path (requires --method)')
    .option('--method <method>', 'HTTP method of --path')
    .option('-e, --endpoints <file>', 'Only check the endpoints listed in this file')
    .option('-o, --output <file>', 'Save the JSON report to a file')
    .action(async (options: VerifyCommandOptions) => {
      if ((options.path === undefined) !== (options.method === undefined)) {
        throw new ConfigurationError('--path and --method must be given together', {
          path: options.path,
          method: options.method,
        });
      }

      const markdown = await readMarkdownFile(options.markdown);
      let text: string;
      let report: unknown;

      if (options.path !== undefined && options.method !== undefined) {
        const result = await service.verifyEndpoint(options.spec, options.path, options.method, markdown);
        text = formatVerificationResult(result);
        report = result;
      } else {
        const summary = await service.verifyAll(options.spec, markdown, { endpointsFile: options.endpoints });
        text = formatVerificationSummary(summary);
        report = summary;
      }

      out.write(text);
      if (options.output) {
        const written = await writeOutputFile(options.output, `${pretty(report)}\n`);
        out.write(`📄 Report saved to: ${written}`);
      }
    });

  program
    .command('errors-report')
    .description('Report the 4xx/5xx response codes of every endpoint')
    .requiredOption('-s, --spec <file>', 'OpenAPI specification (JSON or YAML)')
    .option('-f, --format <format>', 'Output format: text, csv or md', 'text')
    .option('-o, --output <file>', 'Write the report to a file')
    .action(async (options: ErrorsReportCommandOptions) => {
      if (!isErrorsReportFormat(options.format)) {
        throw new ConfigurationError(
          `Unknown report format '${options.format}'. Expected one of: ${ERRORS_REPORT_FORMATS.join(', ')}`,
          { format: options.format }
        );
      }

      const entries = await service.errorsReport(options.spec);
      await emit(formatErrorsReport(entries, options.format), options.output, 'Report saved to');
    });

  return program;
}
