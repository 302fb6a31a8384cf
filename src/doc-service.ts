/**
 * Application service behind the CLI
 *
 * Loads a spec through a SpecLoader and runs one operation on it. This is
 * the only layer that logs; the modules it drives are silent.
 */

import { REF_PREFIX } from './constants.js';
import { DocumentGenerator } from './document-generator.js';
import { EndpointFinder } from './endpoint-finder.js';
import { loadEndpointsFilter } from './endpoints-filter-loader.js';
import { buildErrorsReport, type ErrorsReportEntry } from './errors-report.js';
import { FilterFileNotFoundError, SchemaNotFoundError } from './errors.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { SchemaResolver } from './ref-resolver.js';
import { SchemaCollector } from './schema-collector.js';
import type { SpecLoader } from './spec-loader.js';
import { endpointLabel, type EndpointFilter } from './spec-model.js';
import { getObject, type Endpoint, type SchemaDefinition, type Spec } from './types/openapi.js';
import type { VerificationReport, VerificationResult } from './types/verification.js';
import { DocumentationVerifier } from './verifier.js';

export type FilterLoader = (filePath: string) => Promise<EndpointFilter>;

export interface EndpointInfo {
  endpoint: Endpoint;
  /** Transitively used schemas in discovery order; empty unless expanded */
  schemas: SchemaDefinition[];
}

export interface EndpointInfoOptions {
  expandSchemas?: boolean;
}

export interface GenerateDocumentationOptions {
  /** Path of an endpoints filter file */
  endpointsFile?: string;
  includeAllSchemas?: boolean;
}

export interface VerifyAllOptions {
  endpointsFile?: string;
}

export class ApiDocService {
  private finder = new EndpointFinder();
  private generator = new DocumentGenerator();

  constructor(
    private readonly loader: SpecLoader,
    private readonly logger: Logger = new ConsoleLogger(),
    private readonly loadFilter: FilterLoader = loadEndpointsFilter
  ) {}

  async getEndpointInfo(
    source: string,
    path: string,
    method: string,
    options: EndpointInfoOptions = {}
  ): Promise<EndpointInfo> {
    const spec = await this.loadSpec(source);
    const endpoint = this.finder.find(spec, path, method);

    if (!options.expandSchemas) {
      return { endpoint, schemas: [] };
    }

    const resolver = new SchemaResolver(spec);
    const schemas: SchemaDefinition[] = [];
    for (const name of new SchemaCollector(resolver).collect(endpoint)) {
      const definition = resolver.resolve(`${REF_PREFIX.SCHEMAS}${name}`);
      if (Object.keys(definition).length > 0) {
        schemas.push({ name, definition });
      }
    }

    this.logger.debug('Expanded endpoint schemas', { endpoint: endpointLabel(endpoint), count: schemas.length });
    return { endpoint, schemas };
  }

  async getSchemaInfo(source: string, name: string): Promise<SchemaDefinition> {
    const spec = await this.loadSpec(source);
    const definition = getObject(spec.schemas, name);

    if (!definition) {
      throw new SchemaNotFoundError(name, Object.keys(spec.schemas));
    }

    return { name, definition };
  }

  async listEndpoints(source: string): Promise<Endpoint[]> {
    const spec = await this.loadSpec(source);
    return this.finder.listAll(spec);
  }

  async generateDocumentation(source: string, options: GenerateDocumentationOptions = {}): Promise<string> {
    const spec = await this.loadSpec(source);
    const filter = options.endpointsFile ? await this.tryLoadFilter(options.endpointsFile) : undefined;

    const markdown = this.generator.generate(spec, {
      filter,
      includeAllSchemas: options.includeAllSchemas,
    });

    this.logger.info('Documentation generated', {
      source,
      filtered: filter !== undefined,
      length: markdown.length,
    });
    return markdown;
  }

  async verifyEndpoint(source: string, path: string, method: string, markdown: string): Promise<VerificationResult> {
    const spec = await this.loadSpec(source);
    const endpoint = this.finder.find(spec, path, method);
    const result = new DocumentationVerifier(new SchemaResolver(spec)).verify(endpoint, markdown);

    this.logger.info('Endpoint verified', { endpoint: result.endpoint, issues: result.issueCount });
    return result;
  }

  async verifyAll(source: string, markdown: string, options: VerifyAllOptions = {}): Promise<VerificationReport> {
    const spec = await this.loadSpec(source);
    const filter = options.endpointsFile ? await this.loadFilter(options.endpointsFile) : undefined;
    const verifier = new DocumentationVerifier(new SchemaResolver(spec));
    const report = verifier.verifyAll(this.finder.listAll(spec), markdown, filter);

    this.logger.info('Documentation verified', {
      endpoints: report.totalEndpoints,
      endpointsWithIssues: report.endpointsWithIssues,
      issues: report.totalIssues,
    });
    return report;
  }

  async errorsReport(source: string): Promise<ErrorsReportEntry[]> {
    const spec = await this.loadSpec(source);
    return buildErrorsReport(this.finder.listAll(spec));
  }

  private async loadSpec(source: string): Promise<Spec> {
    this.logger.debug('Loading specification', { source });
    const spec = await this.loader.load(source);
    this.logger.debug('Specification loaded', {
      source,
      paths: Object.keys(spec.paths).length,
      schemas: Object.keys(spec.schemas).length,
    });
    return spec;
  }

  /**
   * A missing filter file falls back to documenting every endpoint
   */
  private async tryLoadFilter(filePath: string): Promise<EndpointFilter | undefined> {
    try {
      return await this.loadFilter(filePath);
    } catch (error) {
      if (error instanceof FilterFileNotFoundError) {
        this.logger.warn('Endpoints filter file not found, documenting all endpoints', { filePath });
        return undefined;
      }
      throw error;
    }
  }
}
