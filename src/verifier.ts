/**
 * Documentation completeness verifier
 *
 * Compares what an operation declares (security, deprecation, operationId,
 * description, examples) with the rendered Markdown and reports what did not
 * make it into the text. Matching is heuristic: each fact is searched for in
 * the endpoint's section with several fallbacks.
 */

import {
  DEPRECATION_MARKERS,
  DESCRIPTION_SNIPPET_LENGTH,
  SECURITY_KEYWORDS,
  VERIFY_WINDOW,
} from './constants.js';
import { demoteHeadings, formatInlineExample } from './formatters.js';
import {
  extractJsonBlocks,
  extractLabels,
  extractParameterExamples,
  findEndpointSection,
  responseCodeWindow,
  type CodeBlock,
} from './markdown-scan.js';
import type { SchemaResolver } from './ref-resolver.js';
import { endpointLabel, securityRequirements, type EndpointFilter } from './spec-model.js';
import { stableStringify } from './stable-json.js';
import {
  getArray,
  getObject,
  getString,
  hasKey,
  isJsonObject,
  type Endpoint,
  type JsonObject,
  type JsonValue,
} from './types/openapi.js';
import type {
  IssueSeverity,
  MissingItems,
  VerificationIssue,
  VerificationReport,
  VerificationResult,
} from './types/verification.js';

interface NamedExample {
  name: string;
  summary: string;
  value: JsonValue;
}

function unwrapExample(data: JsonValue): JsonValue {
  return isJsonObject(data) && hasKey(data, 'value') ? data.value : data;
}

function namedExamples(media: JsonObject): NamedExample[] {
  const examples: NamedExample[] = [];
  for (const [name, data] of Object.entries(getObject(media, 'examples') ?? {})) {
    const summary = isJsonObject(data) ? getString(data, 'summary') : undefined;
    examples.push({ name, summary: summary ?? name, value: unwrapExample(data) });
  }
  return examples;
}

function exampleValues(node: JsonObject): JsonValue[] {
  const values: JsonValue[] = [];
  const examples = node.examples;

  if (Array.isArray(examples)) {
    values.push(...examples);
  } else if (isJsonObject(examples)) {
    values.push(...Object.values(examples).map(unwrapExample));
  }

  if (hasKey(node, 'example')) {
    values.push(node.example);
  }

  return values;
}

function matchesBlock(example: JsonValue, block: CodeBlock): boolean {
  if (block.value !== undefined) {
    return stableStringify(block.value) === stableStringify(example);
  }
  return block.text.includes(formatInlineExample(example));
}

function isDocumented(example: NamedExample, labels: string[], blocks: CodeBlock[]): boolean {
  return labels.includes(example.name)
    || labels.includes(example.summary)
    || blocks.some(block => matchesBlock(example.value, block));
}

function emptyMissingItems(): MissingItems {
  return {
    security: [],
    responseExamples: [],
    parameterExamples: [],
    requestBodyExamples: [],
    deprecated: false,
    operationId: false,
    description: false,
  };
}

export function summarizeIssues(issues: VerificationIssue[]): string {
  if (issues.length === 0) {
    return '✅ No information loss detected';
  }

  const count = (severity: IssueSeverity) => issues.filter(issue => issue.severity === severity).length;
  const parts: string[] = [];
  const high = count('high');
  const medium = count('medium');
  const low = count('low');
  if (high > 0) parts.push(`🔴 High: ${high}`);
  if (medium > 0) parts.push(`🟡 Medium: ${medium}`);
  if (low > 0) parts.push(`🟢 Low: ${low}`);

  return `Issues found: ${issues.length} (${parts.join(', ')})`;
}

export class DocumentationVerifier {
  /**
   * @param resolver - used to follow `$ref` parameters, request bodies and
   *   responses; without it those references are checked as written
   */
  constructor(private readonly resolver?: SchemaResolver) {}

  verify(endpoint: Endpoint, markdown: string): VerificationResult {
    const { operation } = endpoint;
    const section = findEndpointSection(markdown, endpoint.method, endpoint.path);
    const issues: VerificationIssue[] = [];
    const missing = emptyMissingItems();

    const security = securityRequirements(operation);
    if (security.length > 0 && !this.hasSecurity(section)) {
      missing.security = security;
      issues.push({
        type: 'missing_security',
        severity: 'high',
        message: `Security requirements missing from documentation: ${JSON.stringify(security)}`,
      });
    }

    if (operation.deprecated === true && !this.hasDeprecation(section)) {
      missing.deprecated = true;
      issues.push({
        type: 'missing_deprecated',
        severity: 'medium',
        message: 'Deprecated status is not shown in documentation',
      });
    }

    const operationId = getString(operation, 'operationId');
    if (operationId !== undefined && !markdown.includes(operationId)) {
      missing.operationId = true;
      issues.push({
        type: 'missing_operation_id',
        severity: 'low',
        message: `OperationId not found in documentation: ${operationId}`,
      });
    }

    const description = getString(operation, 'description');
    if (description && !this.hasDescription(markdown, description)) {
      missing.description = true;
      issues.push({
        type: 'missing_description',
        severity: 'medium',
        message: 'Operation description is missing from documentation',
      });
    }

    this.checkResponseExamples(operation, section, missing, issues);
    this.checkParameterExamples(operation, section, missing, issues);
    this.checkRequestBodyExamples(operation, section, missing, issues);

    return {
      endpoint: endpointLabel(endpoint),
      hasIssues: issues.length > 0,
      issueCount: issues.length,
      issues,
      missingItems: missing,
      summary: summarizeIssues(issues),
    };
  }

  verifyAll(endpoints: Endpoint[], markdown: string, filter?: EndpointFilter): VerificationReport {
    const selected = filter
      ? endpoints.filter(endpoint => filter.matches(endpoint.method, endpoint.path))
      : endpoints;
    const results = selected.map(endpoint => this.verify(endpoint, markdown));

    return {
      totalEndpoints: selected.length,
      endpointsWithIssues: results.filter(result => result.hasIssues).length,
      totalIssues: results.reduce((sum, result) => sum + result.issueCount, 0),
      results,
    };
  }

  private hasSecurity(section: string | undefined): boolean {
    if (section === undefined) return false;
    const window = section.slice(0, VERIFY_WINDOW.SECURITY).toLowerCase();
    return SECURITY_KEYWORDS.some(keyword => window.includes(keyword));
  }

  private hasDeprecation(section: string | undefined): boolean {
    if (section === undefined) return false;
    const window = section.slice(0, VERIFY_WINDOW.DEPRECATED).toLowerCase();
    return DEPRECATION_MARKERS.some(marker => window.includes(marker));
  }

  private hasDescription(markdown: string, description: string): boolean {
    const snippet = description.slice(0, DESCRIPTION_SNIPPET_LENGTH).trim();
    if (!snippet) return true;
    return markdown.toLowerCase().includes(demoteHeadings(snippet).toLowerCase());
  }

  private checkResponseExamples(
    operation: JsonObject,
    section: string | undefined,
    missing: MissingItems,
    issues: VerificationIssue[]
  ): void {
    for (const [code, rawResponse] of Object.entries(getObject(operation, 'responses') ?? {})) {
      const response = this.dereference(rawResponse);
      if (!response) continue;

      const examples = Object.values(getObject(response, 'content') ?? {})
        .filter(isJsonObject)
        .flatMap(namedExamples);
      if (examples.length === 0) continue;

      const window = section === undefined
        ? undefined
        : responseCodeWindow(section, code, VERIFY_WINDOW.RESPONSE_CODE);
      const labels = window === undefined ? [] : extractLabels(window);
      const blocks = window === undefined ? [] : extractJsonBlocks(window);

      for (const example of examples) {
        if (isDocumented(example, labels, blocks)) continue;

        missing.responseExamples.push({ code, name: example.name, value: example.value });
        issues.push({
          type: 'missing_response_example',
          severity: 'medium',
          message: `Response ${code} example '${example.name}' is missing from documentation`,
        });
      }
    }
  }

  private checkParameterExamples(
    operation: JsonObject,
    section: string | undefined,
    missing: MissingItems,
    issues: VerificationIssue[]
  ): void {
    const documented = section === undefined
      ? new Map<string, string[]>()
      : extractParameterExamples(section.slice(0, VERIFY_WINDOW.PARAMETERS));

    for (const rawParameter of getArray(operation, 'parameters') ?? []) {
      const parameter = this.dereference(rawParameter);
      if (!parameter) continue;

      const name = getString(parameter, 'name') ?? '';
      const schema = getObject(parameter, 'schema');
      const examples = [...(schema ? exampleValues(schema) : []), ...exampleValues(parameter)];
      const shown = documented.get(name) ?? [];

      for (const example of examples) {
        if (shown.includes(formatInlineExample(example))) continue;

        missing.parameterExamples.push({ parameter: name, example });
        issues.push({
          type: 'missing_parameter_example',
          severity: 'low',
          message: `Example for parameter '${name}' is missing from documentation`,
        });
      }
    }
  }

  private checkRequestBodyExamples(
    operation: JsonObject,
    section: string | undefined,
    missing: MissingItems,
    issues: VerificationIssue[]
  ): void {
    const requestBody = operation.requestBody === undefined ? undefined : this.dereference(operation.requestBody);
    if (!requestBody) return;

    const examples: NamedExample[] = [];
    for (const media of Object.values(getObject(requestBody, 'content') ?? {})) {
      if (!isJsonObject(media)) continue;
      examples.push(...namedExamples(media));
      if (hasKey(media, 'example')) {
        examples.push({ name: 'default', summary: 'Example', value: media.example });
      }
    }
    if (examples.length === 0) return;

    const window = section?.slice(0, VERIFY_WINDOW.REQUEST_BODY) ?? '';
    const labels = extractLabels(window);
    const blocks = extractJsonBlocks(window);

    for (const example of examples) {
      if (isDocumented(example, labels, blocks)) continue;

      missing.requestBodyExamples.push({ name: example.name, value: example.value });
      issues.push({
        type: 'missing_request_body_example',
        severity: 'medium',
        message: `Request body example '${example.name}' is missing from documentation`,
      });
    }
  }

  private dereference(node: JsonValue): JsonObject | undefined {
    if (this.resolver) return this.resolver.dereference(node);
    return isJsonObject(node) ? node : undefined;
  }
}
