/**
 * Markdown rendering of a DocumentModel
 *
 * The layout is read back by the documentation verifier, so heading levels
 * and label shapes here are part of its contract: endpoint sections use
 * `###` and only `####` or deeper inside them.
 */

import { EXAMPLE_CELL_MAX_LENGTH } from './constants.js';
import { demoteHeadings, formatExample, formatInlineExample, inlineCode, safeReplace, schemaLink } from './formatters.js';
import type {
  DocumentModel,
  EndpointDoc,
  MediaDoc,
  ParameterRow,
  PropertyRow,
  RequestBodyDoc,
  ResponseDoc,
  SchemaDoc,
} from './types/document.js';
import type { LabelledExample, SecurityRequirement } from './types/openapi.js';

export interface DocumentRenderer {
  render(model: DocumentModel): string;
}

function requiredMark(required: boolean): string {
  return required ? '✅' : '❌';
}

function cell(text: string): string {
  return safeReplace(text).replace(/\|/g, '\\|');
}

function exampleCell(examples: LabelledExample[]): string {
  return examples
    .map(example => formatExample(example.value, EXAMPLE_CELL_MAX_LENGTH).replace(/\s*\n\s*/g, ' '))
    .map(text => inlineCode(text).replace(/\|/g, '\\|'))
    .join('<br>');
}

export class MarkdownRenderer implements DocumentRenderer {
  render(model: DocumentModel): string {
    const lines: string[] = [];

    lines.push(`# ${model.title}`);
    lines.push('');
    if (model.version) {
      lines.push(`**Version:** ${model.version}`);
      lines.push('');
    }
    if (model.description) {
      lines.push(model.description);
      lines.push('');
    }

    for (const group of model.groups) {
      lines.push(`## ${group.tag}`);
      lines.push('');
      for (const endpoint of group.endpoints) {
        this.renderEndpoint(endpoint, lines);
      }
    }

    if (model.schemas.length > 0) {
      lines.push('## Schemas');
      lines.push('');
      for (const schema of model.schemas) {
        this.renderSchema(schema, lines);
      }
    }

    return `${lines.join('\n').trimEnd()}\n`;
  }

  private renderEndpoint(endpoint: EndpointDoc, lines: string[]): void {
    lines.push(`### \`${endpoint.method}\` ${endpoint.path}`);
    lines.push('');

    if (endpoint.deprecated) {
      lines.push('> ⚠️ **Deprecated**: this operation may be removed in a future version.');
      lines.push('');
    }
    if (endpoint.summary) {
      lines.push(`**${endpoint.summary}**`);
      lines.push('');
    }
    if (endpoint.operationId) {
      lines.push(`**Operation ID:** \`${endpoint.operationId}\``);
      lines.push('');
    }
    if (endpoint.description) {
      lines.push(demoteHeadings(endpoint.description));
      lines.push('');
    }

    this.renderSecurity(endpoint.security, lines);
    this.renderParameters(endpoint.parameters, lines);
    if (endpoint.requestBody) {
      this.renderRequestBody(endpoint.requestBody, lines);
    }
    this.renderResponses(endpoint.responses, lines);

    lines.push('---');
    lines.push('');
  }

  private renderSecurity(security: SecurityRequirement[], lines: string[]): void {
    const items: string[] = [];
    for (const requirement of security) {
      for (const [scheme, scopes] of Object.entries(requirement)) {
        items.push(scopes.length > 0 ? `**${scheme}** (scopes: ${scopes.join(', ')})` : `**${scheme}**`);
      }
    }
    if (items.length === 0) return;

    lines.push('**Security requirements:**');
    lines.push('');
    for (const item of items) {
      lines.push(`- ${item}`);
    }
    lines.push('');
  }

  private renderParameters(parameters: ParameterRow[], lines: string[]): void {
    if (parameters.length === 0) return;

    lines.push('#### Parameters');
    lines.push('');
    lines.push('| Name | In | Type | Format | Required | Description | Examples |');
    lines.push('|------|----|------|--------|----------|-------------|----------|');
    for (const parameter of parameters) {
      lines.push(
        `| \`${parameter.name}\` | ${parameter.in} | ${cell(parameter.type)} | ${cell(parameter.format)} | ` +
          `${requiredMark(parameter.required)} | ${cell(parameter.description)} | ${exampleCell(parameter.examples)} |`
      );
    }
    lines.push('');

    const withExamples = parameters.filter(parameter => parameter.examples.length > 0);
    if (withExamples.length === 0) return;

    lines.push('#### Parameter examples');
    lines.push('');
    for (const parameter of withExamples) {
      lines.push(`**${parameter.name}**`);
      lines.push('');
      for (const example of parameter.examples) {
        lines.push(`**${example.label}:** ${inlineCode(formatInlineExample(example.value))}`);
        lines.push('');
      }
    }
  }

  private renderRequestBody(body: RequestBodyDoc, lines: string[]): void {
    lines.push('#### Request body');
    lines.push('');
    if (body.description) {
      lines.push(demoteHeadings(body.description));
      lines.push('');
    }
    lines.push(`**Required:** ${requiredMark(body.required)}`);
    lines.push('');

    for (const media of body.content) {
      this.renderMedia(media, lines);
      if (media.properties.length > 0) {
        this.renderPropertyTable(media.properties, lines);
      }
      this.renderExamples(media.examples, lines);
    }
  }

  private renderResponses(responses: ResponseDoc[], lines: string[]): void {
    if (responses.length === 0) return;

    lines.push('#### Responses');
    lines.push('');
    for (const response of responses) {
      lines.push(`###### **Code ${response.code}:** ${demoteHeadings(response.description)}`.trimEnd());
      lines.push('');
      for (const media of response.content) {
        this.renderMedia(media, lines);
        this.renderExamples(media.examples, lines);
      }
    }
  }

  private renderMedia(media: MediaDoc, lines: string[]): void {
    lines.push(`**Content type:** \`${media.contentType}\``);
    lines.push('');

    if (media.schemaRef !== undefined) {
      const title = media.schemaTitle ? ` (${media.schemaTitle})` : '';
      lines.push(`**Schema:** ${schemaLink(media.schemaRef)}${title}`);
      lines.push('');
    } else if (media.schemaType) {
      lines.push(`**Schema:** ${media.schemaType}`);
      lines.push('');
    }
  }

  private renderPropertyTable(properties: PropertyRow[], lines: string[]): void {
    lines.push('| Field | Type | Format | Required | Description | Examples |');
    lines.push('|-------|------|--------|----------|-------------|----------|');
    for (const property of properties) {
      lines.push(
        `| \`${property.name}\` | ${cell(property.type)} | ${cell(property.format)} | ` +
          `${requiredMark(property.required)} | ${cell(property.description)} | ${exampleCell(property.examples)} |`
      );
    }
    lines.push('');
  }

  private renderExamples(examples: LabelledExample[], lines: string[]): void {
    for (const example of examples) {
      lines.push(`**${example.label}:**`);
      lines.push('');
      lines.push('```json');
      lines.push(JSON.stringify(example.value, null, 2));
      lines.push('```');
      lines.push('');
    }
  }

  private renderSchema(schema: SchemaDoc, lines: string[]): void {
    lines.push(`### ${schema.name}`);
    lines.push('');
    if (schema.title) {
      lines.push(`**${schema.title}**`);
      lines.push('');
    }
    lines.push(`**Type:** ${schema.type}`);
    lines.push('');
    if (schema.description) {
      lines.push(demoteHeadings(schema.description));
      lines.push('');
    }
    if (schema.requiredFields.length > 0) {
      lines.push(`**Required fields:** ${schema.requiredFields.map(field => `\`${field}\``).join(', ')}`);
      lines.push('');
    }
    if (schema.properties.length > 0) {
      this.renderPropertyTable(schema.properties, lines);
    }
    if (schema.example !== undefined) {
      this.renderExamples([{ label: 'Example', value: schema.example }], lines);
    }
  }
}
