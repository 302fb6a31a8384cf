/**
 * Display formatting for schema nodes: type notation, examples, descriptions
 *
 * All functions are pure and accept raw or processed nodes.
 */

import { ORIGINAL_REF_KEY, PRIMITIVE_TYPES, REF_PREFIX } from './constants.js';
import { refName } from './ref-resolver.js';
import {
  getArray,
  getObject,
  getString,
  hasKey,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  type LabelledExample,
} from './types/openapi.js';

const EXAMPLE_LABEL = 'Example';

/**
 * Markdown link to a schema section: `[Pet](#pet)`
 */
export function schemaLink(name: string): string {
  return `[${name}](#${name.toLowerCase()})`;
}

function isPrimitiveType(value: string): boolean {
  return PRIMITIVE_TYPES.some(type => type === value);
}

function formatBranches(branches: JsonValue[], separator: string): string {
  return branches
    .map(branch => (isJsonObject(branch) ? formatType(branch) : 'object'))
    .join(separator);
}

/**
 * Readable type notation for a schema node
 */
export function formatType(schema: JsonObject): string {
  const originalRef = getString(schema, ORIGINAL_REF_KEY);
  if (originalRef?.startsWith(REF_PREFIX.SCHEMAS)) {
    return schemaLink(refName(originalRef));
  }

  const ref = getString(schema, '$ref');
  if (ref !== undefined) {
    return schemaLink(refName(ref));
  }

  if (hasKey(schema, 'additionalProperties')) {
    const valueSchema = getObject(schema, 'additionalProperties');
    return valueSchema ? `object<string, ${formatType(valueSchema)}>` : 'object';
  }

  const anyOf = getArray(schema, 'anyOf');
  if (anyOf) return `anyOf<${formatBranches(anyOf, ' , ')}>`;

  const oneOf = getArray(schema, 'oneOf');
  if (oneOf) return `oneOf<${formatBranches(oneOf, ' , ')}>`;

  const allOf = getArray(schema, 'allOf');
  if (allOf) return `allOf<${formatBranches(allOf, ' & ')}>`;

  const type = schema.type;
  const items = getObject(schema, 'items');
  if (type === 'array' && items) {
    const itemType = formatType(items);
    const baseType = getString(items, 'type');
    if (baseType !== undefined && isPrimitiveType(baseType)) {
      return `array<${baseType}>`;
    }
    return `array<${itemType}>`;
  }

  if (type === 'object' && hasKey(schema, 'properties')) {
    return 'object';
  }

  if (typeof type === 'string') return type;
  if (Array.isArray(type)) {
    return type.filter((member): member is string => typeof member === 'string').join(' | ');
  }
  return 'object';
}

/**
 * `description`, falling back to `title`, then the empty string
 */
export function formatDescription(node: JsonObject): string {
  return getString(node, 'description') || getString(node, 'title') || '';
}

/**
 * Make free text safe for a single Markdown table cell
 */
export function safeReplace(text: string | undefined): string {
  if (!text) return '';
  return text.replace(/\n/g, '<br>').replace(/ {2}- /g, '<br>- ');
}

/**
 * Example value for display; structured values are pretty-printed JSON
 * truncated to `maxLength` characters plus "..."
 */
export function formatExample(example: JsonValue | undefined, maxLength = 150): string {
  if (example === undefined || example === null) return '';

  if (typeof example === 'object') {
    const text = JSON.stringify(example, null, 2);
    return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
  }

  return String(example);
}

/**
 * Single-line rendering used for inline code spans; strings with line
 * breaks are written as JSON string literals
 */
export function formatInlineExample(example: JsonValue): string {
  if (typeof example === 'string' && !/[\r\n]/.test(example)) return example;
  return JSON.stringify(example);
}

/**
 * Inline code span whose fence is longer than any backtick run in `text`
 */
export function inlineCode(text: string): string {
  const longestRun = Math.max(0, ...Array.from(text.matchAll(/`+/g), match => match[0].length));
  const fence = '`'.repeat(longestRun + 1);
  const spaced = text.startsWith(' ') && text.endsWith(' ') && text.trim() !== '';
  const padded = spaced || text.startsWith('`') || text.endsWith('`') ? ` ${text} ` : text;
  return `${fence}${padded}${fence}`;
}

/**
 * Level 1-3 headings in free text rewritten as level 4
 */
export function demoteHeadings(text: string): string {
  return text.replace(/^#{1,3}(?=[ \t])/gm, '####');
}

function collectExamples(node: JsonObject, into: LabelledExample[]): void {
  if (hasKey(node, 'example')) {
    into.push({ label: EXAMPLE_LABEL, value: node.example });
  }

  const examples = node.examples;
  if (isJsonObject(examples)) {
    for (const [name, data] of Object.entries(examples)) {
      if (isJsonObject(data) && hasKey(data, 'value')) {
        into.push({ label: getString(data, 'summary') ?? name, value: data.value });
      } else {
        into.push({ label: name, value: data });
      }
    }
  } else if (Array.isArray(examples)) {
    examples.forEach((value, index) => {
      into.push({ label: `${EXAMPLE_LABEL} ${index + 1}`, value });
    });
  }
}

/**
 * All examples declared on a node, in source order: `example`, then each
 * entry of `examples`, then the same two keys on a nested `schema`
 */
export function extractExamples(node: JsonObject): LabelledExample[] {
  const examples: LabelledExample[] = [];
  collectExamples(node, examples);

  const schema = getObject(node, 'schema');
  if (schema) {
    collectExamples(schema, examples);
  }

  return examples;
}
