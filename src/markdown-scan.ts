/**
 * Text scanning over rendered Markdown
 *
 * Helpers the verifier uses to find an endpoint's section and the labels,
 * JSON blocks and parameter examples rendered inside it.
 */

import { tryParseJson } from './stable-json.js';
import type { JsonValue } from './types/openapi.js';

export interface CodeBlock {
  text: string;
  /** Parsed content; undefined when the block is not valid JSON */
  value?: JsonValue;
}

const SECTION_BOUNDARY = /^(?:#{1,2}[ \t]|###[ \t]+`)/gm;
const RESPONSE_CODE_HEADING = /^######\s*\*\*Code\s+([0-9A-Za-z]+):\*\*/gm;
const LABEL = /\*\*([^*\n]+):\*\*/g;
const JSON_BLOCK = /```json\s*\n([\s\S]*?)\n```/g;
const PARAMETER_EXAMPLES_HEADING = '#### Parameter examples';
const PARAMETER_NAME_LINE = /^\*\*([^*]+)\*\*\s*$/;
const PARAMETER_EXAMPLE_LINE = /^\*\*([^*]+):\*\*\s*(`+)(.*)\2\s*$/;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Text from the ``### `METHOD` path`` heading up to the next endpoint,
 * tag or top-level heading. Undefined when the heading is absent.
 */
export function findEndpointSection(markdown: string, method: string, path: string): string | undefined {
  const heading = new RegExp(`###\\s*\`${escapeRegExp(method)}\`\\s+${escapeRegExp(path)}(?=\\s|$)`);
  const match = heading.exec(markdown);
  if (!match) return undefined;

  const start = match.index;
  const boundary = new RegExp(SECTION_BOUNDARY.source, SECTION_BOUNDARY.flags);
  boundary.lastIndex = start + match[0].length;
  const next = boundary.exec(markdown);

  return markdown.slice(start, next ? next.index : markdown.length);
}

/**
 * Text of one response code inside an endpoint section, from its
 * `###### **Code NNN:**` heading to the next code heading, at most `size`
 * characters
 */
export function responseCodeWindow(section: string, code: string, size: number): string | undefined {
  const headings = new RegExp(RESPONSE_CODE_HEADING.source, RESPONSE_CODE_HEADING.flags);
  let match: RegExpExecArray | null;

  while ((match = headings.exec(section)) !== null) {
    if (match[1] !== code) continue;

    const start = match.index;
    const following = headings.exec(section);
    const end = following ? following.index : section.length;
    return section.slice(start, Math.min(end, start + size));
  }

  return undefined;
}

/**
 * Every `**Label:**` in the text
 */
export function extractLabels(text: string): string[] {
  return Array.from(text.matchAll(LABEL), match => match[1].trim());
}

export function extractJsonBlocks(text: string): CodeBlock[] {
  return Array.from(text.matchAll(JSON_BLOCK), match => {
    const body = match[1].trim();
    return { text: body, value: tryParseJson(body) };
  });
}

function codeSpanContent(raw: string): string {
  if (raw.length > 1 && raw.startsWith(' ') && raw.endsWith(' ') && raw.trim() !== '') {
    return raw.slice(1, -1);
  }
  return raw;
}

/**
 * Inline example values listed per parameter under `#### Parameter examples`
 */
export function extractParameterExamples(text: string): Map<string, string[]> {
  const examples = new Map<string, string[]>();
  const start = text.indexOf(PARAMETER_EXAMPLES_HEADING);
  if (start === -1) return examples;

  const body = text.slice(start + PARAMETER_EXAMPLES_HEADING.length);
  let current: string | undefined;

  for (const rawLine of body.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('#')) break;

    const name = PARAMETER_NAME_LINE.exec(line);
    if (name) {
      current = name[1].trim();
      continue;
    }

    const example = PARAMETER_EXAMPLE_LINE.exec(line);
    if (example && current !== undefined) {
      const values = examples.get(current) ?? [];
      values.push(codeSpanContent(example[3]));
      examples.set(current, values);
    }
  }

  return examples;
}
