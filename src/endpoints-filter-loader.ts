/**
 * Endpoints filter file: one `METHOD path` pair per line, `#` comments
 */

import fs from 'fs/promises';
import { FileReadError, FilterFileNotFoundError } from './errors.js';
import { expandHome } from './spec-loader.js';
import { EndpointFilter } from './spec-model.js';

export function parseEndpointsFilter(text: string): EndpointFilter {
  const pairs: Array<[string, string]> = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const match = /^(\S+)\s+(.+)$/.exec(line);
    // Lines without both a method and a path are ignored
    if (!match) continue;

    pairs.push([match[1].toUpperCase(), match[2].trim()]);
  }

  return new EndpointFilter(pairs);
}

export async function loadEndpointsFilter(filePath: string): Promise<EndpointFilter> {
  const expanded = expandHome(filePath);

  let content: string;
  try {
    content = await fs.readFile(expanded, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FilterFileNotFoundError(expanded);
    }
    throw new FileReadError(expanded, error instanceof Error ? error.message : String(error));
  }

  return parseEndpointsFilter(content);
}
