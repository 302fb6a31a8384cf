/**
 * Specification and Markdown file loading
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { FileReadError, FileWriteError, MalformedSpecError, MarkdownNotFoundError, SpecNotFoundError } from './errors.js';
import { createSpec } from './spec-model.js';
import { isJsonObject, type Spec } from './types/openapi.js';

export interface SpecLoader {
  load(source: string): Promise<Spec>;
}

/**
 * Replace a leading `~` with the user's home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FileSpecLoader implements SpecLoader {
  async load(source: string): Promise<Spec> {
    const expanded = expandHome(source);

    let resolved: string;
    let content: string;
    try {
      resolved = await fs.realpath(expanded);
      content = await fs.readFile(resolved, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) throw new SpecNotFoundError(expanded);
      throw new FileReadError(expanded, reason(error));
    }

    let document: unknown;
    try {
      document = this.isYaml(resolved) ? parseYaml(content) : JSON.parse(content);
    } catch (error) {
      throw new MalformedSpecError(resolved, reason(error));
    }

    if (!isJsonObject(document)) {
      throw new MalformedSpecError(resolved, 'document root must be an object');
    }

    return createSpec(document);
  }

  private isYaml(filePath: string): boolean {
    const extension = path.extname(filePath).toLowerCase();
    return extension === '.yaml' || extension === '.yml';
  }
}

export async function readMarkdownFile(filePath: string): Promise<string> {
  const expanded = expandHome(filePath);
  try {
    return await fs.readFile(expanded, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) throw new MarkdownNotFoundError(expanded);
    throw new FileReadError(expanded, reason(error));
  }
}

/**
 * Write command output to a file, creating parent directories
 */
export async function writeOutputFile(filePath: string, content: string): Promise<string> {
  const expanded = expandHome(filePath);
  try {
    await fs.mkdir(path.dirname(expanded), { recursive: true });
    await fs.writeFile(expanded, content, 'utf-8');
  } catch (error) {
    throw new FileWriteError(expanded, reason(error));
  }
  return expanded;
}
