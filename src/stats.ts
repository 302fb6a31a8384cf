/**
 * Endpoint listing and API statistics
 */

import { DEFAULT_TAG } from './constants.js';
import { endpointLabel } from './spec-model.js';
import { getString, type Endpoint } from './types/openapi.js';

export interface ApiStats {
  total: number;
  uniquePaths: number;
  withSummary: number;
  summaryPercent: number;
  withoutTags: number;
  withoutTagsPercent: number;
  deprecated: number;
  deprecatedPercent: number;
  methods: Record<string, number>;
  versions: Record<string, number>;
  tags: Record<string, number>;
}

export interface ListOptions {
  withSummary?: boolean;
  groupByTag?: boolean;
}

const UNVERSIONED = 'unversioned';
const MAX_TAGS_SHOWN = 10;
const MAX_BAR_LENGTH = 50;

function percent(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * `v1` from `/api/v1/...` or `/v1/...`; `unversioned` otherwise
 */
export function extractVersion(path: string): string {
  const match = /\/api\/(v\d+)\//.exec(path) ?? /\/(v\d+)\//.exec(path);
  return match ? match[1] : UNVERSIONED;
}

export function calculateStats(endpoints: Endpoint[]): ApiStats {
  const total = endpoints.length;
  const methods: Record<string, number> = {};
  const versions: Record<string, number> = {};
  const tags: Record<string, number> = {};

  for (const endpoint of endpoints) {
    increment(methods, endpoint.method);
    increment(versions, extractVersion(endpoint.path));
    if (endpoint.tags.length === 0) {
      increment(tags, DEFAULT_TAG);
    }
    for (const tag of endpoint.tags) {
      increment(tags, tag);
    }
  }

  const withSummary = endpoints.filter(endpoint => Boolean(getString(endpoint.operation, 'summary'))).length;
  const withoutTags = endpoints.filter(endpoint => endpoint.tags.length === 0).length;
  const deprecated = endpoints.filter(endpoint => endpoint.operation.deprecated === true).length;

  return {
    total,
    uniquePaths: new Set(endpoints.map(endpoint => endpoint.path)).size,
    withSummary,
    summaryPercent: percent(withSummary, total),
    withoutTags,
    withoutTagsPercent: percent(withoutTags, total),
    deprecated,
    deprecatedPercent: percent(deprecated, total),
    methods,
    versions,
    tags,
  };
}

function byCountDesc(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort((a, b) => b[1] - a[1]);
}

function barRow(label: string, width: number, count: number, total: number): string {
  const bar = '█'.repeat(total > 0 ? Math.floor((count / total) * MAX_BAR_LENGTH) : 0);
  const share = percent(count, total).toFixed(1).padStart(5);
  return `  ${label.padEnd(width)} ${String(count).padStart(3)}  ${bar}  ${share}%`;
}

export function formatStats(stats: ApiStats): string {
  const lines: string[] = [];
  lines.push('📊 API statistics');
  lines.push('');
  lines.push('Overview:');
  lines.push('');
  lines.push(`  Endpoints: ${stats.total}`);
  lines.push(`  Unique paths: ${stats.uniquePaths}`);
  lines.push(`  With summary: ${stats.withSummary} (${stats.summaryPercent.toFixed(1)}%)`);
  lines.push(`  Without tags: ${stats.withoutTags} (${stats.withoutTagsPercent.toFixed(1)}%)`);
  if (stats.deprecated > 0) {
    lines.push(`  Deprecated: ${stats.deprecated} (${stats.deprecatedPercent.toFixed(1)}%)`);
  }

  const methods = byCountDesc(stats.methods);
  if (methods.length > 0) {
    lines.push('');
    lines.push('By HTTP method:');
    lines.push('');
    for (const [method, count] of methods) {
      lines.push(barRow(method, 6, count, stats.total));
    }
  }

  const versions = byCountDesc(stats.versions);
  if (versions.length > 0) {
    lines.push('');
    lines.push('By API version:');
    lines.push('');
    for (const [version, count] of versions) {
      lines.push(barRow(version, 12, count, stats.total));
    }
  }

  const tags = byCountDesc(stats.tags);
  if (tags.length > 0) {
    lines.push('');
    lines.push('By tag:');
    lines.push('');
    for (const [tag, count] of tags.slice(0, MAX_TAGS_SHOWN)) {
      const share = percent(count, stats.total).toFixed(1).padStart(5);
      lines.push(`  ${tag.padEnd(20)} ${String(count).padStart(3)}  (${share}%)`);
    }
    if (tags.length > MAX_TAGS_SHOWN) {
      lines.push(`  ... (${tags.length - MAX_TAGS_SHOWN} more tags)`);
    }
  }

  return lines.join('\n');
}

function listingLine(endpoint: Endpoint, withSummary: boolean): string {
  const summary = withSummary ? getString(endpoint.operation, 'summary') : undefined;
  return summary ? `${endpointLabel(endpoint)} - ${summary}` : endpointLabel(endpoint);
}

/**
 * Sorted `METHOD path` lines, optionally grouped under their tags
 */
export function formatEndpointList(endpoints: Endpoint[], options: ListOptions = {}): string {
  const withSummary = options.withSummary ?? false;
  const sortLines = (items: Endpoint[]) => items.map(endpoint => listingLine(endpoint, withSummary)).sort();

  if (!options.groupByTag) {
    return sortLines(endpoints).join('\n');
  }

  const groups = new Map<string, Endpoint[]>();
  for (const endpoint of endpoints) {
    for (const tag of endpoint.tags.length > 0 ? endpoint.tags : [DEFAULT_TAG]) {
      const group = groups.get(tag) ?? [];
      group.push(endpoint);
      groups.set(tag, group);
    }
  }

  const sections: string[] = [];
  for (const tag of Array.from(groups.keys()).sort()) {
    sections.push([`## ${tag}`, ...sortLines(groups.get(tag) ?? [])].join('\n'));
  }
  return sections.join('\n\n');
}
