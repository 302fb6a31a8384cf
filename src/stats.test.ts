/**
 * Tests for endpoint listing and statistics
 */

import { describe, it, expect } from 'vitest';
import { EndpointFinder } from './endpoint-finder.js';
import { createEndpoint } from './spec-model.js';
import { calculateStats, extractVersion, formatEndpointList, formatStats } from './stats.js';
import { petStoreSpec } from './testing/fixtures.js';

const endpoints = new EndpointFinder().listAll(petStoreSpec());

describe('extractVersion', () => {
  it('should find versions after /api or at any segment', () => {
    expect(extractVersion('/api/v3/users')).toBe('v3');
    expect(extractVersion('/v2/health')).toBe('v2');
    expect(extractVersion('/pets')).toBe('unversioned');
    expect(extractVersion('/v2')).toBe('unversioned');
  });
});

describe('calculateStats', () => {
  it('should count endpoints by method, version and tag', () => {
    const stats = calculateStats(endpoints);

    expect(stats).toMatchObject({
      total: 5,
      uniquePaths: 3,
      withSummary: 5,
      summaryPercent: 100,
      withoutTags: 0,
      deprecated: 1,
      deprecatedPercent: 20,
      methods: { GET: 3, POST: 1, DELETE: 1 },
      versions: { unversioned: 4, v2: 1 },
      tags: { pets: 4, admin: 1, Untagged: 1 },
    });
  });

  it('should count an explicit empty tag list as untagged', () => {
    const stats = calculateStats([createEndpoint('/a', 'get', { tags: [] })]);

    expect(stats.withoutTags).toBe(1);
    expect(stats.withoutTagsPercent).toBe(100);
    expect(stats.tags).toEqual({ Untagged: 1 });
  });

  it('should handle no endpoints', () => {
    const stats = calculateStats([]);

    expect(stats.total).toBe(0);
    expect(stats.summaryPercent).toBe(0);
  });
});

describe('formatStats', () => {
  it('should render overview and bar rows', () => {
    const lines = formatStats(calculateStats(endpoints)).split('\n');

    expect(lines[0]).toBe('📊 API statistics');
    expect(lines).toContain('  Endpoints: 5');
    expect(lines).toContain('  With summary: 5 (100.0%)');
    expect(lines).toContain('  Deprecated: 1 (20.0%)');
    expect(lines).toContain(`  GET      3  ${'█'.repeat(30)}   60.0%`);
    expect(lines).toContain(`  v2             1  ${'█'.repeat(10)}   20.0%`);
    expect(lines).toContain(`  ${'pets'.padEnd(20)}   4  ( 80.0%)`);
  });

  it('should show only the ten largest tags', () => {
    const many = Array.from({ length: 12 }, (_, index) => createEndpoint(`/t${index}`, 'get', { tags: [`tag${index}`] }));

    const output = formatStats(calculateStats(many));

    expect(output).toContain('  tag9 ');
    expect(output).not.toContain('  tag10 ');
    expect(output.endsWith('  ... (2 more tags)')).toBe(true);
  });
});

describe('formatEndpointList', () => {
  it('should list sorted endpoints', () => {
    expect(formatEndpointList(endpoints)).toBe([
      'DELETE /pets/{petId}',
      'GET /pets',
      'GET /pets/{petId}',
      'GET /v2/health',
      'POST /pets',
    ].join('\n'));
  });

  it('should append summaries', () => {
    expect(formatEndpointList(endpoints, { withSummary: true }).split('\n')[1]).toBe('GET /pets - List pets');
  });

  it('should group by tag', () => {
    expect(formatEndpointList(endpoints, { groupByTag: true })).toBe([
      '## Untagged',
      'GET /v2/health',
      '',
      '## admin',
      'DELETE /pets/{petId}',
      '',
      '## pets',
      'DELETE /pets/{petId}',
      'GET /pets',
      'GET /pets/{petId}',
      'POST /pets',
    ].join('\n'));
  });
});
