import { describe, it, expect } from 'vitest';
import { formatVerificationResult, formatVerificationSummary } from './report-formatter.js';
import type { MissingItems, VerificationIssue, VerificationResult } from './types/verification.js';

function missingItems(overrides: Partial<MissingItems> = {}): MissingItems {
  return {
    security: [],
    responseExamples: [],
    parameterExamples: [],
    requestBodyExamples: [],
    deprecated: false,
    operationId: false,
    description: false,
    ...overrides,
  };
}

function lowIssue(message: string): VerificationIssue {
  return { type: 'missing_parameter_example', severity: 'low', message };
}

describe('formatVerificationResult', () => {
  it('reports a clean endpoint', () => {
    const result: VerificationResult = {
      endpoint: 'GET /a',
      hasIssues: false,
      issueCount: 0,
      issues: [],
      missingItems: missingItems(),
      summary: '✅ No information loss detected',
    };

    expect(formatVerificationResult(result)).toBe(
      '🔍 Verifying endpoint: GET /a\n\n✅ No information loss detected\n\n✅ All checks passed'
    );
  });

  it('lists at most five missing response examples', () => {
    const responseExamples = ['a', 'b', 'c', 'd', 'e', 'f'].map(name => ({ code: '200', name, value: name }));
    const result: VerificationResult = {
      endpoint: 'GET /a',
      hasIssues: true,
      issueCount: 1,
      issues: [{ type: 'missing_response_example', severity: 'medium', message: 'examples missing' }],
      missingItems: missingItems({ responseExamples }),
      summary: 'Issues found: 1 (🟡 Medium: 1)',
    };

    const lines = formatVerificationResult(result).split('\n');

    expect(lines).toContain('  Missing response examples: 6');
    expect(lines).toContain('    - 200: e');
    expect(lines).not.toContain('    - 200: f');
  });
});

describe('formatVerificationSummary', () => {
  it('shows the first three issues per endpoint', () => {
    const issues = ['one', 'two', 'three', 'four'].map(lowIssue);
    const output = formatVerificationSummary({
      totalEndpoints: 2,
      endpointsWithIssues: 1,
      totalIssues: 4,
      results: [
        {
          endpoint: 'GET /a',
          hasIssues: true,
          issueCount: 4,
          issues,
          missingItems: missingItems(),
          summary: 'Issues found: 4 (🟢 Low: 4)',
        },
        {
          endpoint: 'GET /b',
          hasIssues: false,
          issueCount: 0,
          issues: [],
          missingItems: missingItems(),
          summary: '✅ No information loss detected',
        },
      ],
    });

    expect(output.split('\n')).toEqual([
      '🔍 Verifying documentation',
      '',
      'Endpoints: 2',
      'Endpoints with issues: 1',
      'Issues: 4',
      '',
      'Endpoints with issues:',
      '',
      '  GET /a: 4 issue(s)',
      '    🟢 one',
      '    🟢 two',
      '    🟢 three',
      '    ... and 1 more',
    ]);
  });
});
