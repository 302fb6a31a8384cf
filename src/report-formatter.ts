/**
 * Text output for verification results
 */

import type { IssueSeverity, VerificationReport, VerificationResult } from './types/verification.js';

const SEVERITY_ICON: Record<IssueSeverity, string> = {
  high: '🔴',
  medium: '🟡',
  low: '🟢',
};

const MAX_MISSING_RESPONSE_EXAMPLES = 5;
const MAX_ISSUES_PER_ENDPOINT = 3;
const ALL_PASSED = '✅ All checks passed';

export function formatVerificationResult(result: VerificationResult): string {
  const lines: string[] = [`🔍 Verifying endpoint: ${result.endpoint}`, '', result.summary];

  if (!result.hasIssues) {
    lines.push('', ALL_PASSED);
    return lines.join('\n');
  }

  lines.push('', 'Issues:', '');
  for (const issue of result.issues) {
    lines.push(`  ${SEVERITY_ICON[issue.severity]} [${issue.severity.toUpperCase()}] ${issue.message}`);
  }

  const missing = result.missingItems;
  if (missing.security.length > 0) {
    lines.push('', `  Missing security: ${JSON.stringify(missing.security)}`);
  }
  if (missing.deprecated) {
    lines.push('', '  Missing deprecated status');
  }
  if (missing.operationId) {
    lines.push('', '  Missing operationId');
  }
  if (missing.description) {
    lines.push('', '  Missing description');
  }
  if (missing.responseExamples.length > 0) {
    lines.push('', `  Missing response examples: ${missing.responseExamples.length}`);
    for (const example of missing.responseExamples.slice(0, MAX_MISSING_RESPONSE_EXAMPLES)) {
      lines.push(`    - ${example.code}: ${example.name}`);
    }
  }
  if (missing.parameterExamples.length > 0) {
    lines.push('', `  Missing parameter examples: ${missing.parameterExamples.length}`);
  }
  if (missing.requestBodyExamples.length > 0) {
    lines.push('', `  Missing request body examples: ${missing.requestBodyExamples.length}`);
  }

  return lines.join('\n');
}

export function formatVerificationSummary(report: VerificationReport): string {
  const lines: string[] = [
    '🔍 Verifying documentation',
    '',
    `Endpoints: ${report.totalEndpoints}`,
    `Endpoints with issues: ${report.endpointsWithIssues}`,
    `Issues: ${report.totalIssues}`,
  ];

  if (report.totalIssues === 0) {
    lines.push('', ALL_PASSED);
    return lines.join('\n');
  }

  lines.push('', 'Endpoints with issues:');
  for (const result of report.results) {
    if (!result.hasIssues) continue;

    lines.push('', `  ${result.endpoint}: ${result.issueCount} issue(s)`);
    for (const issue of result.issues.slice(0, MAX_ISSUES_PER_ENDPOINT)) {
      lines.push(`    ${SEVERITY_ICON[issue.severity]} ${issue.message}`);
    }
    if (result.issueCount > MAX_ISSUES_PER_ENDPOINT) {
      lines.push(`    ... and ${result.issueCount - MAX_ISSUES_PER_ENDPOINT} more`);
    }
  }

  return lines.join('\n');
}
