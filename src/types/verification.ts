/**
 * Verification report types
 */

import type { JsonValue, SecurityRequirement } from './openapi.js';

export type IssueSeverity = 'high' | 'medium' | 'low';

export type IssueType =
  | 'missing_security'
  | 'missing_deprecated'
  | 'missing_operation_id'
  | 'missing_description'
  | 'missing_response_example'
  | 'missing_parameter_example'
  | 'missing_request_body_example';

export interface VerificationIssue {
  type: IssueType;
  severity: IssueSeverity;
  message: string;
}

export interface MissingItems {
  security: SecurityRequirement[];
  responseExamples: Array<{ code: string; name: string; value: JsonValue }>;
  parameterExamples: Array<{ parameter: string; example: JsonValue }>;
  requestBodyExamples: Array<{ name: string; value: JsonValue }>;
  deprecated: boolean;
  operationId: boolean;
  description: boolean;
}

export interface VerificationResult {
  /** "METHOD path" */
  endpoint: string;
  hasIssues: boolean;
  issueCount: number;
  issues: VerificationIssue[];
  missingItems: MissingItems;
  summary: string;
}

export interface VerificationReport {
  totalEndpoints: number;
  endpointsWithIssues: number;
  totalIssues: number;
  results: VerificationResult[];
}
