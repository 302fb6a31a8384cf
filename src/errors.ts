/**
 * Structured error types
 *
 * Every failure surfaced to callers carries a machine-readable code and
 * structured details. Unresolvable references are not errors: the resolver
 * degrades them to empty objects instead.
 */

export class DocToolError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocToolError';
  }
}

export class SpecNotFoundError extends DocToolError {
  constructor(filePath: string) {
    super(`Specification file not found: ${filePath}`, 'SPEC_NOT_FOUND', { filePath });
    this.name = 'SpecNotFoundError';
  }
}

export class MarkdownNotFoundError extends DocToolError {
  constructor(filePath: string) {
    super(`Markdown file not found: ${filePath}`, 'MARKDOWN_NOT_FOUND', { filePath });
    this.name = 'MarkdownNotFoundError';
  }
}

export class FilterFileNotFoundError extends DocToolError {
  constructor(filePath: string) {
    super(`Endpoints filter file not found: ${filePath}`, 'FILTER_NOT_FOUND', { filePath });
    this.name = 'FilterFileNotFoundError';
  }
}

export class MalformedSpecError extends DocToolError {
  constructor(filePath: string, reason: string) {
    super(`Invalid specification in ${filePath}: ${reason}`, 'MALFORMED_SPEC', { filePath, reason });
    this.name = 'MalformedSpecError';
  }
}

export class FileReadError extends DocToolError {
  constructor(filePath: string, reason: string) {
    super(`Failed to read ${filePath}: ${reason}`, 'FILE_READ_ERROR', { filePath, reason });
    this.name = 'FileReadError';
  }
}

export class FileWriteError extends DocToolError {
  constructor(filePath: string, reason: string) {
    super(`Failed to write ${filePath}: ${reason}`, 'FILE_WRITE_ERROR', { filePath, reason });
    this.name = 'FileWriteError';
  }
}

export class PathNotFoundError extends DocToolError {
  constructor(path: string) {
    super(`Path '${path}' not found in specification`, 'PATH_NOT_FOUND', { path });
    this.name = 'PathNotFoundError';
  }
}

export class MethodNotFoundError extends DocToolError {
  constructor(
    method: string,
    path: string,
    public availableMethods: string[]
  ) {
    super(
      `Method ${method} not found for '${path}'. Available methods: ${availableMethods.join(', ')}`,
      'METHOD_NOT_FOUND',
      { method, path, availableMethods }
    );
    this.name = 'MethodNotFoundError';
  }
}

export class SchemaNotFoundError extends DocToolError {
  constructor(
    schemaName: string,
    public availableSchemas: string[]
  ) {
    super(
      `Schema '${schemaName}' not found. Available schemas: ${availableSchemas.join(', ')}`,
      'SCHEMA_NOT_FOUND',
      { schemaName, availableSchemas }
    );
    this.name = 'SchemaNotFoundError';
  }
}

export class ConfigurationError extends DocToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper function to check if an error is a DocToolError
 */
export function isDocToolError(error: unknown): error is DocToolError {
  return error instanceof DocToolError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isDocToolError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
