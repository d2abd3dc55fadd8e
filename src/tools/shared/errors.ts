// ============================================================================
// Tool Errors
// ============================================================================
// Errors thrown inside a tool handler. The dispatcher turns every one of these
// into an isError result; none of them reach the host as a fault.
// ============================================================================

export type ToolErrorCode =
  | 'MISSING_ARGUMENTS'
  | 'INVALID_JSON'
  | 'INVALID_PARAMETER'
  | 'DOMAIN_ERROR'
  | 'DIVISION_BY_ZERO'
  | 'INVALID_BASE64'
  | 'ENCODING_ERROR';

export class ToolError extends Error {
  readonly code: ToolErrorCode;

  constructor(message: string, code: ToolErrorCode) {
    super(message);
    this.name = 'ToolError';
    this.code = code;
  }
}

export class MissingArgumentsError extends ToolError {
  constructor() {
    super('Missing arguments', 'MISSING_ARGUMENTS');
    this.name = 'MissingArgumentsError';
  }
}

export class InvalidJsonError extends ToolError {
  readonly detail: string;

  constructor(detail: string) {
    super(`Invalid JSON arguments: ${detail}`, 'INVALID_JSON');
    this.name = 'InvalidJsonError';
    this.detail = detail;
  }
}

export class MissingOrInvalidParameterError extends ToolError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing or invalid parameter '${field}'`, 'INVALID_PARAMETER');
    this.name = 'MissingOrInvalidParameterError';
    this.field = field;
  }
}

export class DomainError extends ToolError {
  constructor(message: string, code: ToolErrorCode = 'DOMAIN_ERROR') {
    super(message, code);
    this.name = 'DomainError';
  }
}

export class DivisionByZeroError extends DomainError {
  constructor() {
    super('Division by zero', 'DIVISION_BY_ZERO');
    this.name = 'DivisionByZeroError';
  }
}

export class InvalidBase64Error extends DomainError {
  constructor(detail: string) {
    super(`Invalid base64: ${detail}`, 'INVALID_BASE64');
    this.name = 'InvalidBase64Error';
  }
}

export class EncodingError extends ToolError {
  constructor(message: string) {
    super(message, 'ENCODING_ERROR');
    this.name = 'EncodingError';
  }
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}

/**
 * Raised while building a catalog. Unlike ToolError this is a provider
 * defect and is allowed to surface to the host.
 */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}
