/**
 * Error Handling
 *
 * Reads from a graph object never throw: absence and off-kind values come back
 * as `undefined`. The errors below are raised only at explicit boundaries
 * (wrapping, facade definition, configuration, export), where a caller
 * handed in something the model cannot represent.
 *
 * Error Categories:
 * - GraphObjectError: Base class, carries a machine-readable code
 * - FacadeDefinitionError: A facade declaration is malformed
 * - FacadeWriteError: A value written through a declared facade is off-kind
 * - ConfigError: configure() received invalid settings
 * - SerializationError: A graph cannot be exported as plain JSON
 */

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCode = {
  UNKNOWN: 'unknown_error',
  INVALID_DOCUMENT: 'invalid_document',
  INDEX_OUT_OF_RANGE: 'index_out_of_range',
  INVALID_FACADE: 'invalid_facade',
  INVALID_VALUE: 'invalid_value',
  INVALID_CONFIG: 'invalid_config',
  CYCLE_DETECTED: 'cycle_detected',
  MAX_DEPTH_EXCEEDED: 'max_depth_exceeded',
} as const

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode]

export interface StructuredError {
  error: {
    name: string
    code: ErrorCodeValue
    message: string
    details?: Record<string, unknown>
    hint?: string
    cause?: string
  }
}

// ============================================================================
// Base Error
// ============================================================================

export interface GraphObjectErrorOptions {
  code?: ErrorCodeValue
  details?: Record<string, unknown>
  hint?: string
  cause?: Error
}

export class GraphObjectError extends Error {
  readonly code: ErrorCodeValue
  readonly details?: Record<string, unknown>
  readonly hint?: string

  constructor(message: string, options: GraphObjectErrorOptions = {}) {
    super(message)
    this.name = 'GraphObjectError'
    this.code = options.code ?? ErrorCode.UNKNOWN
    this.details = options.details
    this.hint = options.hint
    if (options.cause) {
      this.cause = options.cause
    }
  }

  /**
   * Convert to structured JSON format for machine consumption
   */
  toJSON(): StructuredError {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
        ...(this.hint !== undefined && { hint: this.hint }),
        ...(this.cause instanceof Error && { cause: this.cause.message }),
      },
    }
  }

  static invalidDocument(received: string): GraphObjectError {
    return new GraphObjectError(`Cannot wrap ${received} as a graph object`, {
      code: ErrorCode.INVALID_DOCUMENT,
      details: { received },
      hint: 'Pass a plain key/value document, or use GraphArray.wrap() for arrays.',
    })
  }

  static indexOutOfRange(index: number, length: number): GraphObjectError {
    return new GraphObjectError(`Index ${index} is out of range for a list of length ${length}`, {
      code: ErrorCode.INDEX_OUT_OF_RANGE,
      details: { index, length },
    })
  }
}

// ============================================================================
// Facade Errors
// ============================================================================

export class FacadeDefinitionError extends GraphObjectError {
  readonly facade: string

  constructor(facade: string, message: string, options: Omit<GraphObjectErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: ErrorCode.INVALID_FACADE })
    this.name = 'FacadeDefinitionError'
    this.facade = facade
  }
}

export class FacadeWriteError extends GraphObjectError {
  readonly facade: string
  readonly field: string

  constructor(facade: string, field: string, expected: string) {
    super(`Cannot write ${facade}.${field}: expected ${expected}`, {
      code: ErrorCode.INVALID_VALUE,
      details: { facade, field, expected },
    })
    this.name = 'FacadeWriteError'
    this.facade = facade
    this.field = field
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export interface ConfigIssue {
  field: string
  message: string
}

export class ConfigError extends GraphObjectError {
  readonly issues: ConfigIssue[]

  constructor(issues: ConfigIssue[]) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')
    super(`Invalid graph-facade configuration (${summary})`, {
      code: ErrorCode.INVALID_CONFIG,
      details: { issues },
    })
    this.name = 'ConfigError'
    this.issues = issues
  }
}

// ============================================================================
// Serialization Errors
// ============================================================================

export class SerializationError extends GraphObjectError {
  readonly path: string

  constructor(code: typeof ErrorCode.CYCLE_DETECTED | typeof ErrorCode.MAX_DEPTH_EXCEEDED, path: string[], limit?: number) {
    const at = path.length > 0 ? path.join('.') : '<root>'
    super(
      code === ErrorCode.CYCLE_DETECTED
        ? `Reference cycle at ${at}`
        : `Nesting deeper than ${limit} levels at ${at}`,
      {
        code,
        details: limit === undefined ? { path: at } : { path: at, maxDepth: limit },
        hint: code === ErrorCode.MAX_DEPTH_EXCEEDED ? 'Raise maxDepth with configure() if the document is legitimately deep.' : undefined,
      },
    )
    this.name = 'SerializationError'
    this.path = at
  }
}

export function isGraphObjectError(error: unknown): error is GraphObjectError {
  return error instanceof GraphObjectError
}
