/**
 * Error hierarchy
 *
 * Every failure raised by the library is an `SqpoError` carrying a
 * category code. Operations fail fast; nothing is retried or logged here.
 */

export type SqpoErrorCode =
  | 'GRAPH_STRUCTURE'
  | 'INVALID_HOMOMORPHISM'
  | 'CATEGORY_PRECONDITION'
  | 'RULE_CONSTRUCTION'
  | 'HIERARCHY_CONSISTENCY'
  | 'REWRITING_TYPING'
  | 'PARSING'

export interface ErrorJSON {
  code: SqpoErrorCode
  message: string
  context?: Record<string, unknown>
}

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

export abstract class SqpoError extends Error {
  abstract readonly code: SqpoErrorCode

  constructor(
    message: string,
    readonly context?: Record<string, unknown>,
  ) {
    super(message)
  }

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      ...(this.context ? { context: this.context } : {}),
    }
  }

  toString(): string {
    return `[${this.code}] ${this.message}`
  }
}

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

/** Duplicate or missing node/edge on a primitive graph mutation. */
export class GraphStructureError extends SqpoError {
  readonly code = 'GRAPH_STRUCTURE'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context)
    this.name = 'GraphStructureError'
  }
}

/** A mapping violates totality, codomain, edge or attribute constraints. */
export class InvalidHomomorphismError extends SqpoError {
  readonly code = 'INVALID_HOMOMORPHISM'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context)
    this.name = 'InvalidHomomorphismError'
  }
}

/** Mismatched arguments of a categorical construction. */
export class CategoryOperatorPreconditionError extends SqpoError {
  readonly code = 'CATEGORY_PRECONDITION'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context)
    this.name = 'CategoryOperatorPreconditionError'
  }
}

/** Illegal edit of a rule. */
export class RuleConstructionError extends SqpoError {
  readonly code = 'RULE_CONSTRUCTION'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context)
    this.name = 'RuleConstructionError'
  }
}

/** Cycles, non-commuting paths or broken totality in a hierarchy. */
export class HierarchyConsistencyError extends SqpoError {
  readonly code = 'HIERARCHY_CONSISTENCY'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context)
    this.name = 'HierarchyConsistencyError'
  }
}

/** Contradictory or under-specified typing of a rewrite instance. */
export class RewritingTypingError extends SqpoError {
  readonly code = 'REWRITING_TYPING'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context)
    this.name = 'RewritingTypingError'
  }
}

/** JSON input rejected by schema validation. */
export class ParsingError extends SqpoError {
  readonly code = 'PARSING'

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context)
    this.name = 'ParsingError'
  }
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export const isSqpoError = (value: unknown): value is SqpoError =>
  value instanceof SqpoError

export const hasErrorCode = (
  value: unknown,
  code: SqpoErrorCode,
): value is SqpoError => isSqpoError(value) && value.code === code
