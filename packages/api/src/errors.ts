/**
 * Error codes for term adaptation
 */
export const TermErrorCode = {
  CONVERSION: 'CONVERSION',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const

export type TermErrorCode = (typeof TermErrorCode)[keyof typeof TermErrorCode]

/**
 * Base error for the term model and its adapters
 */
export class TermError extends Error {
  constructor(
    public code: TermErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'TermError'
  }
}

/**
 * A native node, triple or quad has no representation as the requested term kind
 */
export class ConversionError extends TermError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(TermErrorCode.CONVERSION, message, options)
    this.name = 'ConversionError'
  }
}

/**
 * Rejected at construction time by a syntactic guard
 */
export class InvalidArgumentError extends TermError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(TermErrorCode.INVALID_ARGUMENT, message, options)
    this.name = 'InvalidArgumentError'
  }
}

export function notConcreteError(description: string): ConversionError {
  return new ConversionError(`Not a concrete RDF term: ${description}`)
}

export function generalizedStatementError(kind: 'triple' | 'quad', description: string, cause?: unknown): ConversionError {
  return new ConversionError(`Can't convert generalized ${kind}: ${description}`, { cause })
}

export function invalidIRIError(iri: string): InvalidArgumentError {
  return new InvalidArgumentError(`Invalid IRI: ${iri}`)
}

export function invalidLanguageTagError(languageTag: string): InvalidArgumentError {
  return new InvalidArgumentError(`Invalid language tag: ${languageTag}`)
}
