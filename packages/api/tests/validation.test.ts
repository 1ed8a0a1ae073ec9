import {
  ConversionError,
  generalizedStatementError,
  InvalidArgumentError,
  notConcreteError,
  TermError,
  TermErrorCode,
  validateIRI,
  validateLanguageTag,
} from '@termbridge/api'
import { describe, expect, it } from 'vitest'

describe('validateIRI', () => {
  it('returns an acceptable IRI unchanged', () => {
    expect(validateIRI('http://example.org/a#b')).toBe('http://example.org/a#b')
  })

  it.each([
    'http://example.org/a b',
    'http://example.org/<a',
    'http://example.org/a>',
  ])('rejects %s', (iri) => {
    expect(() => validateIRI(iri)).toThrow(InvalidArgumentError)
    expect(() => validateIRI(iri)).toThrow(`Invalid IRI: ${iri}`)
  })

  it('is only a cheap guard', () => {
    expect(validateIRI('not-an-absolute-iri')).toBe('not-an-absolute-iri')
  })
})

describe('validateLanguageTag', () => {
  it('accepts a tag without spaces and lowers its case', () => {
    expect(validateLanguageTag('en-GB')).toBe('en-gb')
  })

  it('rejects an empty tag', () => {
    expect(() => validateLanguageTag('')).toThrow(InvalidArgumentError)
  })

  it('rejects a tag containing a space', () => {
    expect(() => validateLanguageTag('en GB')).toThrow('Invalid language tag: en GB')
  })

  it('reports INVALID_ARGUMENT', () => {
    let caught: unknown
    try {
      validateLanguageTag('en GB')
    }
    catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(InvalidArgumentError)
    expect(caught).toMatchObject({ code: TermErrorCode.INVALID_ARGUMENT })
  })
})

describe('errors', () => {
  it('notConcreteError is a ConversionError', () => {
    const err = notConcreteError('?x')
    expect(err).toBeInstanceOf(ConversionError)
    expect(err).toBeInstanceOf(TermError)
    expect(err.name).toBe('ConversionError')
    expect(err.code).toBe(TermErrorCode.CONVERSION)
    expect(err.message).toBe('Not a concrete RDF term: ?x')
  })

  it('generalizedStatementError keeps its cause', () => {
    const cause = new Error('inner')
    const err = generalizedStatementError('quad', '?s ?p ?o .', cause)
    expect(err.message).toBe('Can\'t convert generalized quad: ?s ?p ?o .')
    expect(err.cause).toBe(cause)
  })
})
