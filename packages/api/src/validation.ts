import { z } from 'zod/v4'
import { invalidIRIError, invalidLanguageTagError } from './errors'

// Cheap syntactic guards only; full RFC 3987 / BCP 47 parsing is out of scope.
export const IRIStringSchema = z.string().regex(/^[^ <>]*$/)

// Tags are kept in lower case, as n3 stores them, so equal tags compare equal across implementations
export const LanguageTagSchema = z.string().regex(/^[^ ]+$/).transform(tag => tag.toLowerCase())

/**
 * Reject IRI strings containing a space or an angle bracket
 */
export function validateIRI(iri: string): string {
  const result = IRIStringSchema.safeParse(iri)
  if (!result.success)
    throw invalidIRIError(iri)
  return result.data
}

/**
 * Reject empty language tags and tags containing a space. Returns the tag in lower case.
 */
export function validateLanguageTag(languageTag: string): string {
  const result = LanguageTagSchema.safeParse(languageTag)
  if (!result.success)
    throw invalidLanguageTagError(languageTag)
  return result.data
}
