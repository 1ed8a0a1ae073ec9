import type * as RDF from '@rdfjs/types'
import { RDF_LANG_STRING, XSD_STRING } from './vocabulary'

/**
 * Term kinds in the abstract model
 */
export const TermType = {
  IRI: 'iri',
  Literal: 'literal',
  BlankNode: 'blank',
  Variable: 'variable',
} as const

export type TermType = (typeof TermType)[keyof typeof TermType]

interface BaseTerm {
  readonly termType: TermType
  /** N-Triples (or SPARQL, for variables) rendering of the term */
  ntriplesString: () => string
  /** Value equality, independent of the implementation that built either side */
  equals: (other: Term) => boolean
  /**
   * The native node this term adapts, if it was produced by a native adaptation layer.
   * Terms built by any other implementation return undefined.
   */
  asNativeHandle: () => RDF.Term | undefined
}

export interface IRI extends BaseTerm {
  readonly termType: 'iri'
  readonly iriString: string
  asNativeHandle: () => RDF.NamedNode | undefined
}

export interface Literal extends BaseTerm {
  readonly termType: 'literal'
  readonly lexicalForm: string
  /** xsd:string for plain literals, rdf:langString when a language tag is present */
  readonly datatype: IRI
  readonly languageTag: string | undefined
  asNativeHandle: () => RDF.Literal | undefined
}

export interface BlankNode extends BaseTerm {
  readonly termType: 'blank'
  /** Identity of the blank node; stable within one salt session */
  readonly uniqueReference: string
  asNativeHandle: () => RDF.BlankNode | undefined
}

/**
 * Non-concrete pattern placeholder. Only the generalized adapters produce these.
 */
export interface Variable extends BaseTerm {
  readonly termType: 'variable'
  readonly name: string
  asNativeHandle: () => RDF.Variable | undefined
}

export type BlankNodeOrIRI = BlankNode | IRI

/** Concrete terms */
export type RDFTerm = IRI | Literal | BlankNode

/** Anything that may sit in a generalized position */
export type Term = RDFTerm | Variable

// ==================== Value semantics ====================

/** Compare two terms by value */
export function termEquals(a: Term, b: Term): boolean {
  switch (a.termType) {
    case TermType.IRI:
      return b.termType === TermType.IRI && a.iriString === b.iriString
    case TermType.BlankNode:
      return b.termType === TermType.BlankNode && a.uniqueReference === b.uniqueReference
    case TermType.Variable:
      return b.termType === TermType.Variable && a.name === b.name
    case TermType.Literal:
      return b.termType === TermType.Literal
        && a.lexicalForm === b.lexicalForm
        && a.datatype.iriString === b.datatype.iriString
        && a.languageTag === b.languageTag
  }
}

function escapeLexical(lexicalForm: string): string {
  return lexicalForm
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
}

export function iriToNTriples(iriString: string): string {
  return `<${iriString}>`
}

export function literalToNTriples(lexicalForm: string, datatype: string, languageTag: string | undefined): string {
  const quoted = `"${escapeLexical(lexicalForm)}"`
  if (languageTag)
    return `${quoted}@${languageTag}`
  if (datatype === XSD_STRING)
    return quoted
  return `${quoted}^^${iriToNTriples(datatype)}`
}

export function blankNodeToNTriples(uniqueReference: string): string {
  return `_:${uniqueReference}`
}

/** Datatype IRI string implied by an optional language tag */
export function impliedDatatype(languageTag: string | undefined): string {
  return languageTag ? RDF_LANG_STRING : XSD_STRING
}
