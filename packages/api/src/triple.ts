import type * as RDF from '@rdfjs/types'
import type { BlankNodeOrIRI, IRI, RDFTerm, Term } from './term'
import { termEquals } from './term'

/**
 * Statement shape with no value semantics attached
 */
export interface TripleLike<S extends Term = Term, P extends Term = Term, O extends Term = Term> {
  readonly subject: S
  readonly predicate: P
  readonly object: O
}

export interface QuadLike<
  S extends Term = Term,
  P extends Term = Term,
  O extends Term = Term,
  G extends Term = Term,
> extends TripleLike<S, P, O> {
  /** undefined for the default graph */
  readonly graphName: G | undefined
}

export interface Triple extends TripleLike<BlankNodeOrIRI, IRI, RDFTerm> {
  equals: (other: Triple) => boolean
  ntriplesString: () => string
  /** The native statement this triple adapts, if any */
  asNativeHandle: () => RDF.Quad | undefined
}

export interface Quad extends QuadLike<BlankNodeOrIRI, IRI, RDFTerm, BlankNodeOrIRI> {
  equals: (other: Quad) => boolean
  /** N-Quads line without the terminating newline */
  ntriplesString: () => string
  asTriple: () => Triple
  asNativeHandle: () => RDF.Quad | undefined
}

/**
 * Any term in any position. Deliberately has no equality or key:
 * these are single-use views over native statements and must not be stored in sets or maps.
 */
export type GeneralizedTriple = TripleLike<Term, Term, Term>

export type GeneralizedQuad = QuadLike<Term, Term, Term, Term>

// ==================== Value semantics ====================

export function tripleEquals(a: TripleLike<Term, Term, Term>, b: TripleLike<Term, Term, Term>): boolean {
  return termEquals(a.subject, b.subject)
    && termEquals(a.predicate, b.predicate)
    && termEquals(a.object, b.object)
}

export function quadEquals(a: QuadLike<Term, Term, Term, Term>, b: QuadLike<Term, Term, Term, Term>): boolean {
  if (!tripleEquals(a, b))
    return false
  if (a.graphName === undefined || b.graphName === undefined)
    return a.graphName === b.graphName
  return termEquals(a.graphName, b.graphName)
}

export function tripleToNTriples(triple: TripleLike<Term, Term, Term>): string {
  return `${triple.subject.ntriplesString()} ${triple.predicate.ntriplesString()} ${triple.object.ntriplesString()} .`
}

export function quadToNQuads(quad: QuadLike<Term, Term, Term, Term>): string {
  const spo = `${quad.subject.ntriplesString()} ${quad.predicate.ntriplesString()} ${quad.object.ntriplesString()}`
  if (quad.graphName === undefined)
    return `${spo} .`
  return `${spo} ${quad.graphName.ntriplesString()} .`
}
