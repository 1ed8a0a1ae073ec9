import type * as RDF from '@rdfjs/types'
import type { BlankNodeOrIRI, IRI, RDFTerm } from './term'
import type { Triple } from './triple'

/**
 * Where a wrapping graph keeps its triples
 */
export interface NativeGraphHandle {
  readonly dataset: RDF.DatasetCore
  readonly graphName: RDF.Quad_Graph
}

/**
 * A mutable set of triples.
 *
 * Implementations either own their triples (a copy) or wrap a native dataset,
 * in which case every read and write goes through to it.
 */
export interface Graph extends Iterable<Triple> {
  readonly size: number

  add: (triple: Triple) => void
  remove: (triple: Triple) => void
  contains: (triple: Triple) => boolean
  clear: () => void

  /** Triples matching the given positions; an omitted position matches anything */
  match: (subject?: BlankNodeOrIRI, predicate?: IRI, object?: RDFTerm) => Iterable<Triple>
  triples: () => Iterable<Triple>

  /** The native dataset and graph name this graph wraps, if any */
  asNativeHandle: () => NativeGraphHandle | undefined
}
