import type * as RDF from '@rdfjs/types'
import type { BlankNodeOrIRI, Graph, IRI, NativeGraphHandle, RDFTerm, Salt, Triple } from '@termbridge/api'
import { createSalt, parseSalt } from '@termbridge/api'
import { createLogger } from '@termbridge/utils/logger'
import { DataFactory, Store } from 'n3'
import { toNativeIRI, toNativeSubject, toNativeTerm } from './terms'
import { fromNativeTriple, toNativeTriple } from './triples'

const log = createLogger('N3Graph')

export interface WrapOptions {
  /**
   * Salt for blank nodes read through the wrapper.
   * Omit it and every wrap draws a new salt, so two wraps of one store do not share blank node identity.
   */
  salt?: string
  /** Graph inside the store to expose; the default graph when omitted */
  graphName?: RDF.Quad_Graph
}

/**
 * Graph view over one graph of an n3 Store.
 *
 * Holds no triples of its own: reads run the store's match traversal and adapt
 * each native quad as it is reached, writes go straight to the store.
 */
export class N3Graph implements Graph {
  constructor(
    private readonly store: Store,
    private readonly graphName: RDF.Quad_Graph,
    readonly salt: Salt,
  ) {}

  get size(): number {
    return this.store.countQuads(null, null, null, this.graphName)
  }

  add(triple: Triple): void {
    const { subject, predicate, object } = toNativeTriple(triple)
    this.store.addQuad(subject, predicate, object, this.graphName)
  }

  remove(triple: Triple): void {
    const { subject, predicate, object } = toNativeTriple(triple)
    this.store.removeQuad(subject, predicate, object, this.graphName)
  }

  contains(triple: Triple): boolean {
    const { subject, predicate, object } = toNativeTriple(triple)
    return this.store.countQuads(subject, predicate, object, this.graphName) > 0
  }

  clear(): void {
    this.store.removeQuads(this.store.getQuads(null, null, null, this.graphName))
  }

  *match(subject?: BlankNodeOrIRI, predicate?: IRI, object?: RDFTerm): Generator<Triple> {
    const quads = this.store.getQuads(
      subject ? toNativeSubject(subject) : null,
      predicate ? toNativeIRI(predicate) : null,
      object ? toNativeTerm(object) : null,
      this.graphName,
    )
    for (const native of quads) {
      yield fromNativeTriple(native, this.salt)
    }
  }

  triples(): Iterable<Triple> {
    return this.match()
  }

  [Symbol.iterator](): Iterator<Triple> {
    return this.match()
  }

  asNativeHandle(): NativeGraphHandle {
    return { dataset: this.store, graphName: this.graphName }
  }
}

/**
 * Wrap an n3 Store as a Graph. O(1); mutations flow both ways.
 */
export function fromNativeGraph(store: Store, options: WrapOptions = {}): N3Graph {
  const salt = options.salt === undefined ? createSalt() : parseSalt(options.salt)
  const graphName = options.graphName ?? DataFactory.defaultGraph()
  log.debug(`Wrapping store (${store.size} quads) with salt ${salt}`)
  return new N3Graph(store, graphName, salt)
}

/**
 * n3 Store holding the triples of a Graph.
 *
 * A graph that wraps the default graph of a Store returns that Store itself.
 * Anything else is copied into a new Store; a triple that cannot be converted aborts the copy.
 */
export function toNativeGraph(graph: Graph): Store {
  const handle = graph.asNativeHandle()
  if (handle && handle.dataset instanceof Store && handle.graphName.termType === 'DefaultGraph')
    return handle.dataset

  const store = new Store()
  for (const triple of graph) {
    store.addQuad(toNativeTriple(triple))
  }
  log.debug(`Copied ${store.size} triples into a new store`)
  return store
}
