import type { Graph } from './graph'
import type { BlankNode, BlankNodeOrIRI, IRI, Literal, RDFTerm } from './term'
import type { Quad, Triple } from './triple'

/**
 * Creates terms, statements and graphs of one implementation.
 *
 * `createIRI` and language-tagged `createLiteral` apply the cheap guards from
 * `validation.ts` and throw InvalidArgumentError.
 */
export interface TermFactory {
  createIRI: (iri: string) => IRI
  /**
   * Plain literal when only the lexical form is given, typed literal for an IRI,
   * language-tagged literal for a string.
   */
  createLiteral: (lexicalForm: string, datatypeOrLanguage?: IRI | string) => Literal
  /** A fresh blank node, or the blank node this factory associates with `label` */
  createBlankNode: (label?: string) => BlankNode
  createGraph: () => Graph
  createTriple: (subject: BlankNodeOrIRI, predicate: IRI, object: RDFTerm) => Triple
  createQuad: (graphName: BlankNodeOrIRI | undefined, subject: BlankNodeOrIRI, predicate: IRI, object: RDFTerm) => Quad
}
