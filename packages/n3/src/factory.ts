import type * as RDF from '@rdfjs/types'
import type {
  BlankNode,
  BlankNodeOrIRI,
  GeneralizedQuad,
  GeneralizedTriple,
  IRI,
  Literal,
  Quad,
  RDFTerm,
  Salt,
  Term,
  TermFactory,
  Triple,
} from '@termbridge/api'
import type { N3Graph } from './graph'
import type { StatementConsumer, StreamOptions } from './stream'
import { createSalt, parseSalt, validateIRI, validateLanguageTag } from '@termbridge/api'
import { DataFactory, Store } from 'n3'
import { fromNativeGraph } from './graph'
import { QuadStreamAdapter } from './stream'
import { fromNativeTerm, N3BlankNode, N3IRI, N3Literal, toNativeIRI } from './terms'
import {
  createGeneralizedTriple,
  createNativeQuad,
  createNativeTriple,
  fromNativeGeneralizedQuad,
  fromNativeGeneralizedTriple,
  fromNativeQuad,
  fromNativeTriple,
} from './triples'

const { blankNode, literal, namedNode } = DataFactory

export interface N3FactoryOptions {
  /** Salt for the whole lifetime of the factory; a fresh one is drawn when omitted */
  salt?: string
}

/**
 * Terms, statements and graphs backed by n3 objects.
 *
 * Owns one salt for its lifetime: every blank node it creates or adapts uses it.
 * A new factory, or one given another salt, is a new blank node identity session.
 */
export class N3TermFactory implements TermFactory {
  readonly salt: Salt

  constructor(options: N3FactoryOptions = {}) {
    this.salt = options.salt === undefined ? createSalt() : parseSalt(options.salt)
  }

  // ==================== Creation ====================

  createIRI(iri: string): IRI {
    return new N3IRI(namedNode(validateIRI(iri)))
  }

  createLiteral(lexicalForm: string, datatypeOrLanguage?: IRI | string): Literal {
    if (typeof datatypeOrLanguage === 'string')
      return new N3Literal(literal(lexicalForm, validateLanguageTag(datatypeOrLanguage)))
    if (datatypeOrLanguage === undefined)
      return new N3Literal(literal(lexicalForm))
    return new N3Literal(literal(lexicalForm, toNativeIRI(datatypeOrLanguage)))
  }

  /** A fresh native blank node, or the native blank node labelled `label` */
  createBlankNode(label?: string): BlankNode {
    return new N3BlankNode(blankNode(label), this.salt)
  }

  /** An empty Store, wrapped with this factory's salt */
  createGraph(): N3Graph {
    return fromNativeGraph(new Store(), { salt: this.salt })
  }

  createTriple(subject: BlankNodeOrIRI, predicate: IRI, object: RDFTerm): Triple {
    return createNativeTriple(subject, predicate, object)
  }

  createQuad(graphName: BlankNodeOrIRI | undefined, subject: BlankNodeOrIRI, predicate: IRI, object: RDFTerm): Quad {
    return createNativeQuad(graphName, subject, predicate, object)
  }

  createGeneralizedTriple(subject: Term, predicate: Term, object: Term): GeneralizedTriple {
    return createGeneralizedTriple(subject, predicate, object)
  }

  // ==================== Adaptation with this factory's salt ====================

  fromNativeTerm(node: RDF.Term): RDFTerm {
    return fromNativeTerm(node, this.salt)
  }

  fromNativeTriple(native: RDF.Quad): Triple {
    return fromNativeTriple(native, this.salt)
  }

  fromNativeQuad(native: RDF.Quad): Quad {
    return fromNativeQuad(native, this.salt)
  }

  fromNativeGeneralizedTriple(native: RDF.BaseQuad): GeneralizedTriple {
    return fromNativeGeneralizedTriple(native, this.salt)
  }

  fromNativeGeneralizedQuad(native: RDF.BaseQuad): GeneralizedQuad {
    return fromNativeGeneralizedQuad(native, this.salt)
  }

  // ==================== Streaming ====================
  // Each adapter is its own session: a new salt unless options.salt is given.

  streamToQuads(consumer: StatementConsumer<Quad>, options: StreamOptions = {}): QuadStreamAdapter<Quad> {
    const salt = sessionSalt(options)
    return new QuadStreamAdapter(native => fromNativeQuad(native, salt), consumer)
  }

  streamToGeneralizedTriples(
    consumer: StatementConsumer<GeneralizedTriple>,
    options: StreamOptions = {},
  ): QuadStreamAdapter<GeneralizedTriple> {
    const salt = sessionSalt(options)
    return new QuadStreamAdapter(native => fromNativeGeneralizedTriple(native, salt), consumer)
  }

  streamToGeneralizedQuads(
    consumer: StatementConsumer<GeneralizedQuad>,
    options: StreamOptions = {},
  ): QuadStreamAdapter<GeneralizedQuad> {
    const salt = sessionSalt(options)
    return new QuadStreamAdapter(native => fromNativeGeneralizedQuad(native, salt), consumer)
  }
}

function sessionSalt(options: StreamOptions): Salt {
  return options.salt === undefined ? createSalt() : parseSalt(options.salt)
}
