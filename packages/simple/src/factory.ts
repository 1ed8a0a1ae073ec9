import type { BlankNode, BlankNodeOrIRI, IRI, Literal, Quad, RDFTerm, Salt, TermFactory, Triple } from '@termbridge/api'
import { combine, createSalt, impliedDatatype, parseSalt, validateIRI, validateLanguageTag } from '@termbridge/api'
import { v4 as uuidv4 } from 'uuid'
import { SimpleGraph } from './graph'
import { SimpleBlankNode, SimpleIRI, SimpleLiteral } from './terms'
import { SimpleQuad, SimpleTriple } from './triples'

export interface SimpleFactoryOptions {
  /** Salt for labelled blank nodes; a fresh one is drawn when omitted */
  salt?: string
}

/**
 * Plain in-memory terms with no native backing.
 *
 * `createBlankNode(label)` is stable per factory: the same label always yields
 * the same blank node, and another factory yields a different one.
 */
export class SimpleTermFactory implements TermFactory {
  readonly salt: Salt

  constructor(options: SimpleFactoryOptions = {}) {
    this.salt = options.salt === undefined ? createSalt() : parseSalt(options.salt)
  }

  createIRI(iri: string): IRI {
    return new SimpleIRI(validateIRI(iri))
  }

  createLiteral(lexicalForm: string, datatypeOrLanguage?: IRI | string): Literal {
    if (typeof datatypeOrLanguage === 'string') {
      const languageTag = validateLanguageTag(datatypeOrLanguage)
      return new SimpleLiteral(lexicalForm, new SimpleIRI(impliedDatatype(languageTag)), languageTag)
    }
    return new SimpleLiteral(lexicalForm, datatypeOrLanguage ?? new SimpleIRI(impliedDatatype(undefined)))
  }

  createBlankNode(label?: string): BlankNode {
    return new SimpleBlankNode(combine(label ?? uuidv4(), this.salt))
  }

  createGraph(): SimpleGraph {
    return new SimpleGraph()
  }

  createTriple(subject: BlankNodeOrIRI, predicate: IRI, object: RDFTerm): Triple {
    return new SimpleTriple(subject, predicate, object)
  }

  createQuad(graphName: BlankNodeOrIRI | undefined, subject: BlankNodeOrIRI, predicate: IRI, object: RDFTerm): Quad {
    return new SimpleQuad(graphName, subject, predicate, object)
  }
}
