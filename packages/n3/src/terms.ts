import type * as RDF from '@rdfjs/types'
import type { BlankNode, BlankNodeOrIRI, IRI, Literal, RDFTerm, Salt, Term, Variable } from '@termbridge/api'
import {
  blankNodeToNTriples,
  combine,
  iriToNTriples,
  literalToNTriples,
  notConcreteError,
  termEquals,
  TermType,
  XSD_STRING,
} from '@termbridge/api'
import { DataFactory } from 'n3'

const { blankNode, literal, namedNode } = DataFactory

// ==================== Native-backed terms ====================

export class N3IRI implements IRI {
  readonly termType = 'iri' as const

  constructor(private readonly node: RDF.NamedNode) {}

  get iriString(): string {
    return this.node.value
  }

  ntriplesString(): string {
    return iriToNTriples(this.node.value)
  }

  equals(other: Term): boolean {
    return termEquals(this, other)
  }

  asNativeHandle(): RDF.NamedNode {
    return this.node
  }
}

export class N3Literal implements Literal {
  readonly termType = 'literal' as const
  readonly datatype: IRI

  constructor(private readonly node: RDF.Literal) {
    this.datatype = new N3IRI(node.datatype)
  }

  get lexicalForm(): string {
    return this.node.value
  }

  get languageTag(): string | undefined {
    return this.node.language ? this.node.language.toLowerCase() : undefined
  }

  ntriplesString(): string {
    return literalToNTriples(this.node.value, this.node.datatype.value, this.languageTag)
  }

  equals(other: Term): boolean {
    return termEquals(this, other)
  }

  asNativeHandle(): RDF.Literal {
    return this.node
  }
}

/**
 * Blank node whose identity is the native label combined with a salt.
 * Two wrappers of the same native node under different salts are different blank nodes.
 */
export class N3BlankNode implements BlankNode {
  readonly termType = 'blank' as const
  readonly uniqueReference: string

  constructor(private readonly node: RDF.BlankNode, salt: Salt) {
    this.uniqueReference = combine(node.value, salt)
  }

  ntriplesString(): string {
    return blankNodeToNTriples(this.uniqueReference)
  }

  equals(other: Term): boolean {
    return termEquals(this, other)
  }

  asNativeHandle(): RDF.BlankNode {
    return this.node
  }
}

export class N3Variable implements Variable {
  readonly termType = 'variable' as const

  constructor(private readonly node: RDF.Variable) {}

  get name(): string {
    return this.node.value
  }

  ntriplesString(): string {
    return `?${this.node.value}`
  }

  equals(other: Term): boolean {
    return termEquals(this, other)
  }

  asNativeHandle(): RDF.Variable {
    return this.node
  }
}

// ==================== Native → Term ====================

/** Printable form of any native node, for error messages */
export function describeNode(node: RDF.Term): string {
  switch (node.termType) {
    case 'NamedNode':
      return iriToNTriples(node.value)
    case 'BlankNode':
      return `_:${node.value}`
    case 'Literal':
      return literalToNTriples(node.value, node.datatype.value, node.language || undefined)
    case 'Variable':
      return `?${node.value}`
    case 'DefaultGraph':
      return 'DEFAULT'
    case 'Quad':
      return `<< ${describeNode(node.subject)} ${describeNode(node.predicate)} ${describeNode(node.object)} >>`
  }
}

export function fromNativeIRI(node: RDF.NamedNode): IRI {
  return new N3IRI(node)
}

export function fromNativeSubject(node: RDF.NamedNode | RDF.BlankNode, salt: Salt): BlankNodeOrIRI {
  return node.termType === 'NamedNode' ? new N3IRI(node) : new N3BlankNode(node, salt)
}

/**
 * Adapt a concrete native node.
 * @throws ConversionError for variables, the default graph and quoted triples
 */
export function fromNativeTerm(node: RDF.Term, salt: Salt): RDFTerm {
  switch (node.termType) {
    case 'NamedNode':
      return new N3IRI(node)
    case 'Literal':
      return new N3Literal(node)
    case 'BlankNode':
      return new N3BlankNode(node, salt)
    default:
      throw notConcreteError(describeNode(node))
  }
}

/**
 * Adapt a native node that may also be a pattern variable.
 * @throws ConversionError for the default graph and quoted triples
 */
export function fromNativeGeneralizedTerm(node: RDF.Term, salt: Salt): Term {
  if (node.termType === 'Variable')
    return new N3Variable(node)
  return fromNativeTerm(node, salt)
}

// ==================== Term → Native ====================

export function toNativeIRI(iri: IRI): RDF.NamedNode {
  return iri.asNativeHandle() ?? namedNode(iri.iriString)
}

export function toNativeBlankNode(node: BlankNode): RDF.BlankNode {
  return node.asNativeHandle() ?? blankNode(node.uniqueReference)
}

export function toNativeLiteral(lit: Literal): RDF.Literal {
  const handle = lit.asNativeHandle()
  if (handle)
    return handle
  if (lit.languageTag)
    return literal(lit.lexicalForm, lit.languageTag)
  if (lit.datatype.iriString === XSD_STRING)
    return literal(lit.lexicalForm)
  return literal(lit.lexicalForm, toNativeIRI(lit.datatype))
}

export function toNativeSubject(term: BlankNodeOrIRI): RDF.NamedNode | RDF.BlankNode {
  return term.termType === TermType.IRI ? toNativeIRI(term) : toNativeBlankNode(term)
}

/**
 * Native node for a term. Terms this layer produced hand back their original node.
 * @throws ConversionError when the term is not concrete
 */
export function toNativeTerm(term: Term): RDF.NamedNode | RDF.BlankNode | RDF.Literal {
  switch (term.termType) {
    case TermType.IRI:
      return toNativeIRI(term)
    case TermType.BlankNode:
      return toNativeBlankNode(term)
    case TermType.Literal:
      return toNativeLiteral(term)
    case TermType.Variable:
      throw notConcreteError(term.ntriplesString())
  }
}
