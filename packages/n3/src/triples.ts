import type * as RDF from '@rdfjs/types'
import type {
  BlankNodeOrIRI,
  GeneralizedQuad,
  GeneralizedTriple,
  IRI,
  Quad,
  RDFTerm,
  Salt,
  Term,
  Triple,
} from '@termbridge/api'
import {
  generalizedStatementError,
  quadEquals,
  quadToNQuads,
  tripleEquals,
  tripleToNTriples,
} from '@termbridge/api'
import { DataFactory } from 'n3'
import {
  describeNode,
  fromNativeGeneralizedTerm,
  fromNativeIRI,
  fromNativeSubject,
  fromNativeTerm,
  toNativeIRI,
  toNativeSubject,
  toNativeTerm,
} from './terms'

const { defaultGraph, quad } = DataFactory

// ==================== Native-backed statements ====================

export class N3Triple implements Triple {
  constructor(
    private readonly native: RDF.Quad | undefined,
    readonly subject: BlankNodeOrIRI,
    readonly predicate: IRI,
    readonly object: RDFTerm,
  ) {}

  equals(other: Triple): boolean {
    return tripleEquals(this, other)
  }

  ntriplesString(): string {
    return tripleToNTriples(this)
  }

  asNativeHandle(): RDF.Quad | undefined {
    return this.native
  }
}

export class N3Quad implements Quad {
  constructor(
    private readonly native: RDF.Quad | undefined,
    readonly graphName: BlankNodeOrIRI | undefined,
    readonly subject: BlankNodeOrIRI,
    readonly predicate: IRI,
    readonly object: RDFTerm,
  ) {}

  equals(other: Quad): boolean {
    return quadEquals(this, other)
  }

  ntriplesString(): string {
    return quadToNQuads(this)
  }

  asTriple(): Triple {
    const handle = this.native?.graph.termType === 'DefaultGraph' ? this.native : undefined
    return new N3Triple(handle, this.subject, this.predicate, this.object)
  }

  asNativeHandle(): RDF.Quad | undefined {
    return this.native
  }
}

// ==================== Native checks ====================

type NativeSubject = RDF.NamedNode | RDF.BlankNode

export function isNativeSubject(node: RDF.Term): node is NativeSubject {
  return node.termType === 'NamedNode' || node.termType === 'BlankNode'
}

export function isNativePredicate(node: RDF.Term): node is RDF.NamedNode {
  return node.termType === 'NamedNode'
}

/** Printable form of a native statement; the graph is omitted when it is the default graph */
export function describeStatement(statement: RDF.BaseQuad): string {
  const parts = [statement.subject, statement.predicate, statement.object]
  if (statement.graph.termType !== 'DefaultGraph')
    parts.push(statement.graph)
  return `${parts.map(describeNode).join(' ')} .`
}

// ==================== Native → Strict ====================

/**
 * Adapt a native statement as a Triple, ignoring its graph.
 * @throws ConversionError when the subject or predicate has the wrong kind, or a node is not concrete
 */
export function fromNativeTriple(native: RDF.Quad, salt: Salt): Triple {
  const { subject, predicate } = native
  if (!isNativeSubject(subject) || !isNativePredicate(predicate))
    throw generalizedStatementError('triple', describeStatement(native))

  // The handle only stands for this triple when no graph is attached
  const handle = native.graph.termType === 'DefaultGraph' ? native : undefined
  return new N3Triple(
    handle,
    fromNativeSubject(subject, salt),
    fromNativeIRI(predicate),
    fromNativeTerm(native.object, salt),
  )
}

/**
 * Adapt a native quad. The default graph becomes an undefined graph name.
 * @throws ConversionError when a position has the wrong kind, or a node is not concrete
 */
export function fromNativeQuad(native: RDF.Quad, salt: Salt): Quad {
  const { subject, predicate, graph } = native
  const graphIsName = graph.termType === 'DefaultGraph' || isNativeSubject(graph)
  if (!isNativeSubject(subject) || !isNativePredicate(predicate) || !graphIsName)
    throw generalizedStatementError('quad', describeStatement(native))

  return new N3Quad(
    native,
    isNativeSubject(graph) ? fromNativeSubject(graph, salt) : undefined,
    fromNativeSubject(subject, salt),
    fromNativeIRI(predicate),
    fromNativeTerm(native.object, salt),
  )
}

// ==================== Native → Generalized ====================

/**
 * Adapt any native statement position by position, without narrowing.
 * The result has no equality and must not be stored in a set or used as a key.
 */
export function fromNativeGeneralizedTriple(native: RDF.BaseQuad, salt: Salt): GeneralizedTriple {
  return {
    subject: fromNativeGeneralizedTerm(native.subject, salt),
    predicate: fromNativeGeneralizedTerm(native.predicate, salt),
    object: fromNativeGeneralizedTerm(native.object, salt),
  }
}

export function fromNativeGeneralizedQuad(native: RDF.BaseQuad, salt: Salt): GeneralizedQuad {
  const { graph } = native
  return {
    graphName: graph.termType === 'DefaultGraph' ? undefined : fromNativeGeneralizedTerm(graph, salt),
    ...fromNativeGeneralizedTriple(native, salt),
  }
}

/** A generalized triple over existing terms */
export function createGeneralizedTriple(subject: Term, predicate: Term, object: Term): GeneralizedTriple {
  return { subject, predicate, object }
}

// ==================== Strict → Native ====================

/**
 * Native triple (a quad in the default graph) for a Triple.
 * Triples adapted from a default-graph statement return that statement.
 */
export function toNativeTriple(triple: Triple): RDF.Quad {
  return triple.asNativeHandle() ?? quad(
    toNativeSubject(triple.subject),
    toNativeIRI(triple.predicate),
    toNativeTerm(triple.object),
    defaultGraph(),
  )
}

export function toNativeQuad(q: Quad): RDF.Quad {
  return q.asNativeHandle() ?? quad(
    toNativeSubject(q.subject),
    toNativeIRI(q.predicate),
    toNativeTerm(q.object),
    q.graphName === undefined ? defaultGraph() : toNativeSubject(q.graphName),
  )
}

/** Build a Triple over existing terms, with a native statement attached */
export function createNativeTriple(subject: BlankNodeOrIRI, predicate: IRI, object: RDFTerm): Triple {
  const native = quad(toNativeSubject(subject), toNativeIRI(predicate), toNativeTerm(object), defaultGraph())
  return new N3Triple(native, subject, predicate, object)
}

export function createNativeQuad(
  graphName: BlankNodeOrIRI | undefined,
  subject: BlankNodeOrIRI,
  predicate: IRI,
  object: RDFTerm,
): Quad {
  const native = quad(
    toNativeSubject(subject),
    toNativeIRI(predicate),
    toNativeTerm(object),
    graphName === undefined ? defaultGraph() : toNativeSubject(graphName),
  )
  return new N3Quad(native, graphName, subject, predicate, object)
}
