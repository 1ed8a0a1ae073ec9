import type * as RDF from '@rdfjs/types'
import type { BlankNodeOrIRI, Graph, IRI, Quad, RDFTerm, TermFactory, Triple } from '@termbridge/api'
import type { StatementConsumer } from './stream'
import { generalizedStatementError, notConcreteError, XSD_STRING } from '@termbridge/api'
import { createLogger } from '@termbridge/utils/logger'
import { DataFactory, Store } from 'n3'
import { N3TermFactory } from './factory'
import { fromNativeGraph } from './graph'
import { QuadStreamAdapter } from './stream'
import { describeNode } from './terms'
import { describeStatement, isNativePredicate, isNativeSubject } from './triples'

const log = createLogger('Convert')

// Copies native data into any TermFactory. An N3TermFactory adapts instead of copying.
//
// Blank nodes go through factory.createBlankNode(label), so reusing one factory
// across unrelated sources merges blank nodes that share a label.

function convertIRI(factory: TermFactory, node: RDF.NamedNode): IRI {
  return factory.createIRI(node.value)
}

function convertSubject(factory: TermFactory, node: RDF.NamedNode | RDF.BlankNode): BlankNodeOrIRI {
  return node.termType === 'NamedNode' ? convertIRI(factory, node) : factory.createBlankNode(node.value)
}

/**
 * @throws ConversionError when the node is not concrete
 */
export function convertTerm(factory: TermFactory, node: RDF.Term): RDFTerm {
  if (factory instanceof N3TermFactory)
    return factory.fromNativeTerm(node)

  switch (node.termType) {
    case 'NamedNode':
      return convertIRI(factory, node)
    case 'BlankNode':
      return factory.createBlankNode(node.value)
    case 'Literal':
      if (node.language)
        return factory.createLiteral(node.value, node.language)
      if (node.datatype.value === XSD_STRING)
        return factory.createLiteral(node.value)
      return factory.createLiteral(node.value, convertIRI(factory, node.datatype))
    default:
      throw notConcreteError(describeNode(node))
  }
}

/**
 * @throws ConversionError when the statement is generalized or a node is not concrete
 */
export function convertTriple(factory: TermFactory, native: RDF.Quad): Triple {
  if (factory instanceof N3TermFactory)
    return factory.fromNativeTriple(native)

  const { subject, predicate } = native
  if (!isNativeSubject(subject) || !isNativePredicate(predicate))
    throw generalizedStatementError('triple', describeStatement(native))
  return factory.createTriple(
    convertSubject(factory, subject),
    convertIRI(factory, predicate),
    convertTerm(factory, native.object),
  )
}

/**
 * @throws ConversionError when the statement is generalized or a node is not concrete
 */
export function convertQuad(factory: TermFactory, native: RDF.Quad): Quad {
  if (factory instanceof N3TermFactory)
    return factory.fromNativeQuad(native)

  const { subject, predicate, graph } = native
  const graphIsName = graph.termType === 'DefaultGraph' || isNativeSubject(graph)
  if (!isNativeSubject(subject) || !isNativePredicate(predicate) || !graphIsName)
    throw generalizedStatementError('quad', describeStatement(native))
  return factory.createQuad(
    isNativeSubject(graph) ? convertSubject(factory, graph) : undefined,
    convertSubject(factory, subject),
    convertIRI(factory, predicate),
    convertTerm(factory, native.object),
  )
}

/**
 * Graph of `factory` holding the default graph of `store`.
 *
 * For an N3TermFactory this wraps the store with a new salt. Any other factory
 * gets a copy with no further link to the store; one bad triple aborts the copy.
 */
export function convertGraph(factory: TermFactory, store: Store): Graph {
  if (factory instanceof N3TermFactory)
    return fromNativeGraph(store)

  const graph = factory.createGraph()
  for (const native of store.getQuads(null, null, null, DataFactory.defaultGraph())) {
    graph.add(convertTriple(factory, native))
  }
  log.debug(`Copied ${graph.size} triples into a foreign graph`)
  return graph
}

/**
 * Stream sink that converts each native quad into `factory`'s quads.
 * An N3TermFactory opens a new salt session, as `streamToQuads` does.
 */
export function streamToFactory(factory: TermFactory, consumer: StatementConsumer<Quad>): QuadStreamAdapter<Quad> {
  if (factory instanceof N3TermFactory)
    return factory.streamToQuads(consumer)
  return new QuadStreamAdapter(native => convertQuad(factory, native), consumer)
}
