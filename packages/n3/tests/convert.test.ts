import type { Quad } from '@termbridge/api'
import { combine, ConversionError, parseSalt } from '@termbridge/api'
import {
  convertGraph,
  convertQuad,
  convertTerm,
  convertTriple,
  N3Graph,
  N3TermFactory,
  streamToFactory,
} from '@termbridge/n3'
import { SimpleGraph, SimpleTermFactory } from '@termbridge/simple'
import { DataFactory, Store } from 'n3'
import { describe, expect, it } from 'vitest'

const { blankNode, defaultGraph, literal, namedNode, quad, variable } = DataFactory

const SALT_A = '11111111-1111-4111-8111-111111111111'
const EX = 'http://example.org/'
const XSD_INTEGER = 'http://www.w3.org/2001/XMLSchema#integer'

const s = namedNode(`${EX}s`)
const p = namedNode(`${EX}p`)
const g = namedNode(`${EX}g`)

describe('convertTerm', () => {
  const factory = new SimpleTermFactory({ salt: SALT_A })

  it('copies nodes into foreign terms with no native handle', () => {
    const iri = convertTerm(factory, s)
    expect(iri.ntriplesString()).toBe(`<${EX}s>`)
    expect(iri.asNativeHandle()).toBeUndefined()
  })

  it('copies the three literal shapes', () => {
    expect(convertTerm(factory, literal('hello', 'en')).ntriplesString()).toBe('"hello"@en')
    expect(convertTerm(factory, literal('hello')).ntriplesString()).toBe('"hello"')
    expect(convertTerm(factory, literal('42', namedNode(XSD_INTEGER))).ntriplesString()).toBe(`"42"^^<${XSD_INTEGER}>`)
  })

  it('labels blank nodes through the factory', () => {
    expect(convertTerm(factory, blankNode('b1')).equals(factory.createBlankNode('b1'))).toBe(true)
  })

  it('rejects a variable', () => {
    expect(() => convertTerm(factory, variable('x'))).toThrow('Not a concrete RDF term: ?x')
  })

  it('adapts instead of copying for an n3 factory', () => {
    const node = literal('hello', 'en')
    expect(convertTerm(new N3TermFactory(), node).asNativeHandle()).toBe(node)
  })
})

describe('convertTriple and convertQuad', () => {
  const factory = new SimpleTermFactory()

  it('copies a triple', () => {
    const triple = convertTriple(factory, quad(s, p, literal('o'), g))
    expect(triple.ntriplesString()).toBe(`<${EX}s> <${EX}p> "o" .`)
    expect(triple.asNativeHandle()).toBeUndefined()
  })

  it('copies a quad with its graph name', () => {
    expect(convertQuad(factory, quad(s, p, literal('o'), g)).ntriplesString())
      .toBe(`<${EX}s> <${EX}p> "o" <${EX}g> .`)
    expect(convertQuad(factory, quad(s, p, literal('o'), defaultGraph())).graphName).toBeUndefined()
  })

  it('applies the strict statement checks', () => {
    expect(() => convertTriple(factory, quad(s, variable('p'), literal('o'))))
      .toThrow(`Can't convert generalized triple: <${EX}s> ?p "o" .`)
    expect(() => convertQuad(factory, quad(s, p, literal('o'), variable('g'))))
      .toThrow(`Can't convert generalized quad: <${EX}s> <${EX}p> "o" ?g .`)
  })

  it('keeps the native quad for an n3 factory', () => {
    const native = quad(s, p, literal('o'), g)
    expect(convertQuad(new N3TermFactory(), native).asNativeHandle()).toBe(native)
  })
})

describe('convertGraph', () => {
  it('copies the default graph into a foreign graph', () => {
    const store = new Store()
    store.addQuad(s, p, literal('default'))
    store.addQuad(s, p, literal('named'), g)

    const graph = convertGraph(new SimpleTermFactory(), store)
    expect(graph).toBeInstanceOf(SimpleGraph)
    expect(graph.size).toBe(1)
    expect([...graph][0]?.object.ntriplesString()).toBe('"default"')
  })

  it('keeps the copy apart from the store', () => {
    const store = new Store()
    store.addQuad(s, p, literal('one'))
    const factory = new SimpleTermFactory()
    const graph = convertGraph(factory, store)

    store.addQuad(s, p, literal('two'))
    expect(graph.size).toBe(1)

    graph.add(factory.createTriple(factory.createIRI(`${EX}s`), factory.createIRI(`${EX}p`), factory.createLiteral('three')))
    expect(store.size).toBe(2)
  })

  it('aborts the copy on a statement it cannot convert', () => {
    const store = new Store()
    store.addQuad(s, p, literal('ok'))
    store.addQuad(variable('x'), p, literal('bad'))
    expect(() => convertGraph(new SimpleTermFactory(), store)).toThrow(ConversionError)
  })

  it('wraps the store for an n3 factory', () => {
    const store = new Store()
    const graph = convertGraph(new N3TermFactory(), store)
    expect(graph).toBeInstanceOf(N3Graph)

    store.addQuad(s, p, literal('late'))
    expect(graph.size).toBe(1)
  })
})

describe('streamToFactory', () => {
  it('converts each event into the factory\'s quads', () => {
    const factory = new SimpleTermFactory({ salt: SALT_A })
    const received: Quad[] = []
    const adapter = streamToFactory(factory, q => received.push(q))
    adapter.quad(quad(blankNode('b1'), p, literal('o'), g))

    expect(received).toHaveLength(1)
    expect(received[0].ntriplesString()).toBe(`_:${combine('b1', parseSalt(SALT_A))} <${EX}p> "o" <${EX}g> .`)
    expect(received[0].asNativeHandle()).toBeUndefined()
  })

  it('adapts for an n3 factory', () => {
    const received: Quad[] = []
    const native = quad(s, p, literal('o'))
    streamToFactory(new N3TermFactory(), q => received.push(q)).quad(native)
    expect(received[0].asNativeHandle()).toBe(native)
  })
})
