import type { BlankNodeOrIRI, Graph, IRI, RDFTerm, Triple } from '@termbridge/api'

/**
 * In-memory Graph that owns its triples.
 *
 * Triples are keyed by their N-Triples form, so any Triple implementation
 * with equal terms lands on the same entry.
 */
export class SimpleGraph implements Graph {
  private readonly entries: Map<string, Triple> = new Map()

  get size(): number {
    return this.entries.size
  }

  add(triple: Triple): void {
    const key = triple.ntriplesString()
    if (!this.entries.has(key))
      this.entries.set(key, triple)
  }

  remove(triple: Triple): void {
    this.entries.delete(triple.ntriplesString())
  }

  contains(triple: Triple): boolean {
    return this.entries.has(triple.ntriplesString())
  }

  clear(): void {
    this.entries.clear()
  }

  *match(subject?: BlankNodeOrIRI, predicate?: IRI, object?: RDFTerm): Generator<Triple> {
    for (const triple of this.entries.values()) {
      if (subject && !subject.equals(triple.subject))
        continue
      if (predicate && !predicate.equals(triple.predicate))
        continue
      if (object && !object.equals(triple.object))
        continue
      yield triple
    }
  }

  triples(): Iterable<Triple> {
    return this.entries.values()
  }

  [Symbol.iterator](): Iterator<Triple> {
    return this.entries.values()
  }

  asNativeHandle(): undefined {
    return undefined
  }
}
