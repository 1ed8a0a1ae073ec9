import type { BlankNodeOrIRI, IRI, Quad, RDFTerm, Triple } from '@termbridge/api'
import { quadEquals, quadToNQuads, tripleEquals, tripleToNTriples } from '@termbridge/api'

export class SimpleTriple implements Triple {
  constructor(
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

  asNativeHandle(): undefined {
    return undefined
  }
}

export class SimpleQuad implements Quad {
  constructor(
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
    return new SimpleTriple(this.subject, this.predicate, this.object)
  }

  asNativeHandle(): undefined {
    return undefined
  }
}
