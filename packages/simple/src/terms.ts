import type { BlankNode, IRI, Literal, Term } from '@termbridge/api'
import { blankNodeToNTriples, iriToNTriples, literalToNTriples, termEquals } from '@termbridge/api'

export class SimpleIRI implements IRI {
  readonly termType = 'iri' as const

  constructor(readonly iriString: string) {}

  ntriplesString(): string {
    return iriToNTriples(this.iriString)
  }

  equals(other: Term): boolean {
    return termEquals(this, other)
  }

  asNativeHandle(): undefined {
    return undefined
  }
}

export class SimpleLiteral implements Literal {
  readonly termType = 'literal' as const
  readonly languageTag: string | undefined

  constructor(
    readonly lexicalForm: string,
    readonly datatype: IRI,
    languageTag?: string,
  ) {
    this.languageTag = languageTag ? languageTag.toLowerCase() : undefined
  }

  ntriplesString(): string {
    return literalToNTriples(this.lexicalForm, this.datatype.iriString, this.languageTag)
  }

  equals(other: Term): boolean {
    return termEquals(this, other)
  }

  asNativeHandle(): undefined {
    return undefined
  }
}

export class SimpleBlankNode implements BlankNode {
  readonly termType = 'blank' as const

  constructor(readonly uniqueReference: string) {}

  ntriplesString(): string {
    return blankNodeToNTriples(this.uniqueReference)
  }

  equals(other: Term): boolean {
    return termEquals(this, other)
  }

  asNativeHandle(): undefined {
    return undefined
  }
}
