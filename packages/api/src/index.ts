// Errors
export {
  ConversionError,
  generalizedStatementError,
  InvalidArgumentError,
  invalidIRIError,
  invalidLanguageTagError,
  notConcreteError,
  TermError,
  TermErrorCode,
} from './errors'

// Factory and graph contracts
export type { TermFactory } from './factory'
export type { Graph, NativeGraphHandle } from './graph'

// RDF syntaxes
export { RDFSyntax, syntaxByMediaType } from './syntax'

// Terms
export {
  blankNodeToNTriples,
  impliedDatatype,
  iriToNTriples,
  literalToNTriples,
  termEquals,
  TermType,
} from './term'

export type { BlankNode, BlankNodeOrIRI, IRI, Literal, RDFTerm, Term, Variable } from './term'

// Triples and quads
export { quadEquals, quadToNQuads, tripleEquals, tripleToNTriples } from './triple'

export type { GeneralizedQuad, GeneralizedTriple, Quad, QuadLike, Triple, TripleLike } from './triple'

// Validation guards
export { IRIStringSchema, LanguageTagSchema, validateIRI, validateLanguageTag } from './validation'

export { RDF_LANG_STRING, XSD_STRING } from './vocabulary'

// Blank node identity
export { combine, createSalt, parseSalt, SaltSchema } from './salt'

export type { Salt } from './salt'
