// Foreign-factory conversions
export { convertGraph, convertQuad, convertTerm, convertTriple, streamToFactory } from './convert'

// Factory
export { N3TermFactory } from './factory'
export type { N3FactoryOptions } from './factory'

// Graph adapter: wrap and copy
export { fromNativeGraph, N3Graph, toNativeGraph } from './graph'
export type { WrapOptions } from './graph'

// Streaming adapter
export { QuadStreamAdapter } from './stream'
export type { NativeQuadCallback, StatementConsumer, StreamOptions } from './stream'

// Syntax names
export { nativeFormatToSyntax, syntaxToNativeFormat } from './syntax'

// Term adapter
export {
  describeNode,
  fromNativeGeneralizedTerm,
  fromNativeTerm,
  N3BlankNode,
  N3IRI,
  N3Literal,
  N3Variable,
  toNativeTerm,
} from './terms'

// Triple/quad adapter
export {
  createGeneralizedTriple,
  describeStatement,
  fromNativeGeneralizedQuad,
  fromNativeGeneralizedTriple,
  fromNativeQuad,
  fromNativeTriple,
  N3Quad,
  N3Triple,
  toNativeQuad,
  toNativeTriple,
} from './triples'
