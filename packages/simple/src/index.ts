export { SimpleTermFactory } from './factory'
export type { SimpleFactoryOptions } from './factory'

export { SimpleGraph } from './graph'
export { SimpleBlankNode, SimpleIRI, SimpleLiteral } from './terms'
export { SimpleQuad, SimpleTriple } from './triples'
