/**
 * RDF concrete syntaxes known to the term model
 */
export const RDFSyntax = {
  Turtle: { name: 'Turtle', mediaType: 'text/turtle', fileExtension: '.ttl' },
  NTriples: { name: 'N-Triples', mediaType: 'application/n-triples', fileExtension: '.nt' },
  NQuads: { name: 'N-Quads', mediaType: 'application/n-quads', fileExtension: '.nq' },
  TriG: { name: 'TriG', mediaType: 'application/trig', fileExtension: '.trig' },
  N3: { name: 'N3', mediaType: 'text/n3', fileExtension: '.n3' },
  JSONLD: { name: 'JSON-LD', mediaType: 'application/ld+json', fileExtension: '.jsonld' },
  RDFXML: { name: 'RDF/XML', mediaType: 'application/rdf+xml', fileExtension: '.rdf' },
  RDFA: { name: 'RDFa', mediaType: 'text/html', fileExtension: '.html' },
} as const

export type RDFSyntax = (typeof RDFSyntax)[keyof typeof RDFSyntax]

/**
 * Look up a syntax by media type. Parameters (`; charset=...`) and case are ignored.
 */
export function syntaxByMediaType(mediaType: string): RDFSyntax | undefined {
  const base = mediaType.split(';')[0].trim().toLowerCase()
  return Object.values(RDFSyntax).find(syntax => syntax.mediaType === base)
}
