import { RDFSyntax } from '@termbridge/api'

// Format names understood by n3's Parser and Writer
const NATIVE_FORMATS = new Map<RDFSyntax, string>([
  [RDFSyntax.Turtle, 'Turtle'],
  [RDFSyntax.NTriples, 'N-Triples'],
  [RDFSyntax.NQuads, 'N-Quads'],
  [RDFSyntax.TriG, 'TriG'],
  [RDFSyntax.N3, 'N3'],
])

/** n3 format name for a syntax, or undefined when n3 cannot handle it */
export function syntaxToNativeFormat(syntax: RDFSyntax): string | undefined {
  return NATIVE_FORMATS.get(syntax)
}

/**
 * Syntax for an n3 format name or media type. Case-insensitive.
 */
export function nativeFormatToSyntax(format: string): RDFSyntax | undefined {
  const wanted = format.trim().toLowerCase()
  for (const [syntax, name] of NATIVE_FORMATS) {
    if (name.toLowerCase() === wanted || syntax.mediaType === wanted)
      return syntax
  }
  return undefined
}
