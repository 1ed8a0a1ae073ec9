export const XSD_STRING = 'http://www.w3.org/2001/XMLSchema#string'
export const RDF_LANG_STRING = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#langString'
