import { ConfigurationError } from './errors';

/**
 * XML namespaces used by EPUB 2 and 3 documents, keyed by the prefix used
 * throughout this library to address elements and attributes.
 */
export const NAMESPACES = Object.freeze({
  ocf: 'urn:oasis:names:tc:opendocument:xmlns:container',
  opf: 'http://www.idpf.org/2007/opf',
  dc: 'http://purl.org/dc/elements/1.1/',
  dcterms: 'http://purl.org/dc/terms/',
  ncx: 'http://www.daisy.org/z3986/2005/ncx/',
  xhtml: 'http://www.w3.org/1999/xhtml',
  epub: 'http://www.idpf.org/2007/ops',
} as const);

export type NamespacePrefix = keyof typeof NAMESPACES;

export interface QualifiedName {
  prefix: string | null;
  localName: string;
}

function isNamespacePrefix(prefix: string): prefix is NamespacePrefix {
  return Object.prototype.hasOwnProperty.call(NAMESPACES, prefix);
}

/**
 * Looks up the namespace URI of a prefix
 * @throws {ConfigurationError} If the prefix is not registered
 */
export function resolveNamespace(prefix: string): string {
  if (!isNamespacePrefix(prefix)) {
    throw new ConfigurationError(`Unknown XML namespace ${prefix}`);
  }
  return NAMESPACES[prefix];
}

/**
 * Splits `prefix:local` on the first colon. Names without a colon have no prefix.
 */
export function splitQualifiedName(name: string): QualifiedName {
  const colon = name.indexOf(':');
  if (colon === -1) {
    return { prefix: null, localName: name };
  }
  return { prefix: name.slice(0, colon), localName: name.slice(colon + 1) };
}
