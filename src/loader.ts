import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import debug from 'debug';
import { Debugger } from 'debug';
import { EpubArchive } from './archive';
import { EpubElement } from './element';
import { StructureError } from './errors';
import { convertEntitiesNamedToNumeric } from './helpers';

const log: Debugger = debug('quire:loader');

export const CONTAINER_PATH = 'META-INF/container.xml';
export const PACKAGE_MEDIA_TYPE = 'application/oebps-package+xml';

function parse(source: string, mimeType: string, name: string): Document {
  const fatal: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (message: string) => log('%s: %s', name, message),
      // well-formedness violations such as mismatched end tags arrive here
      error: (message: string) => {
        fatal.push(message);
      },
      fatalError: (message: string) => {
        fatal.push(message);
      }
    }
  });
  let doc: Document | null = null;
  try {
    doc = parser.parseFromString(source, mimeType);
  } catch (error) {
    fatal.push(error instanceof Error ? error.message : String(error));
  }
  if (fatal.length > 0 || !doc || !doc.documentElement) {
    throw new StructureError(`Failed to parse ${name}${fatal.length > 0 ? `: ${fatal[0]}` : ''}`);
  }
  return doc;
}

/**
 * Parses an XML document
 * @param name Used in error messages and logs
 * @throws {StructureError} On unrecoverable syntax errors
 */
export function parseXml(source: string, name: string = 'XML document'): Document {
  return parse(source, 'text/xml', name);
}

/**
 * Parses an XHTML content document. Named HTML entities are accepted.
 */
export function parseXhtml(source: string, name: string = 'XHTML document'): Document {
  return parse(convertEntitiesNamedToNumeric(source), 'application/xhtml+xml', name);
}

export function serializeXml(doc: Document | Node): string {
  return new XMLSerializer().serializeToString(doc);
}

async function readMember(archive: EpubArchive, path: string): Promise<string> {
  const text = await archive.readText(path);
  if (text === null || text.trim() === '') {
    throw new StructureError(`Failed to access EPUB container data: ${path}`);
  }
  return text;
}

/**
 * Reads and parses an XML member of the archive
 * @throws {StructureError} If the member is absent, empty or not well formed
 */
export async function loadXmlMember(archive: EpubArchive, path: string): Promise<Document> {
  return parseXml(await readMember(archive, path), path);
}

export async function loadXhtmlMember(archive: EpubArchive, path: string): Promise<Document> {
  return parseXhtml(await readMember(archive, path), path);
}

/**
 * Finds the package document through `META-INF/container.xml`
 * @returns Archive path of the package document
 * @throws {StructureError} If the container or its rootfile entry is missing
 */
export async function resolveRootFile(archive: EpubArchive): Promise<string> {
  const container = new EpubElement((await loadXmlMember(archive, CONTAINER_PATH)).documentElement);
  const rootfile = container
    .descendants('ocf:rootfile')
    .find(element => element.getAttribute('ocf:media-type') === PACKAGE_MEDIA_TYPE);
  const fullPath = rootfile?.getAttribute('ocf:full-path') ?? '';
  if (!fullPath) {
    throw new StructureError('No package document referenced in META-INF/container.xml');
  }
  log('package document at %s', fullPath);
  return fullPath;
}
