import * as path from 'path';
import format from 'xml-formatter';
import { EpubArchive } from './archive';
import { EpubElement, TEXT_NODE, isElement } from './element';
import { StructureError } from './errors';
import { resolveArchivePath } from './helpers';
import { loadXmlMember, parseXml, serializeXml } from './loader';

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

function removeWhitespaceText(element: Element): void {
  for (const child of Array.from(element.childNodes)) {
    if (child.nodeType === TEXT_NODE && !child.textContent?.trim()) {
      element.removeChild(child);
    } else if (isElement(child)) {
      removeWhitespaceText(child);
    }
  }
}

/**
 * The OPF package document of an EPUB.
 *
 * All edits go through the DOM and must be committed with {@link resync},
 * which reparses the serialized document and tells listeners that anything
 * they derived from the previous tree is stale.
 */
export class PackageDocument {
  /** Archive path of the package document */
  readonly path: string;
  /** Archive directory manifest hrefs are relative to, '' at the root */
  readonly directory: string;

  private doc: Document;
  private readonly listeners: Array<() => void> = [];

  constructor(packagePath: string, doc: Document) {
    this.path = packagePath;
    const directory = path.posix.dirname(packagePath);
    this.directory = directory === '.' ? '' : directory;
    this.doc = doc;
  }

  static async load(archive: EpubArchive, packagePath: string): Promise<PackageDocument> {
    return new PackageDocument(packagePath, await loadXmlMember(archive, packagePath));
  }

  get root(): EpubElement {
    return new EpubElement(this.doc.documentElement);
  }

  /**
   * Resolves a manifest href to an archive path
   */
  resolve(href: string): string {
    return resolveArchivePath(this.directory, href);
  }

  private section(name: string): EpubElement {
    const element = this.root.firstChild(`opf:${name}`);
    if (!element) {
      throw new StructureError(`No ${name} element found`);
    }
    return element;
  }

  /** @throws {StructureError} If the package has no metadata element */
  metadata(): EpubElement {
    return this.section('metadata');
  }

  /** @throws {StructureError} If the package has no manifest element */
  manifest(): EpubElement {
    return this.section('manifest');
  }

  /** @throws {StructureError} If the package has no spine element */
  spine(): EpubElement {
    return this.section('spine');
  }

  guide(): EpubElement | null {
    return this.root.firstChild('opf:guide');
  }

  /**
   * Creates the guide element after the spine
   */
  createGuide(): EpubElement {
    const existing = this.guide();
    if (existing) {
      return existing;
    }
    return this.root.newChild('opf:guide');
  }

  /** Manifest `item` elements in document order */
  manifestItems(): EpubElement[] {
    return this.manifest().children('opf:item');
  }

  findManifestItem(id: string): EpubElement | null {
    return this.manifestItems().find(item => item.getAttribute('opf:id') === id) ?? null;
  }

  /**
   * Reparses the document from its serialized form and invalidates
   * everything derived from it
   */
  resync(): void {
    this.doc = parseXml(serializeXml(this.doc), this.path);
    for (const listener of this.listeners) {
      listener();
    }
  }

  onResync(listener: () => void): void {
    this.listeners.push(listener);
  }

  /**
   * Serializes the document
   * @param pretty Reindent with xml-formatter. Whitespace-only text is dropped first.
   */
  serialize(pretty: boolean = false): string {
    if (!pretty) {
      return serializeXml(this.doc);
    }
    const copy = parseXml(serializeXml(this.doc), this.path);
    removeWhitespaceText(copy.documentElement);
    return format(`${XML_DECLARATION}${serializeXml(copy.documentElement)}`, {
      indentation: '  ',
      collapseContent: true,
      lineSeparator: '\n'
    });
  }
}
