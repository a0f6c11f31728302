/**
 * quire-epub: reading and editing EPUB files
 *
 * This module provides the {@link Epub} class, which opens an EPUB archive and
 * gives access to its package metadata, cover, reading order, table of
 * contents and text. Edits are kept in memory until the book is saved.
 *
 * @module quire-epub
 */

import { writeFile } from 'fs/promises';
import debug from 'debug';
import { Debugger } from 'debug';
import { EpubArchive, fileSystemError } from './archive';
import { CoverManager } from './cover';
import { InvalidInputError } from './errors';
import { loadXmlMember, resolveRootFile } from './loader';
import { Manifest, buildManifest } from './manifest';
import { MetadataAccessor } from './metadata';
import { PackageDocument } from './package';
import { Spine, buildSpine } from './spine';
import { Toc, buildToc } from './toc';
import {
  AttributeFilter,
  AuthorInput,
  AuthorList,
  CoverImage,
  EpubOptions,
  FileData,
  TitlePageOptions,
  defaultOptions
} from './types';

const log: Debugger = debug('quire:core');

const AUTHOR_ROLE: AttributeFilter = { attribute: 'opf:role', values: 'aut', caseInsensitive: true };

function schemeFilter(schemes: string | readonly string[]): AttributeFilter {
  return { attribute: 'opf:scheme', values: schemes, caseInsensitive: true };
}

function isAuthorMap(input: AuthorInput): input is ReadonlyMap<string, string> {
  return input instanceof Map;
}

function isStringList(input: unknown): input is readonly string[] {
  return Array.isArray(input);
}

function splitList(input: string | readonly string[]): string[] {
  const values = typeof input === 'string' ? input.split(',') : input;
  return values.map(value => value.trim()).filter(Boolean);
}

/**
 * Turns every accepted author form into ordered (file-as, name) pairs.
 * Authors given without a sort name are filed under their display name.
 */
function normalizeAuthors(input: AuthorInput): Array<[string, string]> {
  if (typeof input === 'string' || isStringList(input)) {
    return splitList(input).map(name => [name, name]);
  }
  const entries = isAuthorMap(input) ? Array.from(input.entries()) : Object.entries(input);
  return entries
    .map(([fileAs, name]): [string, string] => [fileAs.trim() || name.trim(), name.trim()])
    .filter(([, name]) => name !== '');
}

/**
 * An EPUB book opened for reading and editing.
 *
 * Metadata setters take effect immediately in memory. The archive on disk
 * only changes on {@link save} or {@link saveAs}.
 */
export class Epub {
  readonly options: EpubOptions;

  private readonly archive: EpubArchive;
  private readonly pkg: PackageDocument;
  private readonly metadata: MetadataAccessor;
  private readonly covers: CoverManager;
  private readonly filename: string | null;

  private manifest: Manifest | null = null;
  private spine: Spine | null = null;
  private toc: Toc | null = null;

  private constructor(archive: EpubArchive, pkg: PackageDocument, options: EpubOptions, filename: string | null) {
    this.archive = archive;
    this.pkg = pkg;
    this.options = options;
    this.filename = filename;
    this.metadata = new MetadataAccessor(pkg);
    this.covers = new CoverManager(pkg, archive, this.metadata, options);

    // Manifest, spine and toc hold elements of the replaced tree
    pkg.onResync(() => {
      this.manifest = null;
      this.spine = null;
      this.toc = null;
    });
  }

  /**
   * Opens an EPUB file
   * @param location Path of the EPUB file
   * @throws {IoError} If the file cannot be read or is not a zip archive
   * @throws {StructureError} If the container, package, manifest or spine is broken
   */
  static async open(location: string, options: Partial<EpubOptions> = {}): Promise<Epub> {
    log('opening %s', location);
    return Epub.initialize(await EpubArchive.open(location), options, location);
  }

  /**
   * Loads an EPUB from memory. The result can only be written with {@link saveAs}.
   */
  static async load(data: FileData, options: Partial<EpubOptions> = {}): Promise<Epub> {
    return Epub.initialize(await EpubArchive.fromData(data), options, null);
  }

  private static async initialize(
    archive: EpubArchive,
    options: Partial<EpubOptions>,
    filename: string | null
  ): Promise<Epub> {
    const packagePath = await resolveRootFile(archive);
    const pkg = await PackageDocument.load(archive, packagePath);
    const epub = new Epub(archive, pkg, { ...defaultOptions, ...options }, filename);

    // Fail on broken structure before any content is read
    pkg.metadata();
    epub.getSpine();
    return epub;
  }

  /** Path the book was opened from, null when loaded from memory */
  getFilename(): string | null {
    return this.filename;
  }

  /** Archive path of the package document */
  getPackagePath(): string {
    return this.pkg.path;
  }

  /**
   * Writes the book back to the file it was opened from
   * @throws {InvalidInputError} If the book was loaded from memory
   */
  async save(): Promise<void> {
    if (!this.filename) {
      throw new InvalidInputError('No file name to save to, use saveAs');
    }
    await this.saveAs(this.filename);
  }

  /**
   * Saves the EPUB to a file
   * @param location File path where the EPUB should be saved
   */
  async saveAs(location: string): Promise<void> {
    const content = await this.getOutput();
    try {
      await writeFile(location, content);
    } catch (error) {
      throw fileSystemError(error, 'Failed to write EPUB file.');
    }
    log('saved %s', location);
  }

  /**
   * Builds the EPUB archive with all pending changes
   */
  async getOutput(): Promise<Buffer> {
    await this.archive.flushStaged();
    this.archive.write(this.pkg.path, this.pkg.serialize(this.options.formatXml));
    return this.archive.generate();
  }

  getTitle(): string {
    return this.metadata.getSingleton('dc:title');
  }

  /** An empty title removes it */
  setTitle(title: string): void {
    this.metadata.setSingleton('dc:title', title);
  }

  getLanguage(): string {
    return this.metadata.getSingleton('dc:language');
  }

  setLanguage(language: string): void {
    this.metadata.setSingleton('dc:language', language);
  }

  getPublisher(): string {
    return this.metadata.getSingleton('dc:publisher');
  }

  setPublisher(publisher: string): void {
    this.metadata.setSingleton('dc:publisher', publisher);
  }

  /** Rights statement, stored as `dc:rights` */
  getCopyright(): string {
    return this.metadata.getSingleton('dc:rights');
  }

  setCopyright(copyright: string): void {
    this.metadata.setSingleton('dc:rights', copyright);
  }

  getDescription(): string {
    return this.metadata.getSingleton('dc:description');
  }

  setDescription(description: string): void {
    this.metadata.setSingleton('dc:description', description);
  }

  private uniqueIdentifierFilter(): AttributeFilter {
    return { attribute: 'id', values: this.pkg.root.getAttribute('opf:unique-identifier') || 'BookId' };
  }

  /**
   * The identifier the package declares as unique
   */
  getUniqueIdentifier(): string {
    if (!this.pkg.root.getAttribute('opf:unique-identifier')) {
      return '';
    }
    return this.metadata.getSingleton('dc:identifier', this.uniqueIdentifierFilter());
  }

  setUniqueIdentifier(identifier: string): void {
    if (identifier !== '' && !this.pkg.root.getAttribute('opf:unique-identifier')) {
      this.pkg.root.setAttribute('opf:unique-identifier', 'BookId');
    }
    this.metadata.setSingleton('dc:identifier', identifier, this.uniqueIdentifierFilter());
  }

  /**
   * Identifier with a given `opf:scheme`, compared without case
   */
  getIdentifier(scheme: string): string {
    return this.metadata.getSingleton('dc:identifier', schemeFilter(scheme));
  }

  setIdentifier(scheme: string, identifier: string): void {
    this.metadata.setSingleton('dc:identifier', identifier, schemeFilter(scheme));
  }

  /** Identifier with scheme `UUID` or `urn` */
  getUuid(): string {
    return this.metadata.getSingleton('dc:identifier', schemeFilter(['UUID', 'urn']));
  }

  setUuid(uuid: string): void {
    this.metadata.setSingleton('dc:identifier', uuid, schemeFilter(['UUID', 'urn']));
  }

  getUri(): string {
    return this.getIdentifier('URI');
  }

  setUri(uri: string): void {
    this.setIdentifier('URI', uri);
  }

  getIsbn(): string {
    return this.getIdentifier('ISBN');
  }

  setIsbn(isbn: string): void {
    this.setIdentifier('ISBN', isbn);
  }

  /**
   * Authors as a map from sort name (file-as) to display name, in document order.
   * Creators without a role count as authors when no creator has role `aut`.
   */
  getAuthors(): AuthorList {
    let creators = this.metadata.find('dc:creator', AUTHOR_ROLE);
    if (creators.length === 0) {
      creators = this.metadata.find('dc:creator').filter(creator => !creator.hasAttribute('opf:role'));
    }

    const authors: AuthorList = new Map();
    for (const creator of creators) {
      const name = creator.unescapedText.trim();
      const fileAs = creator.getAttribute('opf:file-as').trim() || this.refinedFileAs(creator.getAttribute('id')) || name;
      authors.set(fileAs, name);
    }
    return authors;
  }

  /** `file-as` given by an EPUB 3 refinement of the element with this id */
  private refinedFileAs(id: string): string {
    if (!id) {
      return '';
    }
    const refinement = this.metadata
      .find('opf:meta', { attribute: 'refines', values: `#${id}` })
      .find(meta => meta.getAttribute('property') === 'file-as');
    return refinement ? refinement.unescapedText.trim() : '';
  }

  /**
   * Replaces all authors.
   *
   * Accepts a comma separated string or a list of display names, or a map or
   * object from sort name to display name. An empty string removes all authors.
   */
  setAuthors(authors: AuthorInput): void {
    const creators = this.metadata.find('dc:creator')
      .filter(creator => !creator.hasAttribute('opf:role') || creator.getAttribute('opf:role').toLowerCase() === 'aut');
    for (const creator of creators) {
      const id = creator.getAttribute('id');
      if (id) {
        this.metadata.remove('opf:meta', { attribute: 'refines', values: `#${id}` });
      }
      creator.delete();
    }

    for (const [fileAs, name] of normalizeAuthors(authors)) {
      this.metadata.append('dc:creator', name, { 'opf:role': 'aut', 'opf:file-as': fileAs });
    }
    this.pkg.resync();
  }

  getSubjects(): string[] {
    return this.metadata.getAll('dc:subject').map(subject => subject.trim()).filter(Boolean);
  }

  /**
   * Replaces all subjects with a list or a comma separated string
   */
  setSubjects(subjects: string | readonly string[]): void {
    this.metadata.setAll('dc:subject', splitList(subjects));
  }

  getCover(): Promise<CoverImage | null> {
    return this.covers.getCover();
  }

  /**
   * Replaces the cover image. The file is read when the book is saved.
   * @param path Path of the image file
   * @param mimeType Media type, guessed from the extension when omitted
   */
  setCover(path: string, mimeType?: string): Promise<void> {
    return this.covers.setCover(path, mimeType);
  }

  clearCover(): void {
    this.covers.clearCover();
  }

  /**
   * Adds a first page showing the cover image
   * @throws {InvalidInputError} If the book has no cover image
   */
  addCoverImageTitlePage(options: TitlePageOptions = {}): void {
    this.covers.addCoverImageTitlePage(options);
  }

  removeTitlePage(): void {
    this.covers.removeTitlePage();
  }

  /**
   * @throws {StructureError} If the manifest is missing or has duplicate ids
   */
  getManifest(): Manifest {
    if (!this.manifest) {
      this.manifest = buildManifest(this.pkg, this.archive);
    }
    return this.manifest;
  }

  /**
   * @throws {StructureError} If the spine or one of its references is missing
   */
  getSpine(): Spine {
    if (!this.spine) {
      this.spine = buildSpine(this.pkg, this.getManifest());
    }
    return this.spine;
  }

  /**
   * Reads the table of contents from the NCX file the spine points to
   * @throws {StructureError} If the NCX is missing or, with `strictToc`, points outside the manifest
   */
  async getToc(): Promise<Toc> {
    if (!this.toc) {
      const tocItem = this.getSpine().tocItem;
      const ncx = await loadXmlMember(this.archive, tocItem.path);
      this.toc = buildToc(ncx, {
        ncxPath: tocItem.path,
        manifest: this.getManifest(),
        strict: this.options.strictToc
      });
    }
    return this.toc;
  }

  /**
   * Extracts the text of the book in reading order
   * @param keepMarkup Keep basic structural tags
   * @param fraction Share of spine items to include, rounded up
   * @throws {InvalidInputError} If the fraction is not in (0, 1]
   */
  async getContents(keepMarkup: boolean = false, fraction: number = 1): Promise<string> {
    if (!(fraction > 0 && fraction <= 1)) {
      throw new InvalidInputError(`Fraction must be greater than 0 and at most 1, got ${fraction}`);
    }
    const spine = this.getSpine();
    const count = Math.ceil(spine.length * fraction);

    let contents = '';
    for (const item of spine.toArray().slice(0, count)) {
      contents += await item.getContents(undefined, undefined, keepMarkup);
    }
    return contents;
  }
}

export default Epub;
