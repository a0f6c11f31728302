import TurndownService from 'turndown';
import { EpubArchive } from './archive';
import { StructureError } from './errors';
import { extractContents } from './contents';
import { parseXhtml } from './loader';

export const XHTML_MEDIA_TYPE = 'application/xhtml+xml';

export interface ItemInit {
  id: string;
  href: string;
  /** Archive path the href resolves to */
  path: string;
  mediaType?: string;
  properties?: readonly string[];
}

/**
 * A resource declared in the manifest. Its data is read from the archive on
 * first use and kept.
 */
export class Item {
  readonly id: string;
  readonly href: string;
  readonly path: string;
  readonly mediaType: string;
  readonly properties: readonly string[];

  private readonly archive: EpubArchive;
  private data: Buffer | null = null;

  constructor(init: ItemInit, archive: EpubArchive) {
    this.id = init.id;
    this.href = init.href;
    this.path = init.path;
    this.mediaType = init.mediaType || XHTML_MEDIA_TYPE;
    this.properties = init.properties ?? [];
    this.archive = archive;
  }

  /**
   * @throws {StructureError} If the archive has no file at the item's path
   */
  async getData(): Promise<Buffer> {
    if (this.data === null) {
      const data = await this.archive.read(this.path);
      if (data === null) {
        throw new StructureError(`Failed to access EPUB container data: ${this.path}`);
      }
      this.data = data;
    }
    return this.data;
  }

  /** Size in bytes, 0 when the file is missing from the archive */
  async getSize(): Promise<number> {
    return this.data ? this.data.length : this.archive.size(this.path);
  }

  async getDocument(): Promise<Document> {
    return parseXhtml((await this.getData()).toString('utf8'), this.path);
  }

  /**
   * Extracts the text of this content document, optionally between two element ids
   * @param fragmentBegin Id of the first element to include
   * @param fragmentEnd Id of the element to stop at
   * @param keepMarkup Keep basic structural tags
   */
  async getContents(fragmentBegin?: string, fragmentEnd?: string, keepMarkup: boolean = false): Promise<string> {
    return extractContents(await this.getDocument(), { fragmentBegin, fragmentEnd, keepMarkup });
  }

  /**
   * Same as {@link getContents} with markup, converted to Markdown
   */
  async getMarkdown(fragmentBegin?: string, fragmentEnd?: string): Promise<string> {
    const html = await this.getContents(fragmentBegin, fragmentEnd, true);
    const turndown = new TurndownService({ headingStyle: 'atx' });
    return turndown.turndown(html);
  }
}
