import { constants } from 'fs';
import { access } from 'fs/promises';
import MarkdownIt from 'markdown-it';
import debug from 'debug';
import { Debugger } from 'debug';
import { EpubArchive } from './archive';
import { EpubElement } from './element';
import { InvalidInputError } from './errors';
import { escapeXml, fillTemplate, getExtension, getMediaType } from './helpers';
import { XHTML_MEDIA_TYPE } from './item';
import { MetadataAccessor } from './metadata';
import { PackageDocument } from './package';
import { CoverImage, EpubOptions, TitlePageOptions } from './types';

const log: Debugger = debug('quire:cover');

const COVER_POINTER = { attribute: 'opf:name', values: 'cover' };
const COVER_IMAGE_PROPERTY = 'cover-image';

/**
 * Title page showing the cover image alone. Placeholders: `title`,
 * `coverImage`, and `style` for the optional stylesheet.
 */
export const DEFAULT_TITLE_PAGE_TEMPLATE = `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.1//EN" "http://www.w3.org/TR/xhtml11/DTD/xhtml11.dtd">
<html xmlns="http://www.w3.org/1999/xhtml">
<head>
<title>{{title}}</title>{{style}}
</head>
<body>
<div style="text-align: center; page-break-after: always;">
<img src="{{coverImage}}" alt="{{title}}" style="height: 100%; max-width: 100%;" />
</div>
</body>
</html>
`;

export const DEFAULT_TITLE_PAGE_MARKDOWN = '![{{title}}]({{coverImage}})';

/**
 * Creates a complete XHTML document wrapper for content
 * @param content HTML content to wrap
 * @param title Document title, already escaped
 * @param css Optional CSS styles to include
 */
function createXhtmlWrapper(content: string, title: string, css?: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head>
<title>${title}</title>${styleElement(css)}
</head>
<body>
${content}
</body>
</html>
`;
}

function styleElement(css?: string): string {
  return css ? `\n<style type="text/css">${css}</style>` : '';
}

function propertyTokens(item: EpubElement): string[] {
  return item.getAttribute('opf:properties').split(/\s+/).filter(Boolean);
}

/**
 * Reads and replaces the cover image and the generated title page.
 *
 * Both live under reserved manifest ids (see {@link EpubOptions}). An item
 * already using one of these ids is treated as the one this class manages,
 * so it is replaced or removed along with the cover or title page.
 */
export class CoverManager {
  constructor(
    private readonly pkg: PackageDocument,
    private readonly archive: EpubArchive,
    private readonly metadata: MetadataAccessor,
    private readonly options: EpubOptions,
  ) {}

  private coverPointers(): EpubElement[] {
    return this.metadata.find('opf:meta', COVER_POINTER);
  }

  private coverImageItems(): EpubElement[] {
    return this.pkg.manifestItems().filter(item => propertyTokens(item).includes(COVER_IMAGE_PROPERTY));
  }

  /**
   * Manifest item of the cover image, following the `meta name="cover"`
   * pointer first and the EPUB 3 `cover-image` property second
   */
  private coverItem(): EpubElement | null {
    for (const pointer of this.coverPointers()) {
      const item = this.pkg.findManifestItem(pointer.getAttribute('opf:content'));
      if (item) {
        return item;
      }
    }
    return this.coverImageItems()[0] ?? null;
  }

  /**
   * Gets cover image data from the EPUB
   * @returns Cover image data or null if no cover is found
   */
  async getCover(): Promise<CoverImage | null> {
    const item = this.coverItem();
    if (!item) {
      return null;
    }

    const href = item.getAttribute('opf:href');
    const path = this.pkg.resolve(href);
    const data = await this.archive.read(path);
    if (!data) {
      log('cover item %s points to missing file %s', item.getAttribute('opf:id'), path);
      return null;
    }

    return {
      data,
      mediaType: item.getAttribute('opf:media-type') || getMediaType(href),
      href,
      path
    };
  }

  /**
   * Replaces the cover with an image from the file system. The image is
   * copied into the archive on save.
   * @param localPath Path of the image file
   * @param mimeType Media type of the image, guessed from the file name when empty
   * @throws {InvalidInputError} If the path is empty or the file is not readable
   */
  async setCover(localPath: string, mimeType: string = ''): Promise<void> {
    if (!localPath) {
      throw new InvalidInputError('No cover image path given');
    }
    try {
      await access(localPath, constants.R_OK);
    } catch {
      throw new InvalidInputError(`Cover image ${localPath} is not readable`);
    }

    this.clearCover();

    const { coverId } = this.options;
    const mediaType = mimeType || getMediaType(localPath);
    const href = `${coverId}.${getExtension(mediaType)}`;

    this.metadata.append('opf:meta', '', { 'opf:name': 'cover', 'opf:content': coverId });
    const item = this.pkg.manifest().newChild('opf:item');
    item.setAttribute('opf:id', coverId);
    item.setAttribute('opf:href', href);
    item.setAttribute('opf:media-type', mediaType);
    if (this.pkg.root.getAttribute('opf:version').startsWith('3')) {
      item.setAttribute('opf:properties', COVER_IMAGE_PROPERTY);
    }

    this.archive.stageFile(this.pkg.resolve(href), localPath);
    this.pkg.resync();
    log('cover set to %s (%s)', localPath, mediaType);
  }

  /**
   * Removes the cover pointers and the cover image this library added.
   * Images the book shipped with stay in the archive.
   */
  clearCover(): void {
    const pointers = this.coverPointers();
    const flagged = this.coverImageItems();
    if (pointers.length === 0 && flagged.length === 0) {
      return;
    }

    pointers.forEach(pointer => pointer.delete());
    for (const item of flagged) {
      const tokens = propertyTokens(item).filter(token => token !== COVER_IMAGE_PROPERTY);
      if (tokens.length > 0) {
        item.setAttribute('opf:properties', tokens.join(' '));
      } else {
        item.removeAttribute('opf:properties');
      }
    }

    const reserved = this.pkg.findManifestItem(this.options.coverId);
    if (reserved) {
      const path = this.pkg.resolve(reserved.getAttribute('opf:href'));
      this.archive.unstage(path);
      this.archive.delete(path);
      reserved.delete();
    }

    this.pkg.resync();
  }

  /**
   * Adds a title page showing the cover image as the first page of the book,
   * replacing one added before
   * @throws {InvalidInputError} If the book has no cover image
   */
  addCoverImageTitlePage(options: TitlePageOptions = {}): void {
    if (!this.coverItem()) {
      throw new InvalidInputError('Cannot add a title page to a book without cover image');
    }
    this.removeTitlePage();

    const cover = this.coverItem();
    const values = {
      title: escapeXml(this.metadata.getSingleton('dc:title')),
      coverImage: escapeXml(cover ? cover.getAttribute('opf:href') : ''),
      style: styleElement(options.css),
    };

    let xhtml: string;
    if (options.type === 'md') {
      const md = new MarkdownIt({
        html: true,
        xhtmlOut: true
      });
      const body = md.render(fillTemplate(options.template ?? DEFAULT_TITLE_PAGE_MARKDOWN, values));
      xhtml = createXhtmlWrapper(body, values.title, options.css);
    } else {
      xhtml = fillTemplate(options.template ?? DEFAULT_TITLE_PAGE_TEMPLATE, values);
    }

    const { titlePageId } = this.options;
    const href = `${titlePageId}.xhtml`;

    const item = this.pkg.manifest().newChild('opf:item', '', 'prepend');
    item.setAttribute('opf:id', titlePageId);
    item.setAttribute('opf:href', href);
    item.setAttribute('opf:media-type', XHTML_MEDIA_TYPE);

    const itemref = this.pkg.spine().newChild('opf:itemref', '', 'prepend');
    itemref.setAttribute('opf:idref', titlePageId);

    const reference = this.pkg.createGuide().newChild('opf:reference', '', 'prepend');
    reference.setAttribute('opf:type', 'title-page');
    reference.setAttribute('opf:title', 'Title Page');
    reference.setAttribute('opf:href', href);

    this.archive.stageData(this.pkg.resolve(href), xhtml);
    this.pkg.resync();
  }

  /**
   * Removes a title page added with {@link addCoverImageTitlePage}
   */
  removeTitlePage(): void {
    const { titlePageId } = this.options;
    const item = this.pkg.findManifestItem(titlePageId);
    const itemrefs = this.pkg.spine().children('opf:itemref')
      .filter(itemref => itemref.getAttribute('opf:idref') === titlePageId);
    if (!item && itemrefs.length === 0) {
      return;
    }

    const href = item ? item.getAttribute('opf:href') : `${titlePageId}.xhtml`;
    itemrefs.forEach(itemref => itemref.delete());
    this.pkg.guide()?.children('opf:reference')
      .filter(reference => reference.getAttribute('opf:href') === href)
      .forEach(reference => reference.delete());
    item?.delete();

    const path = this.pkg.resolve(href);
    this.archive.unstage(path);
    this.archive.delete(path);
    this.pkg.resync();
  }
}
