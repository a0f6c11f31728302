import * as path from 'path';
import { decodeHTMLStrict } from 'entities';

const XML_ENTITY_NAMES = new Set(['amp', 'lt', 'gt', 'quot', 'apos']);

const BLOCK_LEVEL_ELEMENTS = new Set([
  'address', 'article', 'aside', 'blockquote', 'canvas', 'dd', 'div', 'dl',
  'dt', 'fieldset', 'figcaption', 'figure', 'footer', 'form',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hgroup', 'hr', 'li',
  'main', 'nav', 'noscript', 'ol', 'output', 'p', 'pre', 'section',
  'table', 'tfoot', 'ul', 'video',
]);

const MEDIA_TYPES: { [ext: string]: string } = {
  // Images
  'jpg': 'image/jpeg',
  'jpeg': 'image/jpeg',
  'png': 'image/png',
  'gif': 'image/gif',
  'svg': 'image/svg+xml',
  'webp': 'image/webp',

  // Stylesheets
  'css': 'text/css',

  // Fonts
  'ttf': 'font/ttf',
  'otf': 'font/otf',
  'woff': 'font/woff',
  'woff2': 'font/woff2',

  // Documents
  'xhtml': 'application/xhtml+xml',
  'html': 'application/xhtml+xml',
  'ncx': 'application/x-dtbncx+xml',
  'opf': 'application/oebps-package+xml',
  'xml': 'application/xml',

  'bin': 'application/octet-stream'
};

/** Preferred extension for media types that have more than one */
const PREFERRED_EXTENSIONS: { [mediaType: string]: string } = {
  'image/jpeg': 'jpg',
  'application/xhtml+xml': 'xhtml',
};

/**
 * Escapes the characters that cannot appear verbatim in XML text or attribute values
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Rewrites named HTML entities as numeric character references, so that
 * XHTML using `&nbsp;` and friends parses as plain XML. The five XML
 * entities and names that are not HTML entities are left untouched.
 */
export function convertEntitiesNamedToNumeric(markup: string): string {
  return markup.replace(/&([a-zA-Z][a-zA-Z0-9]*);/g, (entity: string, name: string) => {
    if (XML_ENTITY_NAMES.has(name)) {
      return entity;
    }
    const decoded = decodeHTMLStrict(entity);
    if (decoded === entity) {
      return entity;
    }
    return Array.from(decoded)
      .map(char => `&#${char.codePointAt(0)};`)
      .join('');
  });
}

/**
 * Whether leaving an element of this tag should start a new line of text
 */
export function isBlockLevelElement(tagName: string): boolean {
  return BLOCK_LEVEL_ELEMENTS.has(tagName.toLowerCase());
}

/**
 * Determines the media type based on file extension
 * @param path File path
 * @returns MIME type string
 */
export function getMediaType(path: string): string {
  const ext = path.toLowerCase().split('.').pop() || '';
  return MEDIA_TYPES[ext] || MEDIA_TYPES['bin'];
}

/**
 * Finds the file extension for a media type, `bin` when unknown
 */
export function getExtension(mediaType: string): string {
  const type = mediaType.toLowerCase();
  if (PREFERRED_EXTENSIONS[type]) {
    return PREFERRED_EXTENSIONS[type];
  }
  const ext = Object.keys(MEDIA_TYPES).find(key => MEDIA_TYPES[key] === type);
  return ext || 'bin';
}

/**
 * Replaces `{{name}}` placeholders. Unknown placeholders become empty.
 */
export function fillTemplate(template: string, values: { [key: string]: string }): string {
  return template.replace(/\{\{\s*([a-zA-Z]+)\s*\}\}/g, (_match: string, key: string) => values[key] ?? '');
}

/**
 * Resolves a relative href against an archive directory. The fragment is
 * dropped and percent escapes are decoded.
 */
export function resolveArchivePath(directory: string, href: string): string {
  const [file] = href.split('#');
  let decoded: string;
  try {
    decoded = decodeURIComponent(file);
  } catch {
    decoded = file;
  }
  const base = directory === '.' ? '' : directory;
  return path.posix.normalize(path.posix.join(base, decoded));
}
