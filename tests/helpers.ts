import { mkdtempSync, readFileSync, rmSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import JSZip from 'jszip';

const FIXTURE_DIR = path.join(__dirname, 'fixtures', 'lighthouse');

/** Not a real picture, only the JPEG markers */
export const COVER_JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0xff, 0xd9]);

export const NEW_COVER_PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x00]);

const BOOK_FILES: { [archivePath: string]: string } = {
  'META-INF/container.xml': 'container.xml',
  'OEBPS/content.opf': 'content.opf',
  'OEBPS/toc.ncx': 'toc.ncx',
  'OEBPS/cover.xhtml': 'cover.xhtml',
  'OEBPS/title.xhtml': 'title.xhtml',
  'OEBPS/chapter1.xhtml': 'chapter1.xhtml',
  'OEBPS/chapter2.xhtml': 'chapter2.xhtml',
  'OEBPS/chapter3.xhtml': 'chapter3.xhtml',
  'OEBPS/colophon.xhtml': 'colophon.xhtml',
  'OEBPS/style.css': 'style.css',
};

/** Replacement content per archive path, null removes the file */
export type BookOverrides = { [archivePath: string]: string | Buffer | null };

export function fixture(name: string): string {
  return readFileSync(path.join(FIXTURE_DIR, name), 'utf8');
}

/**
 * Zips the fixture book, applying overrides
 */
export async function buildEpub(overrides: BookOverrides = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('mimetype', 'application/epub+zip', { compression: 'STORE' });
  for (const [archivePath, name] of Object.entries(BOOK_FILES)) {
    zip.file(archivePath, fixture(name));
  }
  zip.file('OEBPS/images/cover.jpg', COVER_JPEG);

  for (const [archivePath, content] of Object.entries(overrides)) {
    if (content === null) {
      zip.remove(archivePath);
    } else {
      zip.file(archivePath, content);
    }
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/** The fixture package document with a text replacement applied */
export function opfWith(search: string, replacement: string): BookOverrides {
  const opf = fixture('content.opf');
  if (!opf.includes(search)) {
    throw new Error(`Fixture package document does not contain ${search}`);
  }
  return { 'OEBPS/content.opf': opf.replace(search, replacement) };
}

export function makeTempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'quire-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
