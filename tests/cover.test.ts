import { writeFileSync } from 'fs';
import * as path from 'path';
import JSZip from 'jszip';
import { Epub } from '../src/core';
import { InvalidInputError } from '../src/errors';
import {
  COVER_JPEG,
  NEW_COVER_PNG,
  buildEpub,
  fixture,
  makeTempDir,
  opfWith,
  removeTempDir
} from './helpers';

describe('Cover and title page', () => {
  let dir: string;
  let bookPath: string;
  let coverPath: string;

  beforeEach(async () => {
    dir = makeTempDir();
    bookPath = path.join(dir, 'lighthouse.epub');
    coverPath = path.join(dir, 'new-cover.png');
    writeFileSync(bookPath, await buildEpub());
    writeFileSync(coverPath, NEW_COVER_PNG);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe('cover', () => {
    it('should read the cover the package points to', async () => {
      const epub = await Epub.open(bookPath);
      const cover = await epub.getCover();

      expect(cover).toEqual({
        data: COVER_JPEG,
        mediaType: 'image/jpeg',
        href: 'images/cover.jpg',
        path: 'OEBPS/images/cover.jpg'
      });
    });

    it('should fall back to the cover-image property', async () => {
      const opf = fixture('content.opf')
        .replace('<meta name="cover" content="cover-image"/>', '')
        .replace('href="images/cover.jpg"', 'href="images/cover.jpg" properties="cover-image"');
      const epub = await Epub.load(await buildEpub({ 'OEBPS/content.opf': opf }));

      expect((await epub.getCover())?.href).toBe('images/cover.jpg');
    });

    it('should return null for books without cover', async () => {
      const epub = await Epub.load(await buildEpub(opfWith('<meta name="cover" content="cover-image"/>', '')));
      expect(await epub.getCover()).toBeNull();
    });

    it('should reject missing cover files', async () => {
      const epub = await Epub.open(bookPath);
      const missing = path.join(dir, 'missing.png');

      await expect(epub.setCover('', 'image/png')).rejects.toThrow(new InvalidInputError('No cover image path given'));
      await expect(epub.setCover(missing, 'image/png')).rejects.toThrow(`Cover image ${missing} is not readable`);
    });

    it('should stage a new cover until the book is saved', async () => {
      const epub = await Epub.open(bookPath);
      await epub.setCover(coverPath, 'image/png');

      expect(await epub.getCover()).toEqual({
        data: NEW_COVER_PNG,
        mediaType: 'image/png',
        href: 'quire-cover.png',
        path: 'OEBPS/quire-cover.png'
      });
      expect(epub['archive'].list()).not.toContain('OEBPS/quire-cover.png');
      expect(epub['pkg'].serialize()).toContain('<meta name="cover" content="quire-cover"/>');
    });

    it('should keep the cover across save and clear it again', async () => {
      let epub = await Epub.open(bookPath);
      await epub.setCover(coverPath, 'image/png');
      await epub.save();

      epub = await Epub.open(bookPath);
      const cover = await epub.getCover();
      expect(cover?.data).toEqual(NEW_COVER_PNG);
      expect(cover?.mediaType).toBe('image/png');
      expect(epub['archive'].has('OEBPS/images/cover.jpg')).toBe(true);

      epub.clearCover();
      expect(await epub.getCover()).toBeNull();
      await epub.save();

      epub = await Epub.open(bookPath);
      expect(await epub.getCover()).toBeNull();
      expect(epub['archive'].has('OEBPS/quire-cover.png')).toBe(false);
      expect(epub['archive'].has('OEBPS/images/cover.jpg')).toBe(true);
      expect(epub.getManifest().has('quire-cover')).toBe(false);
      expect(epub.getManifest().has('cover-image')).toBe(true);
    });

    it('should guess the media type from the file name', async () => {
      const epub = await Epub.open(bookPath);
      await epub.setCover(coverPath);

      const item = epub.getManifest().get('quire-cover');
      expect(item.mediaType).toBe('image/png');
      expect(item.href).toBe('quire-cover.png');
    });

    it('should flag the cover image in EPUB 3 packages', async () => {
      const epub = await Epub.load(await buildEpub(opfWith('version="2.0"', 'version="3.0"')));
      await epub.setCover(coverPath, 'image/jpeg');

      expect(epub['pkg'].serialize())
        .toContain('<item id="quire-cover" href="quire-cover.jpg" media-type="image/jpeg" properties="cover-image"/>');

      epub.clearCover();
      expect(epub['pkg'].serialize()).not.toContain('cover-image"/>');
      expect(await epub.getCover()).toBeNull();
    });

    it('should do nothing when clearing a book without cover', async () => {
      const epub = await Epub.load(await buildEpub(opfWith('<meta name="cover" content="cover-image"/>', '')));
      const before = epub['pkg'].serialize();

      epub.clearCover();

      expect(epub['pkg'].serialize()).toBe(before);
    });

    it('should treat an item using the reserved id as its own', async () => {
      const data = await buildEpub({
        ...opfWith(
          '<item id="css" href="style.css" media-type="text/css"/>',
          '<item id="css" href="style.css" media-type="text/css"/><item id="quire-cover" href="images/map.png" media-type="image/png"/>'
        ),
        'OEBPS/images/map.png': NEW_COVER_PNG
      });
      const epub = await Epub.load(data);

      await epub.setCover(coverPath, 'image/png');

      expect(epub['archive'].has('OEBPS/images/map.png')).toBe(false);
      expect(epub.getManifest().get('quire-cover').href).toBe('quire-cover.png');
    });
  });

  describe('title page', () => {
    it('should add the title page first in the reading order', async () => {
      const epub = await Epub.open(bookPath);
      epub.addCoverImageTitlePage();

      const first = epub.getSpine().first();
      expect(first?.id).toBe('quire-titlepage');
      expect(first?.href).toBe('quire-titlepage.xhtml');
      expect(first?.mediaType).toBe('application/xhtml+xml');
      expect((await first?.getContents())?.trim()).toBe('');
      expect(epub.getManifest().first()?.id).toBe('quire-titlepage');
      expect(epub.getSpine().length).toBe(7);
    });

    it('should show the cover image', async () => {
      const epub = await Epub.open(bookPath);
      epub.addCoverImageTitlePage({ css: 'img { width: 100%; }' });

      const page = (await epub.getManifest().get('quire-titlepage').getData()).toString('utf8');
      expect(page).toContain('<img src="images/cover.jpg" alt="The Lighthouse Keeper"');
      expect(page).toContain('<title>The Lighthouse Keeper</title>\n<style type="text/css">img { width: 100%; }</style>');
    });

    it('should add a guide reference', async () => {
      const epub = await Epub.open(bookPath);
      epub.addCoverImageTitlePage();

      expect(epub['pkg'].serialize())
        .toContain('<reference type="title-page" title="Title Page" href="quire-titlepage.xhtml"/>');
    });

    it('should create the guide when the book has none', async () => {
      const opf = fixture('content.opf').replace(/<guide>[\s\S]*<\/guide>/, '');
      const epub = await Epub.load(await buildEpub({ 'OEBPS/content.opf': opf }));

      epub.addCoverImageTitlePage();

      expect(epub['pkg'].guide()?.children('opf:reference').map(reference => reference.getAttribute('opf:href')))
        .toEqual(['quire-titlepage.xhtml']);
    });

    it('should render Markdown templates', async () => {
      const epub = await Epub.open(bookPath);
      epub.addCoverImageTitlePage({ type: 'md', template: '# {{title}}\n\n![Cover]({{coverImage}})' });

      const page = epub.getSpine().first();
      expect((await page?.getContents())?.trim()).toBe('The Lighthouse Keeper');
      expect((await page?.getData())?.toString('utf8')).toContain('<img src="images/cover.jpg" alt="Cover" />');
    });

    it('should replace an earlier title page', async () => {
      const epub = await Epub.open(bookPath);
      epub.addCoverImageTitlePage();
      epub.addCoverImageTitlePage({ template: '<html xmlns="http://www.w3.org/1999/xhtml"><body><p>{{title}}</p></body></html>' });

      expect(epub.getSpine().length).toBe(7);
      expect(await epub.getSpine().first()?.getContents()).toBe('The Lighthouse Keeper\n');
    });

    it('should remove the title page', async () => {
      const epub = await Epub.open(bookPath);
      epub.addCoverImageTitlePage();
      epub.removeTitlePage();

      expect(epub.getSpine().length).toBe(6);
      expect(epub.getSpine().first()?.id).toBe('cover');
      expect(epub.getManifest().has('quire-titlepage')).toBe(false);
      expect(epub['pkg'].serialize()).not.toContain('title-page');
      expect(epub['archive'].has('OEBPS/quire-titlepage.xhtml')).toBe(false);
    });

    it('should write the title page on save', async () => {
      let epub = await Epub.open(bookPath);
      epub.addCoverImageTitlePage();
      await epub.save();

      epub = await Epub.open(bookPath);
      expect(epub['archive'].list()).toContain('OEBPS/quire-titlepage.xhtml');
      expect(epub.getSpine().first()?.id).toBe('quire-titlepage');
    });

    it('should require a cover image', async () => {
      const epub = await Epub.open(bookPath);
      epub.clearCover();

      expect(() => epub.addCoverImageTitlePage()).toThrow(InvalidInputError);
      expect(() => epub.addCoverImageTitlePage()).toThrow('Cannot add a title page to a book without cover image');
    });
  });

  describe('saving', () => {
    it('should need a file name', async () => {
      const epub = await Epub.load(await buildEpub());
      await expect(epub.save()).rejects.toThrow('No file name to save to, use saveAs');
    });

    it('should save to another file and keep edits', async () => {
      const epub = await Epub.load(await buildEpub());
      epub.setTitle('Salt & Stone');
      const copy = path.join(dir, 'copy.epub');

      await epub.saveAs(copy);

      const reopened = await Epub.open(copy);
      expect(reopened.getTitle()).toBe('Salt & Stone');
      expect(reopened.getAuthors()).toEqual(new Map([['Marlowe, Ada', 'Ada Marlowe']]));
    });

    it('should pretty print the package document when asked', async () => {
      const epub = await Epub.load(await buildEpub(), { formatXml: true });
      const zip = await JSZip.loadAsync(await epub.getOutput());

      const opf = await zip.file('OEBPS/content.opf')?.async('string');
      expect(opf).toContain('\n  <metadata');
      expect(opf).toContain('\n    <dc:title>The Lighthouse Keeper</dc:title>');
    });
  });
});
