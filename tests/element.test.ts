import { EpubElement } from '../src/element';
import { ConfigurationError } from '../src/errors';
import { parseXml, serializeXml } from '../src/loader';
import { NAMESPACES } from '../src/namespaces';

const PACKAGE = `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="2.0">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:opf="http://www.idpf.org/2007/opf">
    <dc:title>Salt &amp; Stone</dc:title>
    <dc:creator opf:role="aut">Ada Marlowe</dc:creator>
  </metadata>
  <manifest>
    <item id="a" href="a.xhtml" media-type="application/xhtml+xml"/>
  </manifest>
</package>`;

describe('EpubElement', () => {
  let doc: Document;
  let root: EpubElement;
  let metadata: EpubElement;
  let manifest: EpubElement;

  beforeEach(() => {
    doc = parseXml(PACKAGE);
    root = new EpubElement(doc.documentElement);
    const foundMetadata = root.firstChild('opf:metadata');
    const foundManifest = root.firstChild('opf:manifest');
    if (!foundMetadata || !foundManifest) {
      throw new Error('fixture is missing sections');
    }
    metadata = foundMetadata;
    manifest = foundManifest;
  });

  it('should read namespaced attributes on elements of another namespace', () => {
    const creator = metadata.firstChild('dc:creator');
    expect(creator?.getAttribute('opf:role')).toBe('aut');
  });

  it('should read plain attributes when the prefix is the element namespace', () => {
    const item = manifest.firstChild('opf:item');
    expect(item?.getAttribute('opf:href')).toBe('a.xhtml');
    expect(item?.getAttribute('href')).toBe('a.xhtml');
  });

  it('should return an empty string for missing attributes', () => {
    expect(metadata.firstChild('dc:creator')?.getAttribute('opf:file-as')).toBe('');
    expect(manifest.firstChild('opf:item')?.getAttribute('opf:properties')).toBe('');
  });

  it('should write namespaced attributes with their prefix', () => {
    const creator = metadata.firstChild('dc:creator');
    creator?.setAttribute('opf:file-as', 'Marlowe, Ada');

    expect(creator?.node.getAttributeNS(NAMESPACES.opf, 'file-as')).toBe('Marlowe, Ada');
    expect(serializeXml(doc)).toContain('<dc:creator opf:role="aut" opf:file-as="Marlowe, Ada">');
  });

  it('should write plain attributes on elements of the same namespace', () => {
    const item = manifest.firstChild('opf:item');
    item?.setAttribute('opf:properties', 'nav');

    expect(item?.node.getAttribute('properties')).toBe('nav');
    expect(item?.node.hasAttributeNS(NAMESPACES.opf, 'properties')).toBe(false);
  });

  it('should use the inherited default namespace for elements without one', () => {
    const bare = doc.createElementNS(null, 'item');
    manifest.node.appendChild(bare);
    const element = new EpubElement(bare);
    element.setAttribute('opf:href', 'b.xhtml');

    expect(bare.getAttribute('href')).toBe('b.xhtml');
    expect(element.getAttribute('opf:href')).toBe('b.xhtml');
  });

  it('should remove attributes', () => {
    const creator = metadata.firstChild('dc:creator');
    creator?.removeAttribute('opf:role');
    expect(creator?.hasAttribute('opf:role')).toBe(false);
  });

  it('should create children in their own namespace', () => {
    const subject = metadata.newChild('dc:subject', 'Sea');

    expect(subject.node.namespaceURI).toBe(NAMESPACES.dc);
    expect(subject.node.nodeName).toBe('dc:subject');
    expect(subject.unescapedText).toBe('Sea');
    expect(metadata.children('dc:subject')).toHaveLength(1);
  });

  it('should create children without prefix in the parent namespace', () => {
    const item = manifest.newChild('opf:item');

    expect(item.node.nodeName).toBe('item');
    expect(item.node.namespaceURI).toBe(NAMESPACES.opf);
    expect(item.unescapedText).toBe('');
  });

  it('should prepend children', () => {
    const item = manifest.newChild('opf:item', '', 'prepend');
    item.setAttribute('opf:id', 'first');

    const ids = manifest.children('opf:item').map(child => child.getAttribute('opf:id'));
    expect(ids).toEqual(['first', 'a']);
  });

  it('should expose unescaped and escaped text', () => {
    const title = metadata.firstChild('dc:title');
    expect(title?.unescapedText).toBe('Salt & Stone');
    expect(title?.escapedText).toBe('Salt &amp; Stone');
  });

  it('should replace text', () => {
    const title = metadata.firstChild('dc:title');
    if (!title) {
      throw new Error('no title');
    }
    title.unescapedText = 'Tide <and> Time';

    expect(title.unescapedText).toBe('Tide <and> Time');
    expect(title.escapedText).toBe('Tide &lt;and&gt; Time');
    expect(title.node.childNodes.length).toBe(1);
  });

  it('should delete elements', () => {
    metadata.firstChild('dc:title')?.delete();
    expect(metadata.firstChild('dc:title')).toBeNull();
    expect(metadata.children().map(child => child.localName)).toEqual(['creator']);
  });

  it('should find descendants by qualified name', () => {
    expect(root.descendants('dc:creator').map(element => element.unescapedText)).toEqual(['Ada Marlowe']);
    expect(root.descendants('opf:item')).toHaveLength(1);
  });

  it('should reject unknown prefixes', () => {
    expect(() => metadata.getAttribute('foo:bar')).toThrow(ConfigurationError);
    expect(() => metadata.newChild('foo:bar')).toThrow('Unknown XML namespace foo');
  });
});
