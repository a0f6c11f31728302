import { StructureError } from './errors';
import { Item } from './item';
import { Manifest } from './manifest';
import { PackageDocument } from './package';

/**
 * The reading order of a book and its NCX table of contents
 */
export class Spine implements Iterable<Item> {
  readonly tocItem: Item;
  private readonly items: readonly Item[];

  constructor(tocItem: Item, items: readonly Item[]) {
    this.tocItem = tocItem;
    this.items = items;
  }

  get(index: number): Item | null {
    return this.items[index] ?? null;
  }

  get length(): number {
    return this.items.length;
  }

  first(): Item | null {
    return this.get(0);
  }

  last(): Item | null {
    return this.get(this.items.length - 1);
  }

  toArray(): Item[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * Resolves the spine against the manifest
 * @throws {StructureError} If the spine, its toc or one of its references is missing
 */
export function buildSpine(pkg: PackageDocument, manifest: Manifest): Spine {
  const root = pkg.root.firstChild('opf:spine');
  if (!root) {
    throw new StructureError('No spine element found');
  }

  const tocId = root.getAttribute('opf:toc');
  if (!tocId) {
    throw new StructureError('No toc ID given in spine');
  }
  if (!manifest.has(tocId)) {
    throw new StructureError('TOC item referenced by spine missing in manifest');
  }

  const items = root.children('opf:itemref').map(itemref => {
    const idref = itemref.getAttribute('opf:idref');
    if (!manifest.has(idref)) {
      throw new StructureError(`Item referenced by spine missing in manifest: ${idref}`);
    }
    return manifest.get(idref);
  });

  return new Spine(manifest.get(tocId), items);
}
