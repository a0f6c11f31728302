import { EpubArchive } from './archive';
import { NotFoundError, StructureError } from './errors';
import { Item, ItemInit } from './item';
import { PackageDocument } from './package';

/**
 * The resources of a book, in manifest order
 */
export class Manifest implements Iterable<Item> {
  private readonly items = new Map<string, Item>();

  /**
   * @throws {StructureError} If an item with the same id exists
   */
  createItem(init: ItemInit, archive: EpubArchive): Item {
    if (this.items.has(init.id)) {
      throw new StructureError(`Duplicate manifest item ID: ${init.id}`);
    }
    const item = new Item(init, archive);
    this.items.set(item.id, item);
    return item;
  }

  /**
   * @throws {NotFoundError} If no item has this id
   */
  get(id: string): Item {
    const item = this.items.get(id);
    if (!item) {
      throw new NotFoundError(`No manifest item with ID ${id}`);
    }
    return item;
  }

  has(id: string): boolean {
    return this.items.has(id);
  }

  /** Item stored at an archive path */
  findByPath(path: string): Item | null {
    return this.toArray().find(item => item.path === path) ?? null;
  }

  get length(): number {
    return this.items.size;
  }

  first(): Item | null {
    return this.toArray()[0] ?? null;
  }

  last(): Item | null {
    return this.toArray()[this.items.size - 1] ?? null;
  }

  toArray(): Item[] {
    return Array.from(this.items.values());
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.items.values();
  }
}

/**
 * Builds the manifest from the package document. Item data stays in the
 * archive until requested.
 * @throws {StructureError} If the manifest element is missing or ids repeat
 */
export function buildManifest(pkg: PackageDocument, archive: EpubArchive): Manifest {
  const manifest = new Manifest();
  for (const element of pkg.manifestItems()) {
    const href = element.getAttribute('opf:href');
    const properties = element.getAttribute('opf:properties');
    manifest.createItem({
      id: element.getAttribute('opf:id'),
      href,
      path: pkg.resolve(href),
      mediaType: element.getAttribute('opf:media-type'),
      properties: properties.split(/\s+/).filter(Boolean),
    }, archive);
  }
  return manifest;
}
