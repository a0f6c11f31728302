import { EpubElement } from './element';
import { PackageDocument } from './package';
import { AttributeFilter } from './types';

function filterValues(filter: AttributeFilter): readonly string[] {
  return typeof filter.values === 'string' ? [filter.values] : filter.values;
}

function matchesFilter(element: EpubElement, filter: AttributeFilter | undefined): boolean {
  if (!filter) {
    return true;
  }
  const actual = element.getAttribute(filter.attribute);
  return filterValues(filter).some(value => filter.caseInsensitive
    ? value.toLowerCase() === actual.toLowerCase()
    : value === actual);
}

/**
 * Reads and writes the children of the package `metadata` element.
 *
 * Singleton fields keep at most one node per name and filter. Multi-valued
 * fields are rewritten as a whole. Every write is committed with a resync.
 */
export class MetadataAccessor {
  constructor(private readonly pkg: PackageDocument) {}

  /**
   * Metadata nodes with a qualified name, optionally narrowed by one attribute
   */
  find(name: string, filter?: AttributeFilter): EpubElement[] {
    return this.pkg.metadata().children(name).filter(element => matchesFilter(element, filter));
  }

  /**
   * Text of the first matching node, empty string when there is none
   */
  getSingleton(name: string, filter?: AttributeFilter): string {
    const [first] = this.find(name, filter);
    return first ? first.unescapedText : '';
  }

  /**
   * Sets the text of a singleton field. An empty value removes the field.
   *
   * A single match is updated in place. Otherwise all matches are removed
   * and one node is created, carrying the first filter value.
   */
  setSingleton(name: string, value: string, filter?: AttributeFilter): void {
    const nodes = this.find(name, filter);
    if (nodes.length === 1) {
      if (value === '') {
        nodes[0].delete();
      } else {
        nodes[0].unescapedText = value;
      }
    } else {
      nodes.forEach(node => node.delete());
      if (value !== '') {
        const node = this.pkg.metadata().newChild(name, value);
        if (filter) {
          node.setAttribute(filter.attribute, filterValues(filter)[0] ?? '');
        }
      }
    }
    this.pkg.resync();
  }

  getAll(name: string, filter?: AttributeFilter): string[] {
    return this.find(name, filter).map(node => node.unescapedText);
  }

  /**
   * Replaces every matching node with one node per value, in order
   */
  setAll(name: string, values: readonly string[], filter?: AttributeFilter): void {
    this.find(name, filter).forEach(node => node.delete());
    for (const value of values) {
      const node = this.pkg.metadata().newChild(name, value);
      if (filter) {
        node.setAttribute(filter.attribute, filterValues(filter)[0] ?? '');
      }
    }
    this.pkg.resync();
  }

  /**
   * Appends a node without committing, for callers building several nodes
   */
  append(name: string, value: string, attributes: { [name: string]: string } = {}): EpubElement {
    const node = this.pkg.metadata().newChild(name, value);
    for (const [attribute, attributeValue] of Object.entries(attributes)) {
      node.setAttribute(attribute, attributeValue);
    }
    return node;
  }

  /**
   * Removes matching nodes without committing
   */
  remove(name: string, filter?: AttributeFilter): void {
    this.find(name, filter).forEach(node => node.delete());
  }
}
