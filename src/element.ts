import { resolveNamespace, splitQualifiedName } from './namespaces';
import { escapeXml } from './helpers';

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const CDATA_SECTION_NODE = 4;

export function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

export function isText(node: Node | null): node is CharacterData {
  return node !== null && (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE);
}

/**
 * Finds the default namespace in scope for an element by walking up to the
 * nearest ancestor declaring `xmlns`
 */
export function lookupDefaultNamespace(element: Element): string | null {
  for (let current: Node | null = element; current; current = current.parentNode) {
    if (isElement(current) && current.hasAttribute('xmlns')) {
      return current.getAttribute('xmlns') || null;
    }
  }
  return null;
}

interface ResolvedName {
  /** Namespace of the name, inherited from the element when unprefixed */
  namespaceURI: string | null;
  localName: string;
  qualifiedName: string;
  /** Whether the name must be written with its prefix */
  prefixed: boolean;
}

export type ChildPosition = 'append' | 'prepend';

/**
 * An element of an EPUB XML document addressed with `prefix:local` names.
 *
 * A prefixed name resolves to its namespace through the registry. When
 * that namespace is the element's own, or the default namespace the element
 * sits in, the prefix is dropped: `opf:href` on a manifest `item` reads and
 * writes the plain `href` attribute, while `opf:role` on a `dc:creator` is a
 * namespaced attribute.
 */
export class EpubElement {
  readonly node: Element;

  constructor(node: Element) {
    this.node = node;
  }

  get localName(): string {
    return this.node.localName || this.node.nodeName;
  }

  private resolve(name: string): ResolvedName {
    const { prefix, localName } = splitQualifiedName(name);
    if (prefix === null) {
      return { namespaceURI: this.node.namespaceURI, localName, qualifiedName: localName, prefixed: false };
    }

    const uri = resolveNamespace(prefix);
    const own = this.node.namespaceURI;
    if (own === uri || (!own && lookupDefaultNamespace(this.node) === uri)) {
      return { namespaceURI: uri, localName, qualifiedName: localName, prefixed: false };
    }
    return { namespaceURI: uri, localName, qualifiedName: name, prefixed: true };
  }

  /**
   * Reads an attribute, empty string when absent
   */
  getAttribute(name: string): string {
    const resolved = this.resolve(name);
    const value = resolved.prefixed
      ? this.node.getAttributeNS(resolved.namespaceURI, resolved.localName)
      : this.node.getAttribute(resolved.localName);
    return value ?? '';
  }

  hasAttribute(name: string): boolean {
    const resolved = this.resolve(name);
    return resolved.prefixed
      ? this.node.hasAttributeNS(resolved.namespaceURI, resolved.localName)
      : this.node.hasAttribute(resolved.localName);
  }

  setAttribute(name: string, value: string): void {
    const resolved = this.resolve(name);
    if (resolved.prefixed) {
      this.node.setAttributeNS(resolved.namespaceURI, resolved.qualifiedName, value);
    } else {
      this.node.setAttribute(resolved.localName, value);
    }
  }

  removeAttribute(name: string): void {
    const resolved = this.resolve(name);
    if (resolved.prefixed) {
      this.node.removeAttributeNS(resolved.namespaceURI, resolved.localName);
    } else {
      this.node.removeAttribute(resolved.localName);
    }
  }

  /**
   * Creates a child element, optionally holding text
   */
  newChild(name: string, value: string = '', position: ChildPosition = 'append'): EpubElement {
    const resolved = this.resolve(name);
    const child = this.node.ownerDocument.createElementNS(resolved.namespaceURI, resolved.qualifiedName);
    if (value !== '') {
      child.textContent = value;
    }
    if (position === 'prepend') {
      this.node.insertBefore(child, this.node.firstChild);
    } else {
      this.node.appendChild(child);
    }
    return new EpubElement(child);
  }

  /**
   * Direct child elements, all of them or those matching a qualified name
   */
  children(name?: string): EpubElement[] {
    const resolved = name === undefined ? null : this.resolve(name);
    const result: EpubElement[] = [];
    for (let child = this.node.firstChild; child; child = child.nextSibling) {
      if (!isElement(child)) {
        continue;
      }
      const element = new EpubElement(child);
      if (resolved === null || element.matches(resolved)) {
        result.push(element);
      }
    }
    return result;
  }

  firstChild(name: string): EpubElement | null {
    return this.children(name)[0] ?? null;
  }

  /**
   * All descendant elements matching a qualified name, in document order
   */
  descendants(name: string): EpubElement[] {
    const resolved = this.resolve(name);
    const list = resolved.prefixed || resolved.namespaceURI
      ? this.node.getElementsByTagNameNS(resolved.namespaceURI ?? '', resolved.localName)
      : this.node.getElementsByTagName(resolved.localName);
    const result: EpubElement[] = [];
    for (let i = 0; i < list.length; i++) {
      const element = list.item(i);
      if (element) {
        result.push(new EpubElement(element));
      }
    }
    return result;
  }

  private matches(name: ResolvedName): boolean {
    if (this.localName !== name.localName) {
      return false;
    }
    return !name.prefixed && !name.namespaceURI
      ? true
      : this.node.namespaceURI === name.namespaceURI;
  }

  get unescapedText(): string {
    return this.node.textContent ?? '';
  }

  set unescapedText(value: string) {
    this.node.textContent = value;
  }

  get escapedText(): string {
    return escapeXml(this.unescapedText);
  }

  /** Detaches the element from its document */
  delete(): void {
    this.node.parentNode?.removeChild(this.node);
  }
}
