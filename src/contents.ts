import { isElement, isText } from './element';
import { NotFoundError } from './errors';
import { escapeXml, isBlockLevelElement } from './helpers';
import { ExtractOptions } from './types';

/** Tags reproduced when markup is kept */
const KEPT_TAGS = new Set([
  'br', 'p', 'h1', 'h2', 'h3', 'h4', 'h5', 'span', 'div', 'i', 'strong', 'b', 'table', 'td', 'th', 'tr'
]);

function tagName(element: Element): string {
  return (element.localName || element.nodeName).toLowerCase();
}

function startNode(doc: Document, fragmentBegin: string | undefined): Node {
  if (fragmentBegin) {
    const begin = doc.getElementById(fragmentBegin);
    if (!begin) {
      throw new NotFoundError(`Begin of fragment not found: No element with ID ${fragmentBegin}`);
    }
    return begin;
  }
  return doc.getElementsByTagName('body').item(0) ?? doc.documentElement;
}

function isFragmentEnd(node: Node, fragmentEnd: string | undefined): boolean {
  return !!fragmentEnd && isElement(node) && node.getAttribute('id') === fragmentEnd;
}

/**
 * Extracts the text of an XHTML document.
 *
 * Walks the document in order from the begin element (or `body`) up to, but
 * not including, the end element. Leaving a block-level element ends the
 * line. With `keepMarkup`, a small set of tags is written back without
 * attributes and text is escaped.
 *
 * @throws {NotFoundError} If a begin or end id is given but not present
 */
export function extractContents(doc: Document, options: ExtractOptions = {}): string {
  const { fragmentBegin, fragmentEnd, keepMarkup = false } = options;

  let output = '';
  // Closing output of every element entered and not yet left
  const pending: string[] = [];
  let node: Node | null = startNode(doc, fragmentBegin);

  while (node && !isFragmentEnd(node, fragmentEnd)) {
    if (isText(node)) {
      output += keepMarkup ? escapeXml(node.data) : node.data;
    } else if (isElement(node)) {
      const tag = tagName(node);
      if (keepMarkup && KEPT_TAGS.has(tag)) {
        output += `<${tag}>`;
        pending.push(`</${tag}>`);
      } else {
        pending.push(isBlockLevelElement(tag) ? '\n' : '');
      }
      if (node.firstChild) {
        node = node.firstChild;
        continue;
      }
      output += pending.pop() ?? '';
    }

    // Move to the next sibling, closing every element left on the way up
    while (node && !node.nextSibling) {
      node = node.parentNode;
      if (node && isElement(node)) {
        output += pending.pop() ?? '';
      }
    }
    if (!node) {
      if (fragmentEnd) {
        throw new NotFoundError(`End of fragment not found: No element with ID ${fragmentEnd}`);
      }
      break;
    }
    node = node.nextSibling;
  }

  while (pending.length > 0) {
    output += pending.pop() ?? '';
  }
  return output;
}
