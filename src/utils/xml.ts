import { DOMParser } from '@xmldom/xmldom';
import { EafError } from '../errors';

/** Escape XML special characters */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Parse XML string to Document */
export function parseXml(xmlString: string): Document {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      error: (msg: string) => errors.push(msg),
      fatalError: (msg: string) => errors.push(msg),
    },
  });
  let doc: Document | undefined;
  try {
    doc = parser.parseFromString(xmlString, 'text/xml');
  } catch (err) {
    throw new EafError('ParseError', `XML parse error: ${String(err)}`);
  }
  if (errors.length > 0 || !doc?.documentElement) {
    throw new EafError('ParseError', `XML parse error: ${errors[0] ?? 'no root element'}`);
  }
  return doc;
}

function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === 1;
}

/** Direct child elements, optionally filtered by tag name */
export function childElements(el: Element, name?: string): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < el.childNodes.length; i++) {
    const node = el.childNodes.item(i);
    if (isElement(node) && (name === undefined || node.nodeName === name)) out.push(node);
  }
  return out;
}

export function childElement(el: Element, name: string): Element | undefined {
  return childElements(el, name)[0];
}

/** Attribute value, `undefined` when the attribute is absent */
export function attr(el: Element, name: string): string | undefined {
  return el.hasAttribute(name) ? el.getAttribute(name) ?? undefined : undefined;
}

/** Serialize attributes as ` NAME="value"`, skipping absent ones */
export function attrs(pairs: [string, string | number | boolean | undefined | null][]): string {
  return pairs
    .filter((pair): pair is [string, string | number | boolean] => pair[1] !== undefined && pair[1] !== null)
    .map(([name, value]) => ` ${name}="${escapeXml(String(value))}"`)
    .join('');
}
