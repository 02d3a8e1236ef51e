/**
 * Safe XML parser built on fast-xml-parser.
 * All operations are null-safe: accessing missing elements never crashes.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

/** A parsed element: namespace prefixes are stripped from tag and attribute names. */
export interface XmlElement {
  name: string;
  attrs: Record<string, string>;
  children: XmlChild[];
}

export type XmlChild = XmlElement | string;

const PARSER_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  htmlEntities: true,
};

export class SafeXmlNode {
  private readonly el: XmlElement | null;

  constructor(el: XmlElement | null) {
    this.el = el;
  }

  /** Get a string attribute value, or undefined if missing. */
  attr(name: string): string | undefined {
    if (!this.el) return undefined;
    return Object.prototype.hasOwnProperty.call(this.el.attrs, name) ? this.el.attrs[name] : undefined;
  }

  /** Get a numeric attribute value, or undefined if missing or not a number. */
  numAttr(name: string): number | undefined {
    const raw = this.attr(name);
    if (raw === undefined || raw.trim() === '') return undefined;
    const n = Number(raw);
    return Number.isNaN(n) ? undefined : n;
  }

  /**
   * Read an OOXML boolean attribute (`1`/`true`/`0`/`false`).
   * Returns `fallback` when the attribute is missing or unrecognized.
   */
  boolAttr(name: string, fallback = false): boolean {
    const raw = this.attr(name);
    if (raw === '1' || raw === 'true') return true;
    if (raw === '0' || raw === 'false') return false;
    return fallback;
  }

  /**
   * Find the first child element matching the given localName.
   * Returns an empty SafeXmlNode if not found, so chaining never crashes.
   */
  child(localName: string): SafeXmlNode {
    if (!this.el) return new SafeXmlNode(null);
    for (const c of this.el.children) {
      if (typeof c !== 'string' && c.name === localName) {
        return new SafeXmlNode(c);
      }
    }
    return new SafeXmlNode(null);
  }

  /**
   * Get child elements, optionally filtered by localName.
   * If no localName is given, returns all direct child elements.
   */
  children(localName?: string): SafeXmlNode[] {
    if (!this.el) return [];
    const result: SafeXmlNode[] = [];
    for (const c of this.el.children) {
      if (typeof c === 'string') continue;
      if (localName === undefined || c.name === localName) {
        result.push(new SafeXmlNode(c));
      }
    }
    return result;
  }

  /** Get the concatenated text content, or empty string if the element is missing. */
  text(): string {
    if (!this.el) return '';
    return collectText(this.el);
  }

  /** Whether the underlying element actually exists. */
  exists(): boolean {
    return this.el !== null;
  }

  /** All direct child elements as SafeXmlNode[]. */
  allChildren(): SafeXmlNode[] {
    return this.children();
  }

  /** The localName of the underlying element, or empty string. */
  get localName(): string {
    return this.el?.name ?? '';
  }
}

function collectText(el: XmlElement): string {
  let out = '';
  for (const c of el.children) {
    out += typeof c === 'string' ? c : collectText(c);
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttrs(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    if (key && value !== undefined && value !== null) {
      attrs[key] = String(value);
    }
  }
  return attrs;
}

/**
 * Convert one entry of fast-xml-parser's ordered output
 * (`{ tag: [...children], ':@': {...attrs} }` or `{ '#text': '...' }`).
 */
function toChild(raw: unknown): XmlChild | null {
  if (!isRecord(raw)) return null;
  for (const [key, value] of Object.entries(raw)) {
    if (key === ':@') continue;
    if (key === '#text') return String(value);
    const children: XmlChild[] = [];
    if (Array.isArray(value)) {
      for (const item of value) {
        const c = toChild(item);
        if (c !== null) children.push(c);
      }
    }
    return { name: key, attrs: readAttrs(raw[':@']), children };
  }
  return null;
}

/**
 * Parse an XML string into a SafeXmlNode wrapping the document element.
 */
export function parseXml(xmlString: string): SafeXmlNode {
  const validation = XMLValidator.validate(xmlString);
  if (validation !== true) {
    console.warn('XML parse error:', validation.err.msg);
    return new SafeXmlNode(null);
  }

  const parsed: unknown = new XMLParser(PARSER_OPTIONS).parse(xmlString);
  if (!Array.isArray(parsed)) return new SafeXmlNode(null);

  for (const item of parsed) {
    const c = toChild(item);
    if (c !== null && typeof c !== 'string') {
      return new SafeXmlNode(c);
    }
  }
  return new SafeXmlNode(null);
}
