import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { SchemaSourceError } from '../errors.js';

// ---------------------------------------------------------------------------
// Internal raw types (fast-xml-parser preserveOrder output)
// ---------------------------------------------------------------------------

type RawNode = Record<string, unknown>;

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

export const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

/**
 * One element of a parsed XML document. Children are kept in document order
 * and every node knows the namespace prefixes in scope at its position.
 */
export class XmlNode {
  constructor(
    /** Tag as written, e.g. `xs:complexType`. */
    public readonly tag: string,
    public readonly attributes: ReadonlyMap<string, string>,
    public readonly children: readonly XmlNode[],
    /** Concatenated direct text content, trimmed. */
    public readonly text: string,
    /** Prefix → URI mappings in scope. The default namespace has the empty prefix. */
    public readonly namespaces: ReadonlyMap<string, string>,
  ) {}

  get prefix(): string {
    const i = this.tag.indexOf(':');
    return i < 0 ? '' : this.tag.slice(0, i);
  }

  get localName(): string {
    const i = this.tag.indexOf(':');
    return i < 0 ? this.tag : this.tag.slice(i + 1);
  }

  get namespaceUri(): string | undefined {
    return this.namespaces.get(this.prefix);
  }

  attr(name: string): string | undefined {
    return this.attributes.get(name);
  }

  /**
   * Direct children with the given local name, optionally restricted to a namespace.
   */
  childrenNamed(localName: string, namespaceUri?: string): XmlNode[] {
    return this.children.filter(
      (c) =>
        c.localName === localName && (namespaceUri === undefined || c.namespaceUri === namespaceUri),
    );
  }

  firstChild(localName: string, namespaceUri?: string): XmlNode | undefined {
    return this.children.find(
      (c) =>
        c.localName === localName && (namespaceUri === undefined || c.namespaceUri === namespaceUri),
    );
  }

  /**
   * Depth-first iteration over every descendant (excluding this node).
   */
  *descendants(): IterableIterator<XmlNode> {
    for (const child of this.children) {
      yield child;
      yield* child.descendants();
    }
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Normalises the XML encoding declaration to UTF-8.
 *
 * The content handed to the parser is already a decoded JS string, so an
 * `encoding="ISO-8859-1"` declaration no longer describes it and makes
 * `fast-xml-parser` reject the document.
 */
export function normalizeXmlEncodingDeclaration(content: string): string {
  return content.replace(
    /(<\?xml\b[^?]*?)\s+encoding=["'][^"']*["']/i,
    '$1 encoding="UTF-8"',
  );
}

function makeParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    allowBooleanAttributes: true,
    parseTagValue: false,
    parseAttributeValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    trimValues: true,
  });
}

function isRawNode(value: unknown): value is RawNode {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readAttributes(entry: RawNode): Map<string, string> {
  const attributes = new Map<string, string>();
  const raw = entry[ATTRIBUTES_KEY];
  if (!isRawNode(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTRIBUTE_PREFIX)) continue;
    attributes.set(key.slice(ATTRIBUTE_PREFIX.length), String(value));
  }
  return attributes;
}

function scopeNamespaces(
  attributes: ReadonlyMap<string, string>,
  inherited: ReadonlyMap<string, string>,
): ReadonlyMap<string, string> {
  let scoped: Map<string, string> | undefined;
  for (const [name, value] of attributes) {
    let prefix: string | undefined;
    if (name === 'xmlns') prefix = '';
    else if (name.startsWith('xmlns:')) prefix = name.slice('xmlns:'.length);
    if (prefix === undefined) continue;
    scoped ??= new Map(inherited);
    scoped.set(prefix, value);
  }
  return scoped ?? inherited;
}

function toNodes(entries: unknown, inherited: ReadonlyMap<string, string>): { nodes: XmlNode[]; text: string } {
  const nodes: XmlNode[] = [];
  const texts: string[] = [];
  if (!Array.isArray(entries)) return { nodes, text: '' };

  for (const entry of entries) {
    if (!isRawNode(entry)) continue;
    for (const key of Object.keys(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        texts.push(String(entry[key]));
        continue;
      }
      const attributes = readAttributes(entry);
      const namespaces = scopeNamespaces(attributes, inherited);
      const inner = toNodes(entry[key], namespaces);
      nodes.push(new XmlNode(key, attributes, inner.nodes, inner.text, namespaces));
    }
  }

  return { nodes, text: texts.join(' ').trim() };
}

/**
 * Parses an XML document into its root `XmlNode`.
 *
 * @param content  - The document text.
 * @param location - Where the text came from; used in error messages only.
 * @throws `SchemaSourceError` when the markup is not well-formed.
 */
export function parseXmlDocument(content: string, location: string): XmlNode {
  const normalized = normalizeXmlEncodingDeclaration(content);

  const validation = XMLValidator.validate(normalized, { allowBooleanAttributes: true });
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new SchemaSourceError(location, `Malformed XML (${msg} at ${line}:${col})`);
  }

  let parsed: unknown;
  try {
    parsed = makeParser().parse(normalized);
  } catch (err) {
    throw new SchemaSourceError(location, 'Failed to parse XML content', err);
  }

  const initial = new Map<string, string>([['xml', XML_NAMESPACE]]);
  const { nodes } = toNodes(parsed, initial);
  const root = nodes[0];
  if (!root) {
    throw new SchemaSourceError(location, 'Document has no root element');
  }
  return root;
}
