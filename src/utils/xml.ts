import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedResponseError } from "../errors.js";

// Every tag is wrapped in an array so single and repeated children read
// the same way, and tag values stay strings: management numbers like
// "00010000" and codes like "ZZ" must not be coerced.
const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: true,
  isArray: () => true,
});

const TEXT_KEY = "#text";

type RawObject = Record<string, unknown>;

function isRawObject(node: unknown): node is RawObject {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

/**
 * Read-only navigator over a parsed XML element. Lookups return
 * undefined/null/[] for absent tags; `requireText` is the strict variant.
 */
export class XmlElement {
  private constructor(
    readonly tag: string,
    private readonly node: unknown
  ) {}

  /** Parse a document and return its root element. */
  static parse(text: string): XmlElement {
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      const { msg, line } = validation.err;
      throw new MalformedResponseError(`Response is not well-formed XML (line ${line}): ${msg}`);
    }

    const parsed: unknown = parser.parse(text);
    if (isRawObject(parsed)) {
      for (const [tag, value] of Object.entries(parsed)) {
        const first = Array.isArray(value) ? value[0] : value;
        if (first !== undefined) return new XmlElement(tag, first);
      }
    }
    throw new MalformedResponseError("Response has no root element");
  }

  /** Direct children with the given tag, in document order. */
  all(tag: string): XmlElement[] {
    if (!isRawObject(this.node)) return [];
    const value = this.node[tag];
    if (value === undefined) return [];
    const nodes: unknown[] = Array.isArray(value) ? value : [value];
    return nodes.map((node) => new XmlElement(tag, node));
  }

  first(tag: string): XmlElement | undefined {
    return this.all(tag)[0];
  }

  /** All descendants with the given tag, depth-first in document order per parent. */
  descendants(tag: string): XmlElement[] {
    if (!isRawObject(this.node)) return [];
    const found: XmlElement[] = [];
    for (const key of Object.keys(this.node)) {
      if (key === TEXT_KEY) continue;
      for (const child of this.all(key)) {
        if (key === tag) found.push(child);
        found.push(...child.descendants(tag));
      }
    }
    return found;
  }

  /** Text content of this element; "" for an empty element. */
  text(): string {
    if (typeof this.node === "string") return this.node;
    if (typeof this.node === "number" || typeof this.node === "boolean") {
      return String(this.node);
    }
    if (isRawObject(this.node)) {
      const inner = this.node[TEXT_KEY];
      if (typeof inner === "string") return inner;
    }
    return "";
  }

  /** Text of the first child with the given tag, or null when absent. */
  childText(tag: string): string | null {
    return this.first(tag)?.text() ?? null;
  }

  requireText(tag: string): string {
    const text = this.childText(tag);
    if (text === null) throw MalformedResponseError.missingTag(tag, this.tag);
    return text;
  }
}
