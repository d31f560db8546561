// ---------------------------------------------------------------------------
// Qantani SDK – XML Layer
// ---------------------------------------------------------------------------
// Request serialisation and response parsing on top of fast-xml-parser, plus
// the conversion of a parsed element into plain JS values.
//
// The conversion works on `XmlNode` only and never touches the parser, so it
// can be exercised against literal trees.
// ---------------------------------------------------------------------------

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type { NativeRecord, NativeValue, RequestParams } from "./types";

/** Element tree as produced by `parseXmlTree`. */
export interface XmlNode {
  readonly tag: string;
  /** Text before the first child element; `null` when empty. */
  readonly text: string | null;
  readonly children: readonly XmlNode[];
}

/** Fields of the `<Transaction>` request envelope. */
export interface RequestEnvelope {
  command: string;
  parameters: RequestParams;
  merchantId: string | number;
  merchantKey: string;
  checksum: string;
}

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const TEXT_NODE = "#text";
const ATTRIBUTES_NODE = ":@";

// preserveOrder keeps repeated tags and sibling order intact, which the
// conversion below depends on. Text is kept exactly as sent.
const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: false,
});

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: true,
  format: false,
  suppressEmptyNode: false,
});

// ── Request ────────────────────────────────────────────────────────────────

/**
 * Serialise a command into the `<Transaction>` document the API expects.
 * The `Parameters` block is left out when there are no parameters.
 */
export function buildRequestXml(envelope: RequestEnvelope): string {
  const parameters: Record<string, string> = {};
  for (const [key, value] of Object.entries(envelope.parameters)) {
    parameters[key] = String(value);
  }

  const transaction: Record<string, Record<string, string>> = {
    Action: {
      Name: envelope.command,
      Version: "1",
    },
  };

  if (Object.keys(parameters).length > 0) {
    transaction.Parameters = parameters;
  }

  transaction.Merchant = {
    ID: String(envelope.merchantId),
    Key: envelope.merchantKey,
    Checksum: envelope.checksum,
  };

  return XML_DECLARATION + String(xmlBuilder.build({ Transaction: transaction }));
}

// ── Response ───────────────────────────────────────────────────────────────

/**
 * Parse a document and return its root element.
 *
 * @throws {Error} if the input is not well-formed XML.
 */
export function parseXmlTree(xml: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new Error(`${msg} (line ${line}, column ${col})`);
  }

  const parsed: unknown = xmlParser.parse(xml);
  const root = Array.isArray(parsed) ? toNodes(parsed)[0] : undefined;
  if (!root) {
    throw new Error("Document has no root element");
  }
  return root;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert fast-xml-parser's ordered output into `XmlNode`s. Text entries
 * between elements (indentation, tail text) are not children.
 */
function toNodes(entries: unknown[]): XmlNode[] {
  const nodes: XmlNode[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;

    const tag = Object.keys(entry).find(
      (key) =>
        key !== TEXT_NODE && key !== ATTRIBUTES_NODE && !key.startsWith("?"),
    );
    if (tag === undefined) continue;

    const content = entry[tag];
    const items: unknown[] = Array.isArray(content) ? content : [];
    const first: unknown = items[0];
    const text =
      isRecord(first) && TEXT_NODE in first ? String(first[TEXT_NODE]) : "";

    nodes.push({
      tag,
      text: text.length > 0 ? text : null,
      children: toNodes(items),
    });
  }

  return nodes;
}

// ── Selectors ──────────────────────────────────────────────────────────────

/**
 * Find the first element matching a path, relative to `root`.
 *
 * Supports the XPath subset the API needs: `Tag`, `./Tag`, `./A/B`
 * and `.//Tag` (any descendant, document order). `*` matches any tag.
 */
export function findElement(root: XmlNode, path: string): XmlNode | undefined {
  let current: XmlNode[] = [root];
  let descendants = false;

  for (const step of path.split("/")) {
    if (step === ".") continue;
    if (step === "") {
      descendants = true;
      continue;
    }

    const next: XmlNode[] = [];
    for (const node of current) {
      const pool = descendants ? collectDescendants(node) : node.children;
      for (const candidate of pool) {
        if (step === "*" || candidate.tag === step) next.push(candidate);
      }
    }

    current = next;
    descendants = false;
  }

  return current[0];
}

function collectDescendants(node: XmlNode, into: XmlNode[] = []): XmlNode[] {
  for (const child of node.children) {
    into.push(child);
    collectDescendants(child, into);
  }
  return into;
}

// ── Conversion ─────────────────────────────────────────────────────────────

/**
 * Intermediate result of converting one element.
 *
 * `leaf` and `map` both stand for a single-entry mapping `{ tag: value }`;
 * `list` is a plain array produced by collapsing repeated tags.
 */
type Converted =
  | { readonly kind: "leaf"; readonly tag: string; readonly text: string | null }
  | {
      readonly kind: "map";
      readonly tag: string;
      readonly value: NativeRecord | NativeValue[];
    }
  | { readonly kind: "list"; readonly items: NativeValue[] };

type Entry = Exclude<Converted, { kind: "list" }>;

/**
 * Convert an element into plain JS values, collapsing where the shape allows:
 *
 * - `<X/>`                         → `{ X: null }`
 * - `<L><E>A</E><E>B</E></L>`      → `["A", "B"]`
 * - `<E><A>x</A><B>y</B></E>`      → `{ E: { A: "x", B: "y" } }`
 * - children that collapsed to arrays are kept as `{ tag: [...] }`.
 */
export function xmlToNative(node: XmlNode): NativeValue {
  return resolve(convert(node));
}

function convert(node: XmlNode): Converted {
  if (node.children.length === 0) {
    return { kind: "leaf", tag: node.tag, text: node.text };
  }

  const children = node.children.map(convert);
  const entries = children.filter(
    (child): child is Entry => child.kind !== "list",
  );

  if (entries.length === children.length) {
    const firstKey = entries[0].tag;

    if (entries.every((entry) => entry.tag === firstKey)) {
      return { kind: "list", items: entries.map(entryValue) };
    }

    const merged: NativeRecord = {};
    for (const entry of entries) {
      merged[entry.tag] = entryValue(entry);
    }
    return { kind: "map", tag: node.tag, value: merged };
  }

  return { kind: "map", tag: node.tag, value: children.map(resolve) };
}

function entryValue(entry: Entry): NativeValue {
  return entry.kind === "leaf" ? entry.text : entry.value;
}

function resolve(converted: Converted): NativeValue {
  if (converted.kind === "list") return converted.items;
  return { [converted.tag]: entryValue(converted) };
}
