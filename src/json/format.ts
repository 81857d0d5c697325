import { parseJson, type JsonDocument, type JsonError, type JsonNode } from './diagnose.js';
import { repairJson } from './repair.js';

/** Default indentation width for pretty-printed JSON. */
export const DEFAULT_JSON_INDENT = 2;

/** Settings for one JSON format run. */
export interface JsonFormatSettings {
  indent?: number;
  autoRepair?: boolean;
}

/** Result of the format orchestrator; `output` is present unless the run failed. */
export type JsonFormatOutcome =
  | { status: 'formatted'; output: string }
  | { status: 'repaired'; output: string; error: JsonError }
  | { status: 'failed'; error: JsonError; repairError?: JsonError };

/**
 * Pretty-print a parsed document in source key order. Numbers keep their
 * source text and non-ASCII characters are emitted verbatim. A repeated key
 * stays at its first position and takes its last value. An indent of 0
 * prints everything on one line.
 */
export function prettyPrintJson(document: JsonDocument, indent: number = DEFAULT_JSON_INDENT): string {
  return printNode(document.text, document.root, indent, 0);
}

/**
 * Parse, and on failure make exactly one repair attempt before giving up.
 * `error` always describes the failure of the input text.
 */
export function formatJsonText(text: string, settings: JsonFormatSettings = {}): JsonFormatOutcome {
  const indent = settings.indent ?? DEFAULT_JSON_INDENT;
  const parsed = parseJson(text);
  if (parsed.ok) {
    return { status: 'formatted', output: prettyPrintJson(parsed.document, indent) };
  }

  if (settings.autoRepair === false) {
    return { status: 'failed', error: parsed.error };
  }

  const reparsed = parseJson(repairJson(text));
  if (!reparsed.ok) {
    return { status: 'failed', error: parsed.error, repairError: reparsed.error };
  }

  return { status: 'repaired', output: prettyPrintJson(reparsed.document, indent), error: parsed.error };
}

function printNode(text: string, node: JsonNode, indent: number, depth: number): string {
  switch (node.type) {
    case 'object':
      return printContainer('{', '}', printMembers(text, node, indent, depth), indent, depth);
    case 'array':
      return printContainer(
        '[',
        ']',
        (node.children ?? []).map((child) => printNode(text, child, indent, depth + 1)),
        indent,
        depth
      );
    case 'string':
      return JSON.stringify(String(node.value));
    case 'number':
      return text.slice(node.offset, node.offset + node.length);
    case 'boolean':
      return node.value === true ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'property':
      throw new Error(`Unexpected property node at offset ${node.offset}`);
  }
}

function printMembers(text: string, node: JsonNode, indent: number, depth: number): string[] {
  const members = new Map<string, JsonNode>();
  for (const property of node.children ?? []) {
    const [key, value] = property.children ?? [];
    if (key !== undefined && value !== undefined) {
      members.set(String(key.value), value);
    }
  }

  const separator = indent > 0 ? ': ' : ':';
  return [...members].map(
    ([key, value]) => `${JSON.stringify(key)}${separator}${printNode(text, value, indent, depth + 1)}`
  );
}

function printContainer(open: string, close: string, items: string[], indent: number, depth: number): string {
  if (items.length === 0) {
    return `${open}${close}`;
  }
  if (indent === 0) {
    return `${open}${items.join(',')}${close}`;
  }

  const inner = ' '.repeat(indent * (depth + 1));
  const outer = ' '.repeat(indent * depth);
  return `${open}\n${items.map((item) => `${inner}${item}`).join(',\n')}\n${outer}${close}`;
}
