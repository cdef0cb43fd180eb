import { applyEdits, findNodeAtLocation, parse, parseTree, printParseErrorCode } from "jsonc-parser";
import type { Edit, Node as JsonNode, ParseError } from "jsonc-parser";

export const MODULES_LIST_KEY = "modules-left";
export const USAGE_MODULES: readonly string[] = ["custom/claude-usage", "custom/codex-usage"];

const PARSE_OPTIONS = { allowTrailingComma: true, disallowComments: false } as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

/**
 * Parses JSONC text into an object. Throws with the offending path and the
 * first parser error; the caller is expected to abort before writing anything.
 */
export function parseJsoncObject(text: string, path: string): Record<string, unknown> {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(text, errors, PARSE_OPTIONS);
  if (errors.length > 0) {
    const first = errors[0];
    throw new Error(
      `Failed to parse JSONC: ${path} (${printParseErrorCode(first.error)} at offset ${first.offset})`
    );
  }
  if (!isRecord(parsed)) {
    throw new Error(`Failed to parse JSONC: ${path} (top-level value is not an object)`);
  }
  return parsed;
}

type Layout = {
  eol: string;
  /** One level of indentation as it appears in the file. */
  unit: string;
};

function detectLayout(text: string): Layout {
  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  const indented = text.split(/\r?\n/).find((line) => /^[ \t]+\S/.test(line));
  if (indented?.startsWith("\t")) {
    return { eol, unit: "\t" };
  }
  const width = indented ? indented.length - indented.trimStart().length : 2;
  return { eol, unit: " ".repeat(Math.min(Math.max(width, 2), 8)) };
}

function endOf(node: JsonNode): number {
  return node.offset + node.length;
}

/**
 * A Waybar config held as text. Every mutation is a single text edit at the
 * parse-tree offsets of the touched node; nothing else in the file is
 * re-emitted, so comments and layout survive and an insert followed by the
 * matching removal gives back the original bytes.
 */
export class WaybarConfigDocument {
  private text: string;
  private data: Record<string, unknown>;
  private readonly layout: Layout;

  constructor(
    readonly path: string,
    text: string
  ) {
    this.text = text.trim().length > 0 ? text : "{}\n";
    this.data = parseJsoncObject(this.text, path);
    this.layout = detectLayout(this.text);
  }

  get content(): string {
    return this.text;
  }

  get value(): Readonly<Record<string, unknown>> {
    return this.data;
  }

  /**
   * Appends missing `entries` to the list at `listKey`. A non-list value is
   * replaced with an empty list first.
   */
  ensureEntries(listKey: string, entries: readonly string[]): boolean {
    let changed = false;
    const current = this.valueNode(listKey);
    if (!current) {
      this.insertProperty(listKey, []);
      changed = true;
    } else if (current.type !== "array") {
      this.replace(current, "[]");
      changed = true;
    }

    for (const entry of entries) {
      const list = this.data[listKey];
      if (Array.isArray(list) && list.includes(entry)) continue;
      const node = this.valueNode(listKey);
      if (node?.type !== "array") break;
      this.appendElement(node, entry);
      changed = true;
    }
    return changed;
  }

  /** Copies each missing definition from `template` verbatim. */
  ensureDefinitions(entries: readonly string[], template: Readonly<Record<string, unknown>>): boolean {
    let changed = false;
    for (const key of entries) {
      if (key in this.data || !(key in template)) continue;
      this.insertProperty(key, template[key]);
      changed = true;
    }
    return changed;
  }

  removeEntries(listKey: string, entries: readonly string[]): boolean {
    const current = this.data[listKey];
    if (!Array.isArray(current)) return false;
    let changed = false;
    // Back to front, so the indexes still to visit keep matching the tree.
    for (let idx = current.length - 1; idx >= 0; idx -= 1) {
      const item: unknown = current[idx];
      if (typeof item !== "string" || !entries.includes(item)) continue;
      const node = this.valueNode(listKey);
      if (node?.type !== "array") break;
      this.removeElement(node, idx);
      changed = true;
    }
    return changed;
  }

  removeDefinitions(entries: readonly string[]): boolean {
    let changed = false;
    for (const key of entries) {
      if (!(key in this.data)) continue;
      this.removeProperty(key);
      changed = true;
    }
    return changed;
  }

  /**
   * Adds `--browser <name>` flags after `--waybar` in the `exec` command of each
   * module, unless the command already names a browser.
   */
  applyBrowserFlags(entries: readonly string[], browsers: readonly string[]): boolean {
    if (browsers.length === 0) return false;
    const flags = browsers.map((browser) => `--browser ${browser}`).join(" ");
    let changed = false;

    for (const key of entries) {
      const entry = this.data[key];
      if (!isRecord(entry)) continue;
      const exec = entry.exec;
      if (typeof exec !== "string" || !exec.includes("--waybar") || exec.includes("--browser")) {
        continue;
      }
      const node = findNodeAtLocation(this.root(), [key, "exec"]);
      if (!node) continue;
      this.replace(node, JSON.stringify(exec.replace("--waybar", `--waybar ${flags}`)));
      changed = true;
    }
    return changed;
  }

  private root(): JsonNode {
    const root = parseTree(this.text, [], PARSE_OPTIONS);
    if (root?.type !== "object") {
      throw new Error(`Failed to parse JSONC: ${this.path} (top-level value is not an object)`);
    }
    return root;
  }

  private valueNode(key: string): JsonNode | undefined {
    return findNodeAtLocation(this.root(), [key]);
  }

  /** Leading whitespace of the line `offset` sits on, when only whitespace precedes it. */
  private lineIndent(offset: number): string | null {
    const lineStart = this.text.lastIndexOf("\n", offset - 1) + 1;
    const lead = this.text.slice(lineStart, offset);
    return /^[ \t]*$/.test(lead) ? lead : null;
  }

  private render(value: unknown, indent: string): string {
    const { eol, unit } = this.layout;
    return JSON.stringify(value, null, unit).split("\n").join(eol + indent);
  }

  private insertProperty(key: string, value: unknown): void {
    const { eol, unit } = this.layout;
    const root = this.root();
    const props = root.children ?? [];
    const last = props[props.length - 1];
    if (!last) {
      const body = `${unit}${JSON.stringify(key)}: ${this.render(value, unit)}`;
      this.apply({ offset: root.offset + 1, length: 0, content: `${eol}${body}${eol}` });
      return;
    }
    const indent = this.lineIndent(last.offset) ?? unit;
    this.apply({
      offset: endOf(last),
      length: 0,
      content: `,${eol}${indent}${JSON.stringify(key)}: ${this.render(value, indent)}`,
    });
  }

  private removeProperty(key: string): void {
    const root = this.root();
    const props = root.children ?? [];
    const idx = props.findIndex((prop) => prop.children?.[0]?.value === key);
    if (idx < 0) return;
    this.apply(this.removal(props, idx));
  }

  private appendElement(node: JsonNode, value: string): void {
    const items = node.children ?? [];
    const last = items[items.length - 1];
    const literal = JSON.stringify(value);
    if (!last) {
      this.apply({ offset: node.offset + 1, length: 0, content: literal });
      return;
    }
    const multiline = this.text.slice(node.offset, endOf(node)).includes("\n");
    const indent = multiline ? this.lineIndent(last.offset) : null;
    const separator = indent === null ? ", " : `,${this.layout.eol}${indent}`;
    this.apply({ offset: endOf(last), length: 0, content: separator + literal });
  }

  private removeElement(node: JsonNode, idx: number): void {
    const items = node.children ?? [];
    if (!items[idx]) return;
    this.apply(this.removal(items, idx));
  }

  /**
   * The span to delete for `siblings[idx]`: from the end of the previous
   * sibling, or up to the start of the next one when it is the first. A lone
   * child takes its own text only.
   */
  private removal(siblings: JsonNode[], idx: number): Edit {
    const target = siblings[idx];
    const prev = siblings[idx - 1];
    const next = siblings[idx + 1];
    if (prev) {
      return { offset: endOf(prev), length: endOf(target) - endOf(prev), content: "" };
    }
    if (next) {
      return { offset: target.offset, length: next.offset - target.offset, content: "" };
    }
    return { offset: target.offset, length: target.length, content: "" };
  }

  private replace(node: JsonNode, content: string): void {
    this.apply({ offset: node.offset, length: node.length, content });
  }

  private apply(edit: Edit): void {
    this.text = applyEdits(this.text, [edit]);
    this.data = parseJsoncObject(this.text, this.path);
  }
}
