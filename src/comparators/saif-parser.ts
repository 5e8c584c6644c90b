/**
 * Parser for SAIF (Switching Activity Interchange Format) summaries.
 *
 * SAIF is an s-expression format: a header (version, design, timescale,
 * duration, tool metadata) followed by nested INSTANCE forms whose NET and
 * PORT sections hold per-signal toggle and duration counters:
 *
 *   (SAIFILE
 *     (SAIFVERSION "2.0")
 *     (DIVIDER / )
 *     (TIMESCALE 1ps)
 *     (DURATION 100)
 *     (INSTANCE top
 *       (NET
 *         (clk (T0 50) (T1 50) (TX 0) (TC 20))
 *       )
 *     )
 *   )
 */

import { readFile } from "fs/promises";
import { compareStrings } from "../compare.js";
import { TraceParseError } from "../errors.js";

/** Header fields that describe the recorded activity. */
export const SEMANTIC_HEADER_FIELDS = [
  "SAIFVERSION",
  "DIRECTION",
  "DESIGN",
  "DIVIDER",
  "TIMESCALE",
  "DURATION",
] as const;

/** Header fields that describe the producing run; never compared. */
export const METADATA_HEADER_FIELDS = ["DATE", "VENDOR", "PROGRAM_NAME", "VERSION"] as const;

export type SaifSection = "net" | "port";

export interface SaifSignal {
  /** Hierarchical name joined with the file's divider */
  path: string;
  section: SaifSection;
  /** Counter name (T0, T1, TX, TZ, TB, TC, IG, ...) -> canonical decimal */
  counters: Record<string, string>;
}

export interface ActivityTrace {
  header: Partial<Record<(typeof SEMANTIC_HEADER_FIELDS)[number], string>>;
  metadata: Partial<Record<(typeof METADATA_HEADER_FIELDS)[number], string>>;
  /** Sorted by section, then path */
  signals: SaifSignal[];
}

// =============================================================================
// S-expression Reader
// =============================================================================

export type SNode =
  | { kind: "atom"; text: string; line: number }
  | { kind: "string"; text: string; line: number }
  | { kind: "list"; items: SNode[]; line: number };

/**
 * Read the s-expression tree. Backslash escapes the next character inside
 * an atom (`data\[0\]` reads as `data[0]`).
 */
export const readSExpressions = (content: string): SNode[] => {
  const roots: SNode[] = [];
  const stack: Array<{ items: SNode[]; line: number }> = [];
  let line = 1;
  let i = 0;

  const push = (node: SNode): void => {
    const top = stack[stack.length - 1];
    (top ? top.items : roots).push(node);
  };

  while (i < content.length) {
    const ch = content[i];

    if (ch === "\n") {
      line++;
      i++;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === "(") {
      stack.push({ items: [], line });
      i++;
    } else if (ch === ")") {
      const done = stack.pop();
      if (!done) throw new TraceParseError("saif", line, "unbalanced ')'");
      push({ kind: "list", items: done.items, line: done.line });
      i++;
    } else if (ch === '"') {
      const start = line;
      let text = "";
      i++;
      while (i < content.length && content[i] !== '"') {
        if (content[i] === "\n") line++;
        text += content[i];
        i++;
      }
      if (i >= content.length) throw new TraceParseError("saif", start, "unterminated string");
      i++;
      push({ kind: "string", text, line: start });
    } else {
      let text = "";
      while (i < content.length && !/[\s()"]/.test(content[i])) {
        if (content[i] === "\\" && i + 1 < content.length) {
          text += content[i + 1];
          i += 2;
        } else {
          text += content[i];
          i++;
        }
      }
      push({ kind: "atom", text, line });
    }
  }

  if (stack.length > 0) {
    throw new TraceParseError("saif", stack[stack.length - 1].line, "unclosed '('");
  }
  return roots;
};

// =============================================================================
// SAIF Interpretation
// =============================================================================

const headOf = (node: SNode): string | null => {
  if (node.kind !== "list") return null;
  const first = node.items[0];
  return first && first.kind === "atom" ? first.text.toUpperCase() : null;
};

const scalarText = (nodes: readonly SNode[]): string[] =>
  nodes.flatMap((node) => (node.kind === "list" ? [] : [node.text]));

const isHeaderField = <T extends readonly string[]>(fields: T, name: string): name is T[number] =>
  fields.some((field) => field === name);

/**
 * Parse SAIF content into the canonical model (pure function for testing).
 */
export const parseSaifContent = (content: string): ActivityTrace => {
  const roots = readSExpressions(content);
  const root = roots.find((node) => headOf(node) === "SAIFILE");
  if (!root || root.kind !== "list") {
    throw new TraceParseError("saif", 1, "missing (SAIFILE ...) form");
  }

  const header: ActivityTrace["header"] = {};
  const metadata: ActivityTrace["metadata"] = {};
  const signals = new Map<string, SaifSignal>();
  let divider = "/";

  const readSignals = (
    section: SaifSection,
    list: Extract<SNode, { kind: "list" }>,
    instancePath: readonly string[],
  ): void => {
    for (const entry of list.items.slice(1)) {
      if (entry.kind !== "list" || entry.items.length === 0) {
        throw new TraceParseError("saif", entry.line, `malformed ${section.toUpperCase()} entry`);
      }
      const [nameNode, ...counterNodes] = entry.items;
      if (nameNode.kind === "list") {
        throw new TraceParseError("saif", entry.line, "signal entry must start with a name");
      }

      const counters: Record<string, string> = {};
      for (const counter of counterNodes) {
        const [key, value] = counter.kind === "list" ? scalarText(counter.items) : [];
        if (key === undefined || value === undefined || !/^\d+$/.test(value)) {
          throw new TraceParseError(
            "saif",
            counter.line,
            `invalid counter on ${nameNode.text}`,
          );
        }
        counters[key.toUpperCase()] = BigInt(value).toString();
      }

      const path = [...instancePath, nameNode.text].join(divider);
      const key = `${section} ${path}`;
      if (signals.has(key)) {
        throw new TraceParseError("saif", entry.line, `duplicate ${section} ${path}`);
      }
      signals.set(key, { path, section, counters });
    }
  };

  const readInstance = (
    list: Extract<SNode, { kind: "list" }>,
    parentPath: readonly string[],
  ): void => {
    const rest = list.items.slice(1);
    const names = scalarText(rest.filter((node) => node.kind !== "list"));
    // (INSTANCE "module" name ...) or (INSTANCE name ...)
    const name = names[names.length - 1];
    if (name === undefined) {
      throw new TraceParseError("saif", list.line, "INSTANCE without a name");
    }
    const instancePath = [...parentPath, name];

    for (const child of rest) {
      if (child.kind !== "list") continue;
      const head = headOf(child);
      if (head === "NET") readSignals("net", child, instancePath);
      else if (head === "PORT") readSignals("port", child, instancePath);
      else if (head === "INSTANCE") readInstance(child, instancePath);
    }
  };

  for (const node of root.items.slice(1)) {
    if (node.kind !== "list") continue;
    const head = headOf(node);
    if (head === null) continue;

    if (head === "INSTANCE") {
      readInstance(node, []);
      continue;
    }

    const values = scalarText(node.items.slice(1));
    if (head === "DIVIDER") {
      divider = values[0] ?? divider;
      header.DIVIDER = divider;
    } else if (head === "TIMESCALE") {
      header.TIMESCALE = values.join("").toLowerCase();
    } else if (isHeaderField(SEMANTIC_HEADER_FIELDS, head)) {
      header[head] = values.join(" ");
    } else if (isHeaderField(METADATA_HEADER_FIELDS, head)) {
      metadata[head] = values.join(" ");
    }
  }

  const sorted = [...signals.entries()]
    .sort(([a], [b]) => compareStrings(a, b))
    .map(([, signal]) => signal);

  return { header, metadata, signals: sorted };
};

/**
 * Parse a SAIF file from disk.
 */
export const parseSaif = async (filePath: string): Promise<ActivityTrace> => {
  const content = await readFile(filePath, "utf-8");
  return parseSaifContent(content);
};
