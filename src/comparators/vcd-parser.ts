/**
 * Parser for VCD (Value Change Dump) waveform traces.
 * Produces a canonical model in which run-specific metadata no longer
 * appears:
 *
 * - `$date`, `$version` and `$comment` blocks are dropped
 * - identifier codes are replaced by hierarchical signal names; one code
 *   shared by several variables yields a change for each of them
 * - vector values are lowercased and left-extended to the declared width
 *   (a width-1 vector and a scalar compare equal)
 * - a change that repeats a signal's current value is dropped
 * - changes within one time step are ordered by signal name
 * - consecutive `#t` markers with the same time are merged, and time steps
 *   left empty are dropped, except the last one (it marks the end time)
 */

import { readFile } from "fs/promises";
import { compareStrings } from "../compare.js";
import { TraceParseError } from "../errors.js";

export interface VcdSignal {
  /** Dotted hierarchical name, with any bit range appended ("top.sub.data[3:0]") */
  path: string;
  type: string;
  width: number;
}

export interface VcdChange {
  signal: string;
  value: string;
}

export interface VcdTimestep {
  /** Simulation time in timescale units, canonical decimal */
  time: string;
  changes: VcdChange[];
}

export interface WaveformTrace {
  /** Normalized timescale ("1ps"), or null when the header has none */
  timescale: string | null;
  /** Declared signals sorted by path */
  signals: VcdSignal[];
  timesteps: VcdTimestep[];
}

interface Token {
  text: string;
  line: number;
}

const METADATA_BLOCKS = new Set(["$date", "$version", "$comment"]);
const DUMP_MARKERS = new Set(["$dumpvars", "$dumpall", "$dumpon", "$dumpoff", "$end"]);
const SCALAR_VALUES = new Set(["0", "1", "x", "z", "u", "w", "l", "h", "-"]);

/**
 * Split content into whitespace-separated tokens with line numbers.
 */
const tokenize = (content: string): Token[] => {
  const tokens: Token[] = [];
  content.split("\n").forEach((lineText, index) => {
    for (const text of lineText.trim().split(/\s+/)) {
      if (text.length > 0) tokens.push({ text, line: index + 1 });
    }
  });
  return tokens;
};

/**
 * Left-extend a vector value to the declared width following VCD rules:
 * a leading 0 or 1 extends with 0, x and z extend with themselves.
 */
export const extendVector = (bits: string, width: number): string => {
  const lower = bits.toLowerCase();
  if (lower.length >= width) return lower;
  const lead = lower[0];
  const fill = lead === "x" || lead === "z" ? lead : "0";
  return fill.repeat(width - lower.length) + lower;
};

/**
 * Parse VCD content into the canonical model (pure function for testing).
 */
export const parseVcdContent = (content: string): WaveformTrace => {
  const tokens = tokenize(content);
  const scopes: string[] = [];
  const signals: VcdSignal[] = [];
  const byId = new Map<string, VcdSignal[]>();
  const rawSteps: Array<{ time: string; changes: VcdChange[] }> = [];
  let timescale: string | null = null;
  let pos = 0;

  const fail = (token: Token | undefined, detail: string): never => {
    throw new TraceParseError("vcd", token?.line ?? tokens[tokens.length - 1]?.line ?? 0, detail);
  };

  const next = (what: string): Token => {
    const token = tokens[pos++];
    if (!token) return fail(undefined, `unexpected end of file, expected ${what}`);
    return token;
  };

  /** Collect tokens up to (not including) the closing $end. */
  const untilEnd = (keyword: Token): Token[] => {
    const body: Token[] = [];
    for (;;) {
      const token = tokens[pos++];
      if (!token) return fail(keyword, `${keyword.text} is missing its $end`);
      if (token.text === "$end") return body;
      body.push(token);
    }
  };

  const currentStep = (): { time: string; changes: VcdChange[] } => {
    let step = rawSteps[rawSteps.length - 1];
    if (!step) {
      step = { time: "0", changes: [] };
      rawSteps.push(step);
    }
    return step;
  };

  const recordChange = (token: Token, id: string, value: string): void => {
    const targets = byId.get(id);
    if (!targets) {
      fail(token, `value change for undeclared identifier '${id}'`);
      return;
    }
    const step = currentStep();
    for (const signal of targets) {
      const canonical =
        value.startsWith("r") || value.startsWith("s")
          ? value
          : extendVector(value, signal.width);
      step.changes.push({ signal: signal.path, value: canonical });
    }
  };

  while (pos < tokens.length) {
    const token = tokens[pos++];
    const text = token.text;

    if (METADATA_BLOCKS.has(text)) {
      untilEnd(token);
    } else if (text === "$timescale") {
      timescale = untilEnd(token)
        .map((t) => t.text)
        .join("")
        .toLowerCase();
    } else if (text === "$scope") {
      const body = untilEnd(token);
      if (body.length < 2) fail(token, "$scope needs a type and a name");
      scopes.push(body[1].text);
    } else if (text === "$upscope") {
      untilEnd(token);
      if (scopes.length === 0) fail(token, "$upscope without matching $scope");
      scopes.pop();
    } else if (text === "$var") {
      const body = untilEnd(token);
      if (body.length < 4) fail(token, "$var needs a type, size, identifier and reference");
      const width = Number(body[1].text);
      if (!Number.isInteger(width) || width < 1) {
        fail(body[1], `invalid $var size '${body[1].text}'`);
      }
      const reference = body
        .slice(3)
        .map((t) => t.text)
        .join("");
      const signal: VcdSignal = {
        path: [...scopes, reference].join("."),
        type: body[0].text,
        width,
      };
      signals.push(signal);
      const id = body[2].text;
      byId.set(id, [...(byId.get(id) ?? []), signal]);
    } else if (text === "$enddefinitions") {
      untilEnd(token);
    } else if (DUMP_MARKERS.has(text)) {
      // Dump section markers carry no data of their own
    } else if (text.startsWith("$")) {
      // Vendor extensions ($attrbegin, ...) are not part of the comparison
      untilEnd(token);
    } else if (text.startsWith("#")) {
      const digits = text.slice(1);
      if (!/^\d+$/.test(digits)) fail(token, `invalid time '${text}'`);
      const time = BigInt(digits).toString();
      const last = rawSteps[rawSteps.length - 1];
      if (!last || last.time !== time) {
        rawSteps.push({ time, changes: [] });
      }
    } else if (/^[bB]/.test(text)) {
      const id = next("identifier after vector value");
      recordChange(token, id.text, text.slice(1));
    } else if (/^[rR]/.test(text)) {
      const id = next("identifier after real value");
      recordChange(token, id.text, `r${text.slice(1)}`);
    } else if (/^[sS]/.test(text)) {
      const id = next("identifier after string value");
      recordChange(token, id.text, `s${text.slice(1)}`);
    } else if (text.length > 1 && SCALAR_VALUES.has(text[0].toLowerCase())) {
      recordChange(token, text.slice(1), text[0].toLowerCase());
    } else {
      fail(token, `unexpected token '${text}'`);
    }
  }

  if (scopes.length > 0) {
    fail(undefined, `unterminated $scope '${scopes[scopes.length - 1]}'`);
  }

  return {
    timescale,
    signals: [...signals].sort((a, b) => compareStrings(a.path, b.path)),
    timesteps: canonicalizeSteps(rawSteps),
  };
};

const canonicalizeSteps = (
  rawSteps: Array<{ time: string; changes: VcdChange[] }>,
): VcdTimestep[] => {
  const current = new Map<string, string>();
  const steps: VcdTimestep[] = [];

  rawSteps.forEach((raw, index) => {
    const changes = raw.changes.filter((change) => {
      if (current.get(change.signal) === change.value) return false;
      current.set(change.signal, change.value);
      return true;
    });
    const isLast = index === rawSteps.length - 1;
    if (changes.length === 0 && !isLast) return;
    steps.push({
      time: raw.time,
      changes: [...changes].sort((a, b) => compareStrings(a.signal, b.signal)),
    });
  });

  return steps;
};

/**
 * Parse a VCD file from disk.
 */
export const parseVcd = async (filePath: string): Promise<WaveformTrace> => {
  const content = await readFile(filePath, "utf-8");
  return parseVcdContent(content);
};
