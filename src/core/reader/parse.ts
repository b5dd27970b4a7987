// src/core/reader/parse.ts
// Parser: token stream -> ordered instruction list

import { malformed } from "../errors";
import { tokenize, type Tok } from "./tokenize";

export type Op = "ADD" | "BIND" | "PUT";

export type Instruction = {
  op: Op;
  args: string[];
  /** 1-based line of the instruction keyword. */
  line: number;
  /** Canonical text, used in diagnostics. */
  text: string;
};

const ARITY: Record<Op, number> = { ADD: 1, BIND: 3, PUT: 2 };

function isOp(s: string): s is Op {
  return s === "ADD" || s === "BIND" || s === "PUT";
}

export function render(op: string, args: string[]): string {
  return `${op}(${args.join(", ")});`;
}

export function parseInstructions(src: string): Instruction[] {
  const toks = tokenize(src);
  const out: Instruction[] = [];
  let i = 0;

  const peek = (): Tok | undefined => toks[i];

  while (i < toks.length) {
    const head = toks[i];
    if (head.tag !== "Word") {
      throw malformed(`Expected an instruction, got '${describe(head)}'`, head.line);
    }
    const line = head.line;
    const name = head.s;
    i++;

    const open = peek();
    if (!open || open.tag !== "LParen") {
      throw malformed(`Expected '(' after ${name}`, line, name);
    }
    i++;

    const args: string[] = [];
    let words: string[] = [];
    let quoted: string | undefined;
    let closed = false;

    const flush = () => {
      if (quoted !== undefined) {
        args.push(quoted);
      } else {
        args.push(words.join(" "));
      }
      words = [];
      quoted = undefined;
    };

    while (i < toks.length) {
      const t = toks[i];
      i++;
      if (t.tag === "RParen") {
        if (words.length > 0 || quoted !== undefined || args.length > 0) flush();
        closed = true;
        break;
      }
      if (t.tag === "Comma") { flush(); continue; }
      if (t.tag === "Word") {
        if (quoted !== undefined) {
          throw malformed(`Unexpected '${t.s}' after a quoted argument`, t.line, name);
        }
        words.push(t.s);
        continue;
      }
      if (t.tag === "Str") {
        if (quoted !== undefined || words.length > 0) {
          throw malformed(`Unexpected string literal in ${name}`, t.line, name);
        }
        quoted = t.s;
        continue;
      }
      throw malformed(`Unexpected '${describe(t)}' in ${name}`, t.line, name);
    }
    if (!closed) {
      throw malformed(`Unbalanced parentheses in ${name}`, line, name);
    }

    const semi = peek();
    if (!semi || semi.tag !== "Semi") {
      throw malformed(`Missing ';' after ${name}(...)`, line, render(name, args));
    }
    i++;

    const text = render(name, args);
    if (!isOp(name)) {
      throw malformed(`Unknown instruction ${name}`, line, text);
    }
    if (args.length !== ARITY[name]) {
      throw malformed(`${name} takes ${ARITY[name]} argument(s), got ${args.length}`, line, text);
    }
    out.push({ op: name, args, line, text });
  }

  return out;
}

function describe(t: Tok): string {
  switch (t.tag) {
    case "LParen": return "(";
    case "RParen": return ")";
    case "Comma": return ",";
    case "Semi": return ";";
    case "Str": return JSON.stringify(t.s);
    case "Word": return t.s;
  }
}
