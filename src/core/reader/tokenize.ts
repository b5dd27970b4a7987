// src/core/reader/tokenize.ts
// Lexer for the SODG construction language

import { malformed } from "../errors";

export type Tok =
  | { tag: "LParen"; line: number }
  | { tag: "RParen"; line: number }
  | { tag: "Comma"; line: number }
  | { tag: "Semi"; line: number }
  | { tag: "Str"; s: string; line: number }
  | { tag: "Word"; s: string; line: number };

export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;
  let line = 1;

  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";
  const isDelim = (c: string) =>
    isWS(c) || c === "(" || c === ")" || c === "," || c === ";" || c === "#" || c === "'" || c === "\"";

  while (i < src.length) {
    const c = src[i];

    // comments
    if (c === "#") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    if (c === "\n") { line++; i++; continue; }
    if (isWS(c)) { i++; continue; }

    if (c === "(") { toks.push({ tag: "LParen", line }); i++; continue; }
    if (c === ")") { toks.push({ tag: "RParen", line }); i++; continue; }
    if (c === ",") { toks.push({ tag: "Comma", line }); i++; continue; }
    if (c === ";") { toks.push({ tag: "Semi", line }); i++; continue; }

    if (c === "\"" || c === "'") {
      const quote = c;
      const start = line;
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i];
        if (d === quote) { i++; closed = true; break; }
        if (d === "\\") {
          const e = src[i + 1];
          if (e === "n") { s += "\n"; i += 2; continue; }
          if (e === "t") { s += "\t"; i += 2; continue; }
          s += e ?? "";
          i += 2;
          continue;
        }
        if (d === "\n") line++;
        s += d;
        i++;
      }
      if (!closed) {
        throw malformed(`Unterminated string literal`, start);
      }
      toks.push({ tag: "Str", s, line: start });
      continue;
    }

    // word: read until whitespace or delimiter
    let a = "";
    while (i < src.length && !isDelim(src[i])) {
      a += src[i];
      i++;
    }
    toks.push({ tag: "Word", s: a, line });
  }

  return toks;
}
