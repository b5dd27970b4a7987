// src/cli/types.ts
// A fully parsed sodg invocation

export type Command =
  | { name: "compile"; source: string; output: string; force: boolean }
  | { name: "merge"; target: string; inputs: string[] }
  | { name: "empty"; output: string }
  | { name: "dataize"; binary: string; object: string; dump?: string }
  | { name: "inspect"; binary: string; locator: string }
  | { name: "dot"; binary: string; output?: string };

export type CommandName = Command["name"];
