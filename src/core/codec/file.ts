// src/core/codec/file.ts
// Synchronous save/load of the binary form

import * as fs from "fs";
import * as path from "path";
import { Graph } from "../graph/graph";
import { ioError } from "../errors";
import { deserialize, serialize } from "./binary";

export function saveGraph(file: string, g: Graph): number {
  const bytes = serialize(g);
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, bytes);
  } catch (e) {
    throw ioError(file, e);
  }
  return bytes.length;
}

export function loadGraph(file: string): Graph {
  let bytes: Uint8Array;
  try {
    bytes = fs.readFileSync(file);
  } catch (e) {
    throw ioError(file, e);
  }
  return deserialize(bytes);
}
