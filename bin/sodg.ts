#!/usr/bin/env npx tsx
// bin/sodg.ts
// sodg command: compile, merge, dataize and inspect object graphs
//
// Run:  npx tsx bin/sodg.ts [options] <command> [arguments]

import * as fs from "fs";
import * as path from "path";
import { runCli } from "./sodg-cli-lib";
import { StdoutPort } from "../src/ports/output";

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

function loadEnvFile(): void {
  const envPath = path.join(process.cwd(), ".env");
  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, "utf8");
    for (const line of envContent.split("\n")) {
      const match = line.match(/^([^=#]+)=(.*)$/);
      if (match && !process.env[match[1].trim()]) {
        process.env[match[1].trim()] = match[2].trim();
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): void {
  loadEnvFile();
  process.exitCode = runCli(process.argv.slice(2), {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    output: new StdoutPort(),
    cwd: process.cwd(),
    env: process.env,
  });
}

main();
