#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: Importing the CLI helpers must not trigger command parsing.

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

function entryUrl(entry: string): string {
  try {
    // npm installs the bin as a symlink
    return pathToFileURL(realpathSync(entry)).href;
  } catch {
    return pathToFileURL(entry).href;
  }
}

const executedDirectly = process.argv[1] ? entryUrl(process.argv[1]) === import.meta.url : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
