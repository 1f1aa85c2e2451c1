#!/usr/bin/env node

/**
 * Entry point for greedyflags-demo.
 */

import { DemoCommand } from "./commands/demo.js";

async function main(): Promise<number> {
  return new DemoCommand().execute(process.argv.slice(2));
}

// CLI entry point
main()
  .then(exitCode => process.exit(exitCode))
  .catch(err => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
