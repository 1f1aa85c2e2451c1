/**
 * Demo command - parses a scan-style command line and prints what the parser
 * made of it.
 *
 *   greedyflags-demo src out -v -e go mod py -f main.go
 *   greedyflags-demo -e go mod -n nightly -- src out
 */

import type { Flag, ParseResult } from "@greedyflags/sdk";
import { HelpRequested, ParseError } from "@greedyflags/sdk";
import { FlagSet } from "@greedyflags/core";
import type { CliCommand } from "./base.js";

/** Exit code for malformed command lines. */
const USAGE_EXIT_CODE = 2;

export class DemoCommand implements CliCommand {
  name = "greedyflags-demo";
  description = "Show how greedy flags and positional arguments are parsed";

  async execute(argv: string[]): Promise<number> {
    const flags = new FlagSet({ name: this.name });
    flags.setMandatoryArgs(2);
    const verbose = flags.bool("verbose", { shorthand: "v", usage: "Print every flag, not only the ones given" });
    const extensions = flags.stringList("extensions", { shorthand: "e", usage: "File extensions to match" });
    const files = flags.stringList("files", { shorthand: "f", usage: "Extra files to include" });
    const name = flags.string("name", { shorthand: "n", default: "scan", usage: "Name of the run" });
    const depth = flags.int("depth", { default: 1, usage: "Directory depth" });
    const json = flags.bool("json", { usage: "Print the result as JSON" });

    let result: ParseResult;
    try {
      result = flags.parse(argv);
    } catch (err) {
      if (err instanceof HelpRequested) {
        console.log(this.description);
        console.log("");
        console.log(flags.usage());
        return 0;
      }
      if (err instanceof ParseError) {
        console.error(`Error: ${err.message}`);
        console.error(`Run "${this.name} --help" for usage.`);
        return USAGE_EXIT_CODE;
      }
      throw err;
    }

    const [source, dest] = result.args;

    if (json.get()) {
      const summary = {
        source,
        dest,
        verbose: verbose.get(),
        extensions: extensions.get(),
        files: files.get(),
        name: name.get(),
        depth: depth.get(),
      };
      console.log(JSON.stringify(summary, null, 2));
      return 0;
    }

    console.log(`source: ${source}`);
    console.log(`dest: ${dest}`);
    const printFlag = (flag: Flag) => {
      console.log(`  --${flag.name} ${flag.value.render()}`);
    };
    if (verbose.get()) {
      flags.visitAll(printFlag);
    } else {
      result.visit(printFlag);
    }
    return 0;
  }
}
