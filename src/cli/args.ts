/**
 * Command-line argument parsing for the CLI entrypoint
 */

import type { SelectionCategory } from "@/types/selection";

export type CliArgs = {
  category: SelectionCategory;
  count: number;
  list: boolean;
};

const CATEGORIES: readonly SelectionCategory[] = ["desktop", "mobile", "random"];

function isCategory(value: string): value is SelectionCategory {
  return CATEGORIES.some((category) => category === value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { category: "random", count: 1, list: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--list") {
      args.list = true;
    } else if (arg === "--count") {
      const count = Number(argv[++i]);
      if (!Number.isInteger(count) || count < 1) {
        throw new Error(`--count expects a positive integer, got ${argv[i]}`);
      }
      args.count = count;
    } else if (isCategory(arg)) {
      args.category = arg;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (args.list && args.category === "random") {
    throw new Error("--list needs a category: desktop or mobile");
  }

  return args;
}
