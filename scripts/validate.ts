#!/usr/bin/env tsx
/**
 * Validates stack descriptors: schema, references, cycles, port claims
 * and the files they point at
 *
 * Usage: tsx scripts/validate.ts [file1.yaml file2.yaml ...]
 *
 * Without arguments the descriptor in the working directory is validated
 * (STACK_FILE, or the first of docker-compose.yaml, compose.yaml, ...).
 */

import { validateStack } from "./lib/stack/loader";
import { loadSettings } from "./lib/settings";
import { formatResults } from "./lib/report";

function main(): void {
  const settings = loadSettings();
  const args = process.argv.slice(2);
  const files: Array<string | undefined> = args.length > 0 ? args : [settings.stackFile];

  console.log("🔍 Stack Validator");
  console.log("═".repeat(60));

  let hasErrors = false;

  for (const file of files) {
    const result = validateStack({ file, project: settings.project });
    console.log(formatResults(file ?? "(working directory)", result));

    if (!result.valid) {
      hasErrors = true;
    }
  }

  console.log("\n" + "═".repeat(60));

  if (hasErrors) {
    console.log("❌ Validation failed - fix errors above before bringing the stack up");
    process.exit(1);
  } else {
    console.log("✅ All descriptors validated successfully");
    process.exit(0);
  }
}

try {
  main();
} catch (e) {
  console.error("Fatal error:", e instanceof Error ? e.message : e);
  process.exit(1);
}
