#!/usr/bin/env tsx
/**
 * Prints the normalized descriptor: variables substituted, short syntax
 * expanded, paths relative to the project directory
 *
 * Usage: tsx scripts/config.ts [file.yaml]
 *
 * Environment variables:
 *   STACK_FILE    - Descriptor path (default: docker-compose.yaml in cwd)
 *   STACK_PROJECT - Project name override
 *   CONFIG_OUT    - Write the output to this path instead of stdout
 */

import { writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { loadStack } from "./lib/stack/loader";
import { renderStack } from "./lib/stack/render";
import { loadSettings } from "./lib/settings";
import { formatWarnings } from "./lib/report";

const settings = loadSettings();
const file = process.argv[2] ?? settings.stackFile;
const outPath = settings.configOut;

try {
  const { descriptor, warnings } = loadStack({ file, project: settings.project });
  for (const line of formatWarnings(warnings)) console.error(line);

  const yaml = renderStack(descriptor);

  if (outPath) {
    mkdirSync(dirname(outPath), { recursive: true });
    writeFileSync(outPath, yaml);
    console.error(`Generated ${outPath}`);
    console.error(`Services: ${descriptor.services.map((s) => s.name).join(", ")}`);
  } else {
    process.stdout.write(yaml);
  }
} catch (e) {
  console.error("Fatal error:", e instanceof Error ? e.message : e);
  process.exit(1);
}
