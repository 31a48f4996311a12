#!/usr/bin/env tsx
/**
 * Lists the declared services of a stack with their container state
 *
 * Usage: tsx scripts/ps.ts [file.yaml]
 */

import { loadStack } from "./lib/stack/loader";
import { loadSettings } from "./lib/settings";
import { createDockerRuntime } from "./lib/runtime/docker";
import { collectStatus, formatStatusTable } from "./lib/status";

async function main() {
  const settings = loadSettings();
  const { descriptor } = loadStack({
    file: process.argv[2] ?? settings.stackFile,
    project: settings.project,
  });

  const runtime = createDockerRuntime({ bin: settings.dockerBin });
  const rows = await collectStatus(descriptor, runtime);

  console.log(formatStatusTable(rows));
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
