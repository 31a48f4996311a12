#!/usr/bin/env tsx
/**
 * Stops and removes the containers of a stack, then its network
 *
 * Usage: tsx scripts/down.ts [file.yaml] [--volumes]
 *
 * --volumes also removes the named volumes the descriptor declares
 * (external volumes are never touched).
 */

import { loadStack } from "./lib/stack/loader";
import { loadSettings } from "./lib/settings";
import { createDockerRuntime } from "./lib/runtime/docker";
import { tearDown } from "./lib/sequencer";

async function main() {
  const settings = loadSettings();
  const args = process.argv.slice(2);
  const volumes = args.includes("--volumes");
  const file = args.find((a) => !a.startsWith("--")) ?? settings.stackFile;

  console.log("🗑️  Stack Down");
  console.log("═".repeat(60));

  const { descriptor } = loadStack({ file, project: settings.project });
  console.log(`   Project: ${descriptor.project}`);

  const runtime = createDockerRuntime({ bin: settings.dockerBin });
  const result = await tearDown(descriptor, { runtime, volumes });

  console.log("\n" + "═".repeat(60));
  console.log(`   ✅ Removed: ${result.removed.length}`);
  console.log(`   ❌ Failed: ${result.errors.length}`);

  if (!result.success) {
    for (const failure of result.errors) {
      console.log(`   - ${failure.target}: ${failure.error}`);
    }
    process.exit(1);
  }
  process.exit(0);
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
