#!/usr/bin/env tsx
/**
 * Brings the services of a stack descriptor up in dependency order
 *
 * Usage: tsx scripts/up.ts [file.yaml]
 *
 * Environment variables:
 *   STACK_FILE           - Descriptor path (default: docker-compose.yaml in cwd)
 *   STACK_PROJECT        - Project name (default: descriptor name or directory name)
 *   DOCKER_BIN           - Container engine CLI (default: "docker")
 *   STACK_HEALTH_TIMEOUT - Milliseconds to wait for service_healthy dependencies (default: 120000)
 *   STACK_POLL_INTERVAL  - Milliseconds between health polls (default: 1000)
 */

import { loadStack, type LoadOptions, type LoadResult } from "./lib/stack/loader";
import { loadSettings } from "./lib/settings";
import { createDockerRuntime } from "./lib/runtime/docker";
import { bringUp, orderedServices } from "./lib/sequencer";
import { formatSummary, formatWarnings } from "./lib/report";
import { ConfigurationError } from "./lib/errors";

/**
 * Load the descriptor or exit listing every problem found
 */
function loadOrExit(options: LoadOptions): LoadResult {
  try {
    return loadStack(options);
  } catch (e) {
    if (e instanceof ConfigurationError) {
      console.error("❌ Descriptor is invalid, nothing was started:");
      for (const issue of e.issues) {
        console.error(`   - ${issue.path ? `(${issue.path}) ` : ""}${issue.message}`);
      }
      process.exit(1);
    }
    throw e;
  }
}

async function main() {
  const settings = loadSettings();
  const file = process.argv[2] ?? settings.stackFile;

  console.log("🚀 Stack Up");
  console.log("═".repeat(60));

  const { descriptor, warnings } = loadOrExit({ file, project: settings.project });
  for (const line of formatWarnings(warnings)) console.log(line);

  const order = orderedServices(descriptor).map((s) => s.name);
  console.log(`\n📦 Project: ${descriptor.project}`);
  console.log(`   File: ${descriptor.file}`);
  console.log(`   Start order: ${order.join(" → ")}`);

  const runtime = createDockerRuntime({ bin: settings.dockerBin });

  console.log("🔌 Checking container engine...");
  if (!(await runtime.ping())) {
    console.error(`❌ Cannot reach the container engine via '${settings.dockerBin}'`);
    process.exit(1);
  }
  console.log("✓ Engine reachable\n");

  const result = await bringUp(descriptor, {
    runtime,
    healthTimeoutMs: settings.healthTimeoutMs,
    pollIntervalMs: settings.pollIntervalMs,
  });

  console.log(formatSummary(result));
  process.exit(result.success ? 0 : 1);
}

main().catch((e) => {
  console.error("Fatal error:", e);
  process.exit(1);
});
