/**
 * Serves the stack status dashboard
 *
 * Environment variables:
 *   STACK_FILE     - Descriptor path (default: docker-compose.yaml in cwd)
 *   STACK_PROJECT  - Project name override
 *   DOCKER_BIN     - Container engine CLI (default: "docker")
 *   STATUS_UI_PORT - Listen port (default: 3000)
 */

import { serve } from "@hono/node-server";
import { loadStack } from "../../scripts/lib/stack/loader";
import { loadSettings } from "../../scripts/lib/settings";
import { createDockerRuntime } from "../../scripts/lib/runtime/docker";
import { createStatusApp } from "./app";

const settings = loadSettings();
const { descriptor } = loadStack({ file: settings.stackFile, project: settings.project });

const app = createStatusApp({
  descriptor,
  runtime: createDockerRuntime({ bin: settings.dockerBin }),
});

serve({ fetch: app.fetch, port: settings.statusUiPort }, (info) => {
  console.log(`Status UI for ${descriptor.project} running on port ${info.port}`);
});
