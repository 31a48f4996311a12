import { test, expect } from "vitest";
import { loadSettings } from "../scripts/lib/settings";
import { formatResults, formatSummary } from "../scripts/lib/report";
import { ConfigurationError } from "../scripts/lib/errors";

test("defaults", () => {
  expect(loadSettings({})).toEqual({
    stackFile: undefined,
    project: undefined,
    dockerBin: "docker",
    healthTimeoutMs: 120_000,
    pollIntervalMs: 1_000,
    statusUiPort: 3000,
    configOut: undefined,
  });
});

test("environment overrides", () => {
  const settings = loadSettings({
    STACK_FILE: "deploy/compose.yaml",
    STACK_PROJECT: "demo",
    DOCKER_BIN: "podman",
    STACK_HEALTH_TIMEOUT: "30000",
    STATUS_UI_PORT: "8088",
    CONFIG_OUT: "out/stack.yaml",
  });
  expect(settings).toMatchObject({
    stackFile: "deploy/compose.yaml",
    project: "demo",
    dockerBin: "podman",
    healthTimeoutMs: 30_000,
    statusUiPort: 8088,
    configOut: "out/stack.yaml",
  });
});

test("invalid numbers are rejected", () => {
  expect(() => loadSettings({ STACK_POLL_INTERVAL: "soon" })).toThrow(
    "STACK_POLL_INTERVAL must be a non-negative integer, got 'soon'"
  );
});

test("ConfigurationError lists every issue", () => {
  const error = new ConfigurationError(
    [
      { type: "error", message: "Service 'api' depends on undeclared service 'db'", path: "/services/api/depends_on" },
      { type: "error", message: "Dependency cycle: a -> b -> a", path: "/services" },
    ],
    "compose.yaml"
  );
  expect(error.message).toBe(
    "Invalid stack descriptor in compose.yaml: /services/api/depends_on: Service 'api' depends on undeclared service 'db'; /services: Dependency cycle: a -> b -> a"
  );
  expect(error.issues).toHaveLength(2);
});

test("validation report groups issues by service", () => {
  const report = formatResults("compose.yaml", {
    valid: false,
    errors: [
      { type: "error", message: "Environment file not found: /srv/.env", path: "/services/db/env_file/0" },
      { type: "error", message: "Dependency cycle: a -> b -> a", path: "/services" },
    ],
    warnings: [
      { type: "warning", message: "Image 'adminer' has no tag", path: "/services/adminer/image" },
      { type: "warning", message: "Service 'db' is depended on but has no healthcheck", path: "/services/db" },
    ],
  });
  expect(report.split("\n")).toEqual([
    "",
    "📄 compose.yaml",
    "─".repeat(60),
    "  db:",
    "    ❌ ERROR (env_file/0): Environment file not found: /srv/.env",
    "    ⚠️  WARNING: Service 'db' is depended on but has no healthcheck",
    "  stack:",
    "    ❌ ERROR (/services): Dependency cycle: a -> b -> a",
    "  adminer:",
    "    ⚠️  WARNING (image): Image 'adminer' has no tag",
    "  ❌ Invalid: 2 error(s), 2 warning(s)",
  ]);
});

test("clean validation report", () => {
  expect(formatResults("compose.yaml", { valid: true, errors: [], warnings: [] }).split("\n")).toEqual([
    "",
    "📄 compose.yaml",
    "─".repeat(60),
    "  ✅ Valid - no issues found",
  ]);
});

test("bring-up summary lists services that are not running", () => {
  const summary = formatSummary({
    success: false,
    startOrder: ["db"],
    services: [
      { service: "db", outcome: "failed", container: "p-db-1", error: "port is already allocated" },
      { service: "api", outcome: "skipped", container: "p-api-1", error: "dependency 'db' failed to start" },
    ],
  });
  expect(summary.split("\n").slice(-7)).toEqual([
    "   ✅ Started: 0",
    "   ❌ Failed: 1",
    "   ⏭️  Skipped: 1",
    "",
    "   Services not running:",
    "   - db (failed): port is already allocated",
    "   - api (skipped): dependency 'db' failed to start",
  ]);
});
