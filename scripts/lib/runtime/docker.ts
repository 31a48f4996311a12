/**
 * Container runtime backed by the docker CLI
 */

import { RuntimeCommandError } from "../errors";
import { formatPort } from "../stack/parse";
import { spawnCommand, type CommandResult, type CommandRunner } from "./command";
import type {
  BuildSpec,
  ContainerRuntime,
  ContainerState,
  ContainerStatus,
  HealthStatus,
  RunSpec,
} from "./types";

export interface DockerRuntimeConfig {
  bin: string;
  runner?: CommandRunner;
}

const CONTAINER_STATUSES: readonly ContainerStatus[] = [
  "created",
  "running",
  "paused",
  "restarting",
  "removing",
  "exited",
  "dead",
];

const HEALTH_STATUSES: readonly HealthStatus[] = ["starting", "healthy", "unhealthy"];

const NOT_FOUND = /no such|not found/i;

const SAFE_WORD = /^[\w@%+=:,./-]+$/;

function quoteShell(word: string): string {
  if (SAFE_WORD.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

function sortedEntries(record: Record<string, string>): Array<[string, string]> {
  return Object.entries(record).sort(([a], [b]) => a.localeCompare(b));
}

function labelArgs(labels: Record<string, string>): string[] {
  return sortedEntries(labels).flatMap(([key, value]) => ["--label", `${key}=${value}`]);
}

function durationArg(ms: number): string {
  return `${ms}ms`;
}

/**
 * Arguments for `docker run`, in a stable order
 */
export function buildRunArgs(spec: RunSpec): string[] {
  const args = [
    "run",
    "--detach",
    "--name",
    spec.name,
    "--network",
    spec.network,
    "--network-alias",
    spec.alias,
    ...labelArgs(spec.labels),
  ];

  for (const port of spec.ports) {
    args.push("--publish", formatPort(port));
  }

  for (const [key, value] of sortedEntries(spec.env)) {
    args.push("--env", `${key}=${value}`);
  }

  for (const mount of spec.mounts) {
    const mode = mount.mode ? `:${mount.mode}` : "";
    args.push("--volume", `${mount.source}:${mount.target}${mode}`);
  }

  if (spec.restart) {
    args.push("--restart", spec.restart);
  }

  const health = spec.healthcheck;
  if (health) {
    const cmd = health.shell ? health.test[0] : health.test.map(quoteShell).join(" ");
    args.push("--health-cmd", cmd);
    if (health.intervalMs !== undefined) {
      args.push("--health-interval", durationArg(health.intervalMs));
    }
    if (health.timeoutMs !== undefined) {
      args.push("--health-timeout", durationArg(health.timeoutMs));
    }
    if (health.retries !== undefined) {
      args.push("--health-retries", String(health.retries));
    }
    if (health.startPeriodMs !== undefined) {
      args.push("--health-start-period", durationArg(health.startPeriodMs));
    }
  }

  args.push(spec.image, ...(spec.command ?? []));
  return args;
}

/**
 * Arguments for `docker build`
 */
export function buildBuildArgs(spec: BuildSpec): string[] {
  const args = ["build", "--tag", spec.tag, "--file", spec.dockerfile, ...labelArgs(spec.labels)];
  for (const [key, value] of sortedEntries(spec.args)) {
    args.push("--build-arg", `${key}=${value}`);
  }
  args.push(spec.context);
  return args;
}

/**
 * Read the output of `docker container inspect --format '{{json .State}}'`
 */
export function parseContainerState(json: string): ContainerState {
  const raw: unknown = JSON.parse(json);
  if (raw === null || typeof raw !== "object") {
    throw new Error(`Unexpected container state: ${json}`);
  }

  const state = new Map(Object.entries(raw));
  const status = CONTAINER_STATUSES.find((s) => s === state.get("Status"));
  if (!status) {
    throw new Error(`Unknown container status in: ${json}`);
  }

  const exitCode = state.get("ExitCode");
  const startedAt = state.get("StartedAt");
  const healthRaw = state.get("Health");
  const healthStatus =
    healthRaw !== null && typeof healthRaw === "object"
      ? new Map(Object.entries(healthRaw)).get("Status")
      : undefined;
  const health = HEALTH_STATUSES.find((h) => h === healthStatus);

  return {
    status,
    exitCode: typeof exitCode === "number" ? exitCode : 0,
    ...(typeof startedAt === "string" && !startedAt.startsWith("0001-") ? { startedAt } : {}),
    ...(health ? { health } : {}),
  };
}

export class DockerCliRuntime implements ContainerRuntime {
  private bin: string;
  private runner: CommandRunner;

  constructor(config: DockerRuntimeConfig) {
    this.bin = config.bin;
    this.runner = config.runner ?? spawnCommand;
  }

  private describe(args: string[]): string {
    return [this.bin, ...args].map(quoteShell).join(" ");
  }

  private async exec(args: string[]): Promise<CommandResult> {
    const result = await this.runner(this.bin, args);
    if (result.exitCode !== 0) {
      throw new RuntimeCommandError(this.describe(args), result.exitCode, result.stderr);
    }
    return result;
  }

  /**
   * Run an inspect-style command: false when the object does not exist
   */
  private async exists(args: string[]): Promise<boolean> {
    const result = await this.runner(this.bin, args);
    if (result.exitCode === 0) return true;
    if (NOT_FOUND.test(result.stderr)) return false;
    throw new RuntimeCommandError(this.describe(args), result.exitCode, result.stderr);
  }

  // ============ Engine ============

  async ping(): Promise<boolean> {
    const result = await this.runner(this.bin, ["version", "--format", "{{.Server.Version}}"]);
    return result.exitCode === 0;
  }

  // ============ Networks ============

  async ensureNetwork(name: string, labels: Record<string, string>): Promise<void> {
    if (await this.exists(["network", "inspect", name])) return;
    await this.exec(["network", "create", ...labelArgs(labels), name]);
  }

  async removeNetwork(name: string): Promise<boolean> {
    if (!(await this.exists(["network", "inspect", name]))) return false;
    await this.exec(["network", "rm", name]);
    return true;
  }

  // ============ Volumes ============

  async ensureVolume(name: string, labels: Record<string, string>): Promise<void> {
    if (await this.exists(["volume", "inspect", name])) return;
    await this.exec(["volume", "create", ...labelArgs(labels), name]);
  }

  async removeVolume(name: string): Promise<boolean> {
    if (!(await this.exists(["volume", "inspect", name]))) return false;
    await this.exec(["volume", "rm", name]);
    return true;
  }

  // ============ Containers ============

  async build(spec: BuildSpec): Promise<void> {
    await this.exec(buildBuildArgs(spec));
  }

  async run(spec: RunSpec): Promise<string> {
    const result = await this.exec(buildRunArgs(spec));
    return result.stdout.trim();
  }

  async inspect(name: string): Promise<ContainerState | null> {
    const args = ["container", "inspect", "--format", "{{json .State}}", name];
    const result = await this.runner(this.bin, args);
    if (result.exitCode !== 0) {
      if (NOT_FOUND.test(result.stderr)) return null;
      throw new RuntimeCommandError(this.describe(args), result.exitCode, result.stderr);
    }
    return parseContainerState(result.stdout.trim());
  }

  async remove(name: string): Promise<boolean> {
    if ((await this.inspect(name)) === null) return false;
    await this.exec(["container", "rm", "--force", name]);
    return true;
  }
}

export function createDockerRuntime(
  config: Partial<DockerRuntimeConfig> = {}
): DockerCliRuntime {
  return new DockerCliRuntime({
    bin: config.bin || "docker",
    runner: config.runner,
  });
}
