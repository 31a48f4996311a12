/**
 * Runtime settings read from environment variables
 */

export interface Settings {
  /** Descriptor path; undefined means search the working directory */
  stackFile?: string;
  /** Overrides the project name derived from the descriptor */
  project?: string;
  dockerBin: string;
  healthTimeoutMs: number;
  pollIntervalMs: number;
  statusUiPort: number;
  /** Where `config` writes the rendered descriptor; undefined means stdout */
  configOut?: string;
}

const DEFAULTS = {
  dockerBin: "docker",
  healthTimeoutMs: 120_000,
  pollIntervalMs: 1_000,
  statusUiPort: 3000,
};

function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${key} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    stackFile: env.STACK_FILE || undefined,
    project: env.STACK_PROJECT || undefined,
    dockerBin: env.DOCKER_BIN || DEFAULTS.dockerBin,
    healthTimeoutMs: readInt(env, "STACK_HEALTH_TIMEOUT", DEFAULTS.healthTimeoutMs),
    pollIntervalMs: readInt(env, "STACK_POLL_INTERVAL", DEFAULTS.pollIntervalMs),
    statusUiPort: readInt(env, "STATUS_UI_PORT", DEFAULTS.statusUiPort),
    configOut: env.CONFIG_OUT || undefined,
  };
}
