import type { Healthcheck, PortBinding } from "../types";

export type ContainerStatus =
  | "created"
  | "running"
  | "paused"
  | "restarting"
  | "removing"
  | "exited"
  | "dead";

export type HealthStatus = "starting" | "healthy" | "unhealthy";

export interface ContainerState {
  status: ContainerStatus;
  health?: HealthStatus;
  exitCode: number;
  startedAt?: string;
}

export interface BuildSpec {
  tag: string;
  context: string;
  dockerfile: string;
  args: Record<string, string>;
  labels: Record<string, string>;
}

export interface RunMount {
  /** Absolute host path for binds, engine volume name for volumes */
  source: string;
  target: string;
  mode?: string;
}

export interface RunSpec {
  name: string;
  image: string;
  network: string;
  /** Hostname other services reach this one by */
  alias: string;
  labels: Record<string, string>;
  ports: PortBinding[];
  env: Record<string, string>;
  mounts: RunMount[];
  command?: string[];
  healthcheck?: Healthcheck;
  restart?: string;
}

/**
 * Operations the sequencer needs from a container engine
 */
export interface ContainerRuntime {
  ping(): Promise<boolean>;
  ensureNetwork(name: string, labels: Record<string, string>): Promise<void>;
  /** Resolves false when the network did not exist */
  removeNetwork(name: string): Promise<boolean>;
  ensureVolume(name: string, labels: Record<string, string>): Promise<void>;
  removeVolume(name: string): Promise<boolean>;
  build(spec: BuildSpec): Promise<void>;
  /** Resolves with the container id once the engine has started it */
  run(spec: RunSpec): Promise<string>;
  /** Resolves null when no container has that name */
  inspect(name: string): Promise<ContainerState | null>;
  /** Resolves false when no container has that name */
  remove(name: string): Promise<boolean>;
}
