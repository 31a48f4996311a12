/**
 * Type definitions for the normalized stack descriptor
 */

import type { DependencyCondition } from "./stack/types";

export interface StackDescriptor {
  /** Project name, used to prefix containers, networks and volumes */
  project: string;
  /** Absolute directory relative paths are resolved against */
  projectDir: string;
  /** Absolute path of the descriptor file */
  file: string;
  /** Services in declaration order */
  services: ServiceDeclaration[];
  volumes: NamedVolume[];
}

export interface ImageSource {
  type: "image";
  image: string;
}

export interface BuildSource {
  type: "build";
  /** Absolute build context directory */
  context: string;
  /** Absolute path of the build file */
  dockerfile: string;
  args: Record<string, string>;
}

export type ServiceSource = ImageSource | BuildSource;

export interface PortBinding {
  hostIp?: string;
  /** Undefined when only the container port is published */
  hostPort?: number;
  containerPort: number;
  protocol: "tcp" | "udp";
}

export interface BindMount {
  type: "bind";
  /** Absolute host path */
  source: string;
  target: string;
  mode?: string;
}

export interface VolumeMount {
  type: "volume";
  /** Volume key as declared under the top-level volumes section */
  source: string;
  target: string;
  mode?: string;
}

export type Mount = BindMount | VolumeMount;

export interface Dependency {
  service: string;
  condition: DependencyCondition;
}

export interface Healthcheck {
  /** Command as passed to the engine; a single element means a shell command */
  test: string[];
  shell: boolean;
  intervalMs?: number;
  timeoutMs?: number;
  startPeriodMs?: number;
  retries?: number;
}

export interface ServiceDeclaration {
  name: string;
  source: ServiceSource;
  containerName?: string;
  command?: string[];
  ports: PortBinding[];
  /** Absolute paths of env files, in the order they are applied */
  envFiles: string[];
  /** Inline environment, overriding values from env files */
  environment: Record<string, string>;
  dependsOn: Dependency[];
  mounts: Mount[];
  healthcheck?: Healthcheck;
  restart?: "no" | "always" | "on-failure" | "unless-stopped";
}

export interface NamedVolume {
  key: string;
  /** Name the engine knows the volume by */
  name: string;
  external: boolean;
}

/**
 * A problem found while loading a descriptor. `path` points into the file
 * (`/services/backend/env_file/0`), escaped as a JSON pointer.
 */
export interface StackIssue<Severity extends "error" | "warning"> {
  type: Severity;
  message: string;
  path?: string;
}

export type ValidationError = StackIssue<"error">;
export type ValidationWarning = StackIssue<"warning">;

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// Type guards
export function isBuildSource(source: ServiceSource): source is BuildSource {
  return source.type === "build";
}

export function isImageSource(source: ServiceSource): source is ImageSource {
  return source.type === "image";
}
