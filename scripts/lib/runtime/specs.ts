/**
 * Map declarations onto engine objects: names, labels, build and run specs
 */

import { readFileSync } from "fs";
import { parse as parseDotenv } from "dotenv";
import { isBuildSource, isImageSource, type ServiceDeclaration, type StackDescriptor } from "../types";
import type { BuildSpec, RunSpec } from "./types";

export const PROJECT_LABEL = "stackup.project";
export const SERVICE_LABEL = "stackup.service";

export function networkName(descriptor: StackDescriptor): string {
  return `${descriptor.project}_default`;
}

export function containerName(descriptor: StackDescriptor, service: ServiceDeclaration): string {
  return service.containerName ?? `${descriptor.project}-${service.name}-1`;
}

export function imageName(descriptor: StackDescriptor, service: ServiceDeclaration): string {
  return isImageSource(service.source)
    ? service.source.image
    : `${descriptor.project}-${service.name}`;
}

export function volumeName(descriptor: StackDescriptor, key: string): string {
  return descriptor.volumes.find((v) => v.key === key)?.name ?? `${descriptor.project}_${key}`;
}

export function projectLabels(descriptor: StackDescriptor): Record<string, string> {
  return { [PROJECT_LABEL]: descriptor.project };
}

export function serviceLabels(
  descriptor: StackDescriptor,
  service: ServiceDeclaration
): Record<string, string> {
  return { ...projectLabels(descriptor), [SERVICE_LABEL]: service.name };
}

/**
 * Env files in order, then inline environment on top
 */
export function resolveEnvironment(service: ServiceDeclaration): Record<string, string> {
  const env: Record<string, string> = {};
  for (const file of service.envFiles) {
    Object.assign(env, parseDotenv(readFileSync(file, "utf-8")));
  }
  return { ...env, ...service.environment };
}

export function toBuildSpec(
  descriptor: StackDescriptor,
  service: ServiceDeclaration
): BuildSpec | null {
  if (!isBuildSource(service.source)) return null;
  return {
    tag: imageName(descriptor, service),
    context: service.source.context,
    dockerfile: service.source.dockerfile,
    args: service.source.args,
    labels: serviceLabels(descriptor, service),
  };
}

export function toRunSpec(descriptor: StackDescriptor, service: ServiceDeclaration): RunSpec {
  return {
    name: containerName(descriptor, service),
    image: imageName(descriptor, service),
    network: networkName(descriptor),
    alias: service.name,
    labels: serviceLabels(descriptor, service),
    ports: service.ports,
    env: resolveEnvironment(service),
    mounts: service.mounts.map((mount) => ({
      source: mount.type === "bind" ? mount.source : volumeName(descriptor, mount.source),
      target: mount.target,
      ...(mount.mode ? { mode: mount.mode } : {}),
    })),
    ...(service.command ? { command: service.command } : {}),
    ...(service.healthcheck ? { healthcheck: service.healthcheck } : {}),
    ...(service.restart ? { restart: service.restart } : {}),
  };
}
