import { relative } from "path";
import { stringify as stringifyYaml } from "yaml";
import { formatPort } from "./parse";
import type { Mount, ServiceDeclaration, StackDescriptor } from "../types";

function displayPath(descriptor: StackDescriptor, path: string): string {
  const rel = relative(descriptor.projectDir, path);
  return rel === "" ? "." : rel.startsWith("..") ? path : `./${rel}`;
}

function renderMount(descriptor: StackDescriptor, mount: Mount): string {
  const source = mount.type === "bind" ? displayPath(descriptor, mount.source) : mount.source;
  return `${source}:${mount.target}${mount.mode ? `:${mount.mode}` : ""}`;
}

function renderService(descriptor: StackDescriptor, service: ServiceDeclaration) {
  const { source } = service;

  return {
    ...(source.type === "image"
      ? { image: source.image }
      : {
          build: {
            context: displayPath(descriptor, source.context),
            dockerfile: displayPath(descriptor, source.dockerfile),
            ...(Object.keys(source.args).length > 0 ? { args: source.args } : {}),
          },
        }),
    ...(service.containerName ? { container_name: service.containerName } : {}),
    ...(service.command ? { command: service.command } : {}),
    ...(service.ports.length > 0 ? { ports: service.ports.map(formatPort) } : {}),
    ...(service.envFiles.length > 0
      ? { env_file: service.envFiles.map((f) => displayPath(descriptor, f)) }
      : {}),
    ...(Object.keys(service.environment).length > 0 ? { environment: service.environment } : {}),
    ...(service.dependsOn.length > 0
      ? {
          depends_on: Object.fromEntries(
            service.dependsOn.map((d) => [d.service, { condition: d.condition }])
          ),
        }
      : {}),
    ...(service.mounts.length > 0
      ? { volumes: service.mounts.map((m) => renderMount(descriptor, m)) }
      : {}),
    ...(service.healthcheck
      ? {
          healthcheck: {
            test: service.healthcheck.shell
              ? ["CMD-SHELL", ...service.healthcheck.test]
              : ["CMD", ...service.healthcheck.test],
            ...(service.healthcheck.intervalMs !== undefined
              ? { interval: `${service.healthcheck.intervalMs}ms` }
              : {}),
            ...(service.healthcheck.timeoutMs !== undefined
              ? { timeout: `${service.healthcheck.timeoutMs}ms` }
              : {}),
            ...(service.healthcheck.retries !== undefined
              ? { retries: service.healthcheck.retries }
              : {}),
            ...(service.healthcheck.startPeriodMs !== undefined
              ? { start_period: `${service.healthcheck.startPeriodMs}ms` }
              : {}),
          },
        }
      : {}),
    ...(service.restart ? { restart: service.restart } : {}),
  };
}

/**
 * Normalized descriptor as deterministic YAML: interpolation applied,
 * short forms expanded, paths relative to the project directory
 */
export function renderStack(descriptor: StackDescriptor): string {
  const document = {
    name: descriptor.project,
    services: Object.fromEntries(
      descriptor.services.map((s) => [s.name, renderService(descriptor, s)])
    ),
    ...(descriptor.volumes.length > 0
      ? {
          volumes: Object.fromEntries(
            descriptor.volumes.map((v) => [
              v.key,
              { name: v.name, ...(v.external ? { external: true } : {}) },
            ])
          ),
        }
      : {}),
  };

  return stringifyYaml(document, {
    sortMapEntries: true,
    lineWidth: 0,
  });
}
