import { formatPort } from "./stack/parse";
import { containerName } from "./runtime/specs";
import type { ContainerRuntime, HealthStatus } from "./runtime/types";
import type { StackDescriptor } from "./types";

export interface ServiceStatus {
  service: string;
  container: string;
  /** Engine status, or "missing" when no container exists */
  state: string;
  health?: HealthStatus;
  exitCode?: number;
  startedAt?: string;
  ports: string[];
}

/**
 * Inspect every declared service, in declaration order
 */
export async function collectStatus(
  descriptor: StackDescriptor,
  runtime: ContainerRuntime
): Promise<ServiceStatus[]> {
  return Promise.all(
    descriptor.services.map(async (service): Promise<ServiceStatus> => {
      const container = containerName(descriptor, service);
      const state = await runtime.inspect(container);
      const ports = service.ports.map(formatPort);

      if (!state) {
        return { service: service.name, container, state: "missing", ports };
      }

      return {
        service: service.name,
        container,
        state: state.status,
        ports,
        ...(state.health ? { health: state.health } : {}),
        ...(state.status === "exited" ? { exitCode: state.exitCode } : {}),
        ...(state.startedAt ? { startedAt: state.startedAt } : {}),
      };
    })
  );
}

/**
 * Fixed-width table for terminal output
 */
export function formatStatusTable(rows: ServiceStatus[]): string {
  const header = ["SERVICE", "CONTAINER", "STATE", "PORTS"];
  const body = rows.map((row) => {
    let state = row.state;
    if (row.health) state += ` (${row.health})`;
    if (row.exitCode !== undefined) state += ` (${row.exitCode})`;
    return [row.service, row.container, state, row.ports.join(", ")];
  });

  const widths = header.map((h, i) => Math.max(h.length, ...body.map((r) => r[i].length)));
  return [header, ...body]
    .map((cells) => cells.map((c, i) => c.padEnd(widths[i])).join("  ").trimEnd())
    .join("\n");
}
