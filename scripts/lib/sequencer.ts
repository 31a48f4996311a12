/**
 * Brings a stack up in dependency order and tears it down in reverse
 */

import { setTimeout as sleep } from "timers/promises";
import { errorMessage } from "./errors";
import { topologicalOrder } from "./stack/graph";
import {
  containerName,
  networkName,
  projectLabels,
  toBuildSpec,
  toRunSpec,
} from "./runtime/specs";
import type { ContainerRuntime } from "./runtime/types";
import type { Dependency, ServiceDeclaration, StackDescriptor } from "./types";

export type Log = (line: string) => void;

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  },
};

export interface SequencerOptions {
  runtime: ContainerRuntime;
  log?: Log;
  /** How long to wait for a health or completion condition */
  healthTimeoutMs?: number;
  pollIntervalMs?: number;
  clock?: Clock;
}

export type ServiceOutcome = "started" | "failed" | "skipped";

export interface ServiceResult {
  service: string;
  outcome: ServiceOutcome;
  container: string;
  containerId?: string;
  error?: string;
}

export interface BringUpResult {
  success: boolean;
  /** Per-service outcome, in topological order */
  services: ServiceResult[];
  /** Services in the order their start was issued */
  startOrder: string[];
}

export interface TearDownOptions extends SequencerOptions {
  /** Also remove the stack's named volumes */
  volumes?: boolean;
}

export interface TearDownResult {
  success: boolean;
  removed: string[];
  errors: Array<{ target: string; error: string }>;
}

const DEFAULT_HEALTH_TIMEOUT_MS = 120_000;
const DEFAULT_POLL_INTERVAL_MS = 1_000;

/**
 * Services in start order: dependencies first, declaration order otherwise
 */
export function orderedServices(descriptor: StackDescriptor): ServiceDeclaration[] {
  const order = topologicalOrder(
    descriptor.services.map((s) => ({ name: s.name, dependsOn: s.dependsOn.map((d) => d.service) }))
  );
  return order.flatMap((name) => descriptor.services.filter((s) => s.name === name));
}

/**
 * Tracks one bring-up run. Every service gets a promise that settles with
 * null once it is started, or with the reason it was not.
 */
class BringUp {
  private readonly log: Log;
  private readonly healthTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly clock: Clock;
  private readonly runtime: ContainerRuntime;

  private readonly started = new Map<string, Promise<string | null>>();
  private readonly conditions = new Map<string, Promise<string | null>>();
  private readonly results = new Map<string, ServiceResult>();
  private readonly startOrder: string[] = [];

  constructor(
    private readonly descriptor: StackDescriptor,
    options: SequencerOptions
  ) {
    this.runtime = options.runtime;
    this.log = options.log ?? console.log;
    this.healthTimeoutMs = options.healthTimeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.clock = options.clock ?? systemClock;
  }

  async run(): Promise<BringUpResult> {
    const services = orderedServices(this.descriptor);

    await this.prepare();

    const buildFailure = await this.buildAll(services);
    if (buildFailure) {
      for (const service of services) {
        if (!this.results.has(service.name)) {
          this.record(service, "skipped", { error: `build of '${buildFailure}' failed` });
        }
      }
      return this.finish(services);
    }

    for (const service of services) {
      this.started.set(service.name, this.startWhenReady(service));
    }
    await Promise.all(this.started.values());

    return this.finish(services);
  }

  private finish(services: ServiceDeclaration[]): BringUpResult {
    const results = services.flatMap((s) => {
      const result = this.results.get(s.name);
      return result ? [result] : [];
    });
    return {
      success: results.every((r) => r.outcome === "started"),
      services: results,
      startOrder: [...this.startOrder],
    };
  }

  private record(
    service: ServiceDeclaration,
    outcome: ServiceOutcome,
    extra: Pick<ServiceResult, "containerId" | "error"> = {}
  ): void {
    this.results.set(service.name, {
      service: service.name,
      outcome,
      container: containerName(this.descriptor, service),
      ...extra,
    });
  }

  private async prepare(): Promise<void> {
    const labels = projectLabels(this.descriptor);
    const network = networkName(this.descriptor);

    this.log(`   → Ensuring network ${network}...`);
    await this.runtime.ensureNetwork(network, labels);

    for (const volume of this.descriptor.volumes) {
      if (volume.external) continue;
      this.log(`   → Ensuring volume ${volume.name}...`);
      await this.runtime.ensureVolume(volume.name, labels);
    }
  }

  /**
   * Build images sequentially. Returns the name of the service whose build
   * failed, if any.
   */
  private async buildAll(services: ServiceDeclaration[]): Promise<string | null> {
    for (const service of services) {
      const spec = toBuildSpec(this.descriptor, service);
      if (!spec) continue;

      this.log(`   → Building ${service.name} (${spec.tag})...`);
      try {
        await this.runtime.build(spec);
        this.log(`   ✓ Built ${spec.tag}`);
      } catch (e) {
        const message = errorMessage(e);
        this.log(`   ❌ Build failed for ${service.name}: ${message}`);
        this.record(service, "failed", { error: message });
        return service.name;
      }
    }
    return null;
  }

  private async startWhenReady(service: ServiceDeclaration): Promise<string | null> {
    const reasons = await Promise.all(service.dependsOn.map((dep) => this.satisfied(dep)));
    const blocked = reasons.find((r): r is string => r !== null);

    if (blocked) {
      this.log(`   ⚠️  Skipping ${service.name}: ${blocked}`);
      this.record(service, "skipped", { error: blocked });
      return `'${service.name}' was skipped`;
    }

    return this.start(service);
  }

  private async start(service: ServiceDeclaration): Promise<string | null> {
    this.startOrder.push(service.name);
    this.log(`   → Starting ${service.name}...`);

    try {
      const spec = toRunSpec(this.descriptor, service);
      if (await this.runtime.remove(spec.name)) {
        this.log(`   ✓ Removed previous container ${spec.name}`);
      }
      const containerId = await this.runtime.run(spec);
      this.log(`   ✓ Started ${service.name} (${spec.name})`);
      this.record(service, "started", { containerId });
      return null;
    } catch (e) {
      const message = errorMessage(e);
      this.log(`   ❌ Failed to start ${service.name}: ${message}`);
      this.record(service, "failed", { error: message });
      return `'${service.name}' failed to start`;
    }
  }

  /**
   * Settles with null once the dependency condition holds, or with the
   * reason it cannot
   */
  private satisfied(dep: Dependency): Promise<string | null> {
    const key = `${dep.service}:${dep.condition}`;
    const existing = this.conditions.get(key);
    if (existing) return existing;

    const started = this.started.get(dep.service);
    if (!started) {
      return Promise.resolve(`dependency '${dep.service}' is not part of this run`);
    }

    const pending = started.then((reason) => {
      if (reason) return `dependency ${reason}`;
      if (dep.condition === "service_started") return null;
      return this.waitFor(dep);
    });
    this.conditions.set(key, pending);
    return pending;
  }

  private async waitFor(dep: Dependency): Promise<string | null> {
    const service = this.descriptor.services.find((s) => s.name === dep.service);
    if (!service) return `dependency '${dep.service}' is not declared`;

    const name = containerName(this.descriptor, service);
    const wanted = dep.condition === "service_healthy" ? "healthy" : "completed";
    const deadline = this.clock.now() + this.healthTimeoutMs;

    this.log(`   → Waiting for ${dep.service} to be ${wanted}...`);

    for (;;) {
      const state = await this.runtime.inspect(name);

      if (!state) {
        return `dependency '${dep.service}' container ${name} no longer exists`;
      }

      if (dep.condition === "service_healthy") {
        if (state.health === "healthy") break;
        if (state.health === "unhealthy") return `dependency '${dep.service}' is unhealthy`;
        if (state.status === "exited" || state.status === "dead") {
          return `dependency '${dep.service}' exited with code ${state.exitCode}`;
        }
      } else if (state.status === "exited" || state.status === "dead") {
        if (state.exitCode === 0) break;
        return `dependency '${dep.service}' exited with code ${state.exitCode}`;
      }

      if (this.clock.now() >= deadline) {
        return `dependency '${dep.service}' was not ${wanted} within ${this.healthTimeoutMs}ms`;
      }
      await this.clock.sleep(this.pollIntervalMs);
    }

    this.log(`   ✓ ${dep.service} is ${wanted}`);
    return null;
  }
}

/**
 * Start every service once its dependencies satisfy their conditions.
 * Independent services start concurrently; a failed service causes its
 * dependents to be skipped. Nothing is rolled back.
 */
export function bringUp(
  descriptor: StackDescriptor,
  options: SequencerOptions
): Promise<BringUpResult> {
  return new BringUp(descriptor, options).run();
}

/**
 * Remove containers in reverse dependency order, then the project network
 * and, when asked, the named volumes
 */
export async function tearDown(
  descriptor: StackDescriptor,
  options: TearDownOptions
): Promise<TearDownResult> {
  const { runtime } = options;
  const log = options.log ?? console.log;
  const removed: string[] = [];
  const errors: TearDownResult["errors"] = [];

  const attempt = async (target: string, action: () => Promise<boolean>) => {
    try {
      if (await action()) {
        removed.push(target);
        log(`   ✓ Removed ${target}`);
      } else {
        log(`   - ${target} not found`);
      }
    } catch (e) {
      const message = errorMessage(e);
      errors.push({ target, error: message });
      log(`   ❌ Failed to remove ${target}: ${message}`);
    }
  };

  for (const service of orderedServices(descriptor).reverse()) {
    const name = containerName(descriptor, service);
    await attempt(name, () => runtime.remove(name));
  }

  const network = networkName(descriptor);
  await attempt(network, () => runtime.removeNetwork(network));

  if (options.volumes) {
    for (const volume of descriptor.volumes) {
      if (volume.external) continue;
      await attempt(volume.name, () => runtime.removeVolume(volume.name));
    }
  }

  return { success: errors.length === 0, removed, errors };
}
