import type {
  BuildSpec,
  ContainerRuntime,
  ContainerState,
  RunSpec,
} from "../../scripts/lib/runtime/types";

/**
 * In-memory container engine. Records every call as `operation:target`.
 */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: string[] = [];
  readonly runs: RunSpec[] = [];
  readonly builds: BuildSpec[] = [];
  readonly containers = new Map<string, ContainerState>();
  readonly networks = new Set<string>();
  readonly volumes = new Set<string>();

  /** Container names whose run fails */
  readonly failRun = new Set<string>();
  /** Image tags whose build fails */
  readonly failBuild = new Set<string>();
  /** Scripted inspect answers per container; the last one repeats */
  readonly inspectScript = new Map<string, ContainerState[]>();
  /** Runs that only resolve once released */
  readonly held = new Map<string, () => void>();
  readonly holdRun = new Set<string>();

  async ping(): Promise<boolean> {
    return true;
  }

  async ensureNetwork(name: string): Promise<void> {
    this.calls.push(`ensureNetwork:${name}`);
    this.networks.add(name);
  }

  async removeNetwork(name: string): Promise<boolean> {
    this.calls.push(`removeNetwork:${name}`);
    return this.networks.delete(name);
  }

  async ensureVolume(name: string): Promise<void> {
    this.calls.push(`ensureVolume:${name}`);
    this.volumes.add(name);
  }

  async removeVolume(name: string): Promise<boolean> {
    this.calls.push(`removeVolume:${name}`);
    return this.volumes.delete(name);
  }

  async build(spec: BuildSpec): Promise<void> {
    this.calls.push(`build:${spec.tag}`);
    this.builds.push(spec);
    if (this.failBuild.has(spec.tag)) {
      throw new Error(`build of ${spec.tag} failed`);
    }
  }

  async run(spec: RunSpec): Promise<string> {
    this.calls.push(`run:${spec.name}`);
    this.runs.push(spec);

    if (this.holdRun.has(spec.name)) {
      await new Promise<void>((resolve) => this.held.set(spec.name, resolve));
    }
    if (this.failRun.has(spec.name)) {
      throw new Error(`port is already allocated`);
    }

    this.containers.set(spec.name, { status: "running", exitCode: 0 });
    return `id-${spec.name}`;
  }

  release(name: string): void {
    const resolve = this.held.get(name);
    if (!resolve) throw new Error(`run of ${name} is not held`);
    this.held.delete(name);
    resolve();
  }

  async inspect(name: string): Promise<ContainerState | null> {
    this.calls.push(`inspect:${name}`);
    const script = this.inspectScript.get(name);
    if (script && script.length > 0) {
      return script.length > 1 ? (script.shift() ?? null) : script[0];
    }
    return this.containers.get(name) ?? null;
  }

  async remove(name: string): Promise<boolean> {
    this.calls.push(`remove:${name}`);
    return this.containers.delete(name);
  }
}

/**
 * Clock whose sleep advances time instantly
 */
export function fakeClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    sleep: async (ms: number) => {
      now += ms;
    },
  };
}

/**
 * Let pending promise callbacks run
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
