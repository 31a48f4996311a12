import { existsSync, readFileSync, statSync } from "fs";
import { basename, dirname, join, resolve } from "path";
import { parse as parseYaml } from "yaml";
import { parse as parseDotenv } from "dotenv";
import Ajv from "ajv";
import { ConfigurationError, errorMessage } from "../errors";
import type {
  Dependency,
  Mount,
  NamedVolume,
  PortBinding,
  ServiceDeclaration,
  ServiceSource,
  StackDescriptor,
  ValidationError,
  ValidationResult,
  ValidationWarning,
} from "../types";
import { chainLookup, interpolate } from "./interpolate";
import { findCycle } from "./graph";
import {
  formatPort,
  parseHealthcheck,
  parsePort,
  parseVolume,
  portsCollide,
  splitCommand,
} from "./parse";
import type { StackFile, StackFileService } from "./types";

export const STACK_FILE_NAMES = [
  "docker-compose.yaml",
  "docker-compose.yml",
  "compose.yaml",
  "compose.yml",
];

export interface LoadOptions {
  /** Descriptor path; searched for in cwd when omitted */
  file?: string;
  cwd?: string;
  /** Overrides the descriptor's `name` and the directory-derived default */
  project?: string;
  /** Variables for interpolation, consulted before the project .env file */
  env?: Record<string, string | undefined>;
}

export interface LoadResult {
  descriptor: StackDescriptor;
  warnings: ValidationWarning[];
}

export interface AnalyzeContext {
  file: string;
  projectDir: string;
  project?: string;
  env: Record<string, string | undefined>;
}

export interface AnalysisResult extends ValidationResult {
  descriptor: StackDescriptor | null;
}

// Load JSON Schema
const schemaPath = new URL("../../../schemas/stack.schema.json", import.meta.url);
const schema = JSON.parse(readFileSync(schemaPath, "utf-8"));

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSchema = ajv.compile<StackFile>(schema);

/**
 * Locate the descriptor in a directory using the conventional file names
 */
export function findStackFile(dir: string): string | null {
  for (const name of STACK_FILE_NAMES) {
    const candidate = join(dir, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

function escapeSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

function normalizeProjectName(raw: string): string {
  return raw.toLowerCase().replace(/[^a-z0-9_-]/g, "").replace(/^[_-]+/, "");
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function readProjectEnv(projectDir: string): Record<string, string> {
  const envPath = join(projectDir, ".env");
  if (!isFile(envPath)) return {};
  return parseDotenv(readFileSync(envPath, "utf-8"));
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) deepFreeze(item);
    Object.freeze(value);
  }
  return value;
}

function imageTagWarning(image: string): string | null {
  if (image.includes("@")) return null;
  const lastSegment = image.slice(image.lastIndexOf("/") + 1);
  const colon = lastSegment.indexOf(":");
  if (colon === -1) {
    return `Image '${image}' has no tag and resolves to 'latest' - pin a specific version`;
  }
  if (lastSegment.slice(colon + 1) === "latest") {
    return `Image '${image}' uses the 'latest' tag and may change between runs - pin a specific version`;
  }
  return null;
}

/**
 * Turns one raw service entry into a declaration, recording problems
 * instead of stopping at the first one
 */
class ServiceNormalizer {
  constructor(
    private readonly context: AnalyzeContext,
    private readonly errors: ValidationError[],
    private readonly warnings: ValidationWarning[]
  ) {}

  private error(message: string, path: string): void {
    this.errors.push({ type: "error", message, path });
  }

  private warn(message: string, path: string): void {
    this.warnings.push({ type: "warning", message, path });
  }

  normalize(name: string, raw: StackFileService): ServiceDeclaration {
    const base = `/services/${escapeSegment(name)}`;

    return {
      name,
      source: this.source(raw, base),
      ...(raw.container_name ? { containerName: raw.container_name } : {}),
      ...(raw.command !== undefined
        ? { command: typeof raw.command === "string" ? splitCommand(raw.command) : raw.command }
        : {}),
      ports: this.ports(raw, base),
      envFiles: this.envFiles(raw, base),
      environment: this.environment(raw),
      dependsOn: this.dependencies(name, raw, base),
      mounts: this.mounts(raw, base),
      ...this.healthcheck(raw, base),
      ...(raw.restart ? { restart: raw.restart } : {}),
    };
  }

  private source(raw: StackFileService, base: string): ServiceSource {
    if (raw.image && raw.build) {
      this.error("Service must declare either image or build, not both", base);
      return { type: "image", image: raw.image };
    }

    if (raw.build !== undefined) {
      const spec: Exclude<StackFileService["build"], string | undefined> =
        typeof raw.build === "string" ? { context: raw.build } : raw.build;
      const context = resolve(this.context.projectDir, spec.context);
      const dockerfile = resolve(context, spec.dockerfile ?? "Dockerfile");

      if (!isDirectory(context)) {
        this.error(`Build context not found: ${context}`, `${base}/build`);
      } else if (!isFile(dockerfile)) {
        this.error(`Build file not found: ${dockerfile}`, `${base}/build`);
      }

      return { type: "build", context, dockerfile, args: spec.args ?? {} };
    }

    if (!raw.image) {
      this.error("Service must declare an image or a build section", base);
      return { type: "image", image: "" };
    }

    const tagWarning = imageTagWarning(raw.image);
    if (tagWarning) this.warn(tagWarning, `${base}/image`);

    return { type: "image", image: raw.image };
  }

  private ports(raw: StackFileService, base: string): PortBinding[] {
    const bindings: PortBinding[] = [];
    (raw.ports ?? []).forEach((spec, i) => {
      const parsed = parsePort(spec);
      if (parsed.ok) bindings.push(parsed.value);
      else this.error(parsed.error, `${base}/ports/${i}`);
    });
    return bindings;
  }

  private envFiles(raw: StackFileService, base: string): string[] {
    const files =
      raw.env_file === undefined ? [] : typeof raw.env_file === "string" ? [raw.env_file] : raw.env_file;

    return files.map((file, i) => {
      const path = resolve(this.context.projectDir, file);
      if (!isFile(path)) {
        this.error(`Environment file not found: ${path}`, `${base}/env_file/${i}`);
      }
      return path;
    });
  }

  private environment(raw: StackFileService): Record<string, string> {
    const result: Record<string, string> = {};
    const fromShell = (key: string) => {
      const value = this.context.env[key];
      if (value !== undefined) result[key] = value;
    };

    if (Array.isArray(raw.environment)) {
      for (const entry of raw.environment) {
        const eq = entry.indexOf("=");
        if (eq === -1) fromShell(entry);
        else result[entry.slice(0, eq)] = entry.slice(eq + 1);
      }
    } else if (raw.environment) {
      for (const [key, value] of Object.entries(raw.environment)) {
        if (value === null) fromShell(key);
        else result[key] = String(value);
      }
    }

    return result;
  }

  private dependencies(name: string, raw: StackFileService, base: string): Dependency[] {
    const entries: Dependency[] = Array.isArray(raw.depends_on)
      ? raw.depends_on.map((service): Dependency => ({ service, condition: "service_started" }))
      : Object.entries(raw.depends_on ?? {}).map(([service, entry]): Dependency => ({
          service,
          condition: entry.condition ?? "service_started",
        }));

    for (const dep of entries) {
      if (dep.service === name) {
        this.error(`Service '${name}' depends on itself`, `${base}/depends_on`);
      }
    }
    return entries;
  }

  private mounts(raw: StackFileService, base: string): Mount[] {
    const mounts: Mount[] = [];
    (raw.volumes ?? []).forEach((spec, i) => {
      const parsed = parseVolume(spec, this.context.projectDir);
      if (!parsed.ok) {
        this.error(parsed.error, `${base}/volumes/${i}`);
        return;
      }
      if (parsed.value.type === "bind" && !existsSync(parsed.value.source)) {
        this.warn(
          `Bind mount source does not exist and will be created by the engine: ${parsed.value.source}`,
          `${base}/volumes/${i}`
        );
      }
      mounts.push(parsed.value);
    });
    return mounts;
  }

  private healthcheck(
    raw: StackFileService,
    base: string
  ): Pick<ServiceDeclaration, "healthcheck"> {
    if (!raw.healthcheck) return {};
    const parsed = parseHealthcheck(raw.healthcheck);
    if (!parsed.ok) {
      this.error(parsed.error, `${base}/healthcheck`);
      return {};
    }
    return parsed.value ? { healthcheck: parsed.value } : {};
  }
}

function checkCrossService(
  file: StackFile,
  services: ServiceDeclaration[],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  const byName = new Map(services.map((s) => [s.name, s]));
  const declaredVolumes = new Set(Object.keys(file.volumes ?? {}));
  const dependedOn = new Set<string>();

  for (const service of services) {
    const base = `/services/${escapeSegment(service.name)}`;

    for (const dep of service.dependsOn) {
      const target = byName.get(dep.service);
      if (!target) {
        errors.push({
          type: "error",
          message: `Service '${service.name}' depends on undeclared service '${dep.service}'`,
          path: `${base}/depends_on`,
        });
        continue;
      }
      dependedOn.add(dep.service);
      if (dep.condition === "service_healthy" && !target.healthcheck) {
        errors.push({
          type: "error",
          message: `Service '${service.name}' waits for '${dep.service}' to be healthy, but '${dep.service}' has no healthcheck`,
          path: `${base}/depends_on/${escapeSegment(dep.service)}`,
        });
      }
    }

    service.mounts.forEach((mount, i) => {
      if (mount.type === "volume" && !declaredVolumes.has(mount.source)) {
        errors.push({
          type: "error",
          message: `Service '${service.name}' refers to undeclared volume '${mount.source}'`,
          path: `${base}/volumes/${i}`,
        });
      }
    });
  }

  // Host ports are claimed exclusively
  const claimed: Array<{ service: string; binding: PortBinding }> = [];
  for (const service of services) {
    service.ports.forEach((binding, i) => {
      const owner = claimed.find((c) => portsCollide(c.binding, binding));
      if (owner) {
        errors.push({
          type: "error",
          message: `Host port ${formatPort(binding)} collides with ${formatPort(owner.binding)} published by service '${owner.service}'`,
          path: `/services/${escapeSegment(service.name)}/ports/${i}`,
        });
      } else {
        claimed.push({ service: service.name, binding });
      }
    });
  }

  const containerNames = new Map<string, string>();
  for (const service of services) {
    if (!service.containerName) continue;
    const owner = containerNames.get(service.containerName);
    if (owner) {
      errors.push({
        type: "error",
        message: `Container name '${service.containerName}' is already used by service '${owner}'`,
        path: `/services/${escapeSegment(service.name)}/container_name`,
      });
    } else {
      containerNames.set(service.containerName, service.name);
    }
  }

  const cycle = findCycle(
    services.map((s) => ({ name: s.name, dependsOn: s.dependsOn.map((d) => d.service) }))
  );
  if (cycle) {
    errors.push({
      type: "error",
      message: `Dependency cycle: ${cycle.join(" -> ")}`,
      path: "/services",
    });
  }

  for (const service of services) {
    if (dependedOn.has(service.name) && !service.healthcheck) {
      warnings.push({
        type: "warning",
        message: `Service '${service.name}' is a dependency but defines no healthcheck - dependents only wait for it to start`,
        path: `/services/${escapeSegment(service.name)}/healthcheck`,
      });
    }
  }
}

/**
 * Parse, interpolate, schema-check and normalize descriptor content.
 * Never throws for descriptor problems; they are reported in the result.
 */
export function analyzeStack(content: string, context: AnalyzeContext): AnalysisResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];
  const invalid = (): AnalysisResult => ({ valid: false, errors, warnings, descriptor: null });

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (e) {
    errors.push({ type: "error", message: `Failed to parse YAML: ${errorMessage(e)}`, path: "/" });
    return invalid();
  }

  const substituted = interpolate(
    parsed,
    chainLookup(context.env, readProjectEnv(context.projectDir))
  );
  errors.push(...substituted.errors);
  warnings.push(...substituted.warnings);

  const file = substituted.value;
  if (!validateSchema(file)) {
    for (const error of validateSchema.errors ?? []) {
      errors.push({
        type: "error",
        message: `Schema: ${error.message || "validation failed"}`,
        path: error.instancePath || "/",
      });
    }
    return invalid();
  }

  const project = normalizeProjectName(
    context.project ?? file.name ?? basename(context.projectDir)
  );
  if (!project) {
    errors.push({
      type: "error",
      message: "Project name is empty after normalization - set STACK_PROJECT or a top-level name",
      path: "/name",
    });
  }

  const normalizer = new ServiceNormalizer(context, errors, warnings);
  const services = Object.entries(file.services).map(([name, raw]) =>
    normalizer.normalize(name, raw)
  );

  checkCrossService(file, services, errors, warnings);

  const volumes: NamedVolume[] = Object.entries(file.volumes ?? {}).map(([key, config]) => ({
    key,
    name: config?.name ?? `${project}_${key}`,
    external: config?.external ?? false,
  }));

  if (errors.length > 0) return invalid();

  const descriptor = deepFreeze<StackDescriptor>({
    project,
    projectDir: context.projectDir,
    file: context.file,
    services,
    volumes,
  });

  return { valid: true, errors, warnings, descriptor };
}

function resolveStackFile(options: LoadOptions): string {
  const cwd = options.cwd ?? process.cwd();
  if (options.file) return resolve(cwd, options.file);

  const found = findStackFile(cwd);
  if (!found) {
    throw new ConfigurationError([
      {
        type: "error",
        message: `No stack descriptor found in ${cwd} (looked for ${STACK_FILE_NAMES.join(", ")})`,
      },
    ]);
  }
  return found;
}

function readStack(options: LoadOptions): AnalysisResult {
  const file = resolveStackFile(options);

  if (!isFile(file)) {
    throw new ConfigurationError([{ type: "error", message: `File not found: ${file}` }], file);
  }

  return analyzeStack(readFileSync(file, "utf-8"), {
    file,
    projectDir: dirname(file),
    project: options.project,
    env: options.env ?? process.env,
  });
}

/**
 * Load a descriptor for bring-up. Throws ConfigurationError listing every
 * problem if it is not usable.
 */
export function loadStack(options: LoadOptions = {}): LoadResult {
  const result = readStack(options);
  if (!result.descriptor) {
    throw new ConfigurationError(result.errors, resolveStackFile(options));
  }
  return { descriptor: result.descriptor, warnings: result.warnings };
}

/**
 * Validate a descriptor without throwing
 */
export function validateStack(options: LoadOptions = {}): ValidationResult {
  try {
    const { valid, errors, warnings } = readStack(options);
    return { valid, errors, warnings };
  } catch (e) {
    if (e instanceof ConfigurationError) {
      return { valid: false, errors: e.issues, warnings: [] };
    }
    throw e;
  }
}
