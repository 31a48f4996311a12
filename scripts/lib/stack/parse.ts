/**
 * Parsers for the short-syntax strings a descriptor uses for ports,
 * volumes, durations and healthcheck commands
 */

import { homedir } from "os";
import { isAbsolute, resolve } from "path";
import type { Healthcheck, Mount, PortBinding } from "../types";
import type { StackFileHealthcheck } from "./types";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });
const fail = <T>(error: string): ParseResult<T> => ({ ok: false, error });

// [ip:][hostPort:]containerPort[/protocol]
const PORT_PATTERN = /^(?:(?:(\[[^\]]+\]|[^:[\]]+):)?(\d*):)?(\d+)(?:\/(tcp|udp))?$/;

function toPortNumber(raw: string): number | undefined {
  const value = Number(raw);
  return Number.isInteger(value) && value >= 1 && value <= 65535 ? value : undefined;
}

export function parsePort(spec: string | number): ParseResult<PortBinding> {
  const text = String(spec).trim();

  if (text.includes("-")) {
    return fail(`Port ranges are not supported: '${text}'`);
  }

  const match = PORT_PATTERN.exec(text);
  if (!match) {
    return fail(`Invalid port mapping '${text}'`);
  }

  const [, rawIp, rawHost, rawContainer, rawProtocol] = match;

  const containerPort = toPortNumber(rawContainer);
  if (containerPort === undefined) {
    return fail(`Container port out of range in '${text}'`);
  }

  const binding: PortBinding = {
    containerPort,
    protocol: rawProtocol === "udp" ? "udp" : "tcp",
  };

  if (rawHost) {
    const hostPort = toPortNumber(rawHost);
    if (hostPort === undefined) {
      return fail(`Host port out of range in '${text}'`);
    }
    binding.hostPort = hostPort;
  }

  if (rawIp) {
    binding.hostIp = rawIp.replace(/^\[|\]$/g, "");
  }

  return ok(binding);
}

/**
 * Whether two bindings claim the same host socket
 */
export function portsCollide(a: PortBinding, b: PortBinding): boolean {
  if (a.hostPort === undefined || b.hostPort === undefined) return false;
  if (a.hostPort !== b.hostPort || a.protocol !== b.protocol) return false;

  const wildcard = (ip?: string) => !ip || ip === "0.0.0.0" || ip === "::";
  return wildcard(a.hostIp) || wildcard(b.hostIp) || a.hostIp === b.hostIp;
}

export function formatPort(binding: PortBinding): string {
  const protocol = binding.protocol === "tcp" ? "" : `/${binding.protocol}`;
  if (binding.hostPort === undefined && !binding.hostIp) {
    return `${binding.containerPort}${protocol}`;
  }
  const ip = binding.hostIp
    ? `${binding.hostIp.includes(":") ? `[${binding.hostIp}]` : binding.hostIp}:`
    : "";
  return `${ip}${binding.hostPort ?? ""}:${binding.containerPort}${protocol}`;
}

const MOUNT_MODES = new Set([
  "ro",
  "rw",
  "z",
  "Z",
  "cached",
  "delegated",
  "consistent",
  "nocopy",
]);

const VOLUME_NAME = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

/**
 * Parse `SOURCE:TARGET[:MODE]`. Sources starting with `.`, `/` or `~`
 * are bind mounts resolved against projectDir, anything else names a volume.
 */
export function parseVolume(spec: string, projectDir: string): ParseResult<Mount> {
  const parts = spec.split(":");

  if (parts.length < 2) {
    return fail(`Anonymous volumes are not supported: '${spec}'`);
  }
  if (parts.length > 3) {
    return fail(`Invalid volume mapping '${spec}'`);
  }

  const [source, target, mode] = parts;

  if (!target.startsWith("/")) {
    return fail(`Container path must be absolute in '${spec}'`);
  }

  if (mode !== undefined) {
    const unknown = mode.split(",").filter((m) => !MOUNT_MODES.has(m));
    if (unknown.length > 0 || mode === "") {
      return fail(`Unknown mount mode '${mode}' in '${spec}'`);
    }
  }

  if (source.startsWith("~") && source !== "~" && !source.startsWith("~/")) {
    return fail(`Only the current user's home directory can be referenced: '${spec}'`);
  }

  if (source.startsWith(".") || source.startsWith("~") || isAbsolute(source)) {
    const expanded = source.startsWith("~") ? homedir() + source.slice(1) : source;
    return ok({
      type: "bind",
      source: resolve(projectDir, expanded),
      target,
      ...(mode !== undefined ? { mode } : {}),
    });
  }

  if (!VOLUME_NAME.test(source)) {
    return fail(`Invalid volume name '${source}' in '${spec}'`);
  }

  return ok({
    type: "volume",
    source,
    target,
    ...(mode !== undefined ? { mode } : {}),
  });
}

const DURATION_UNITS: Record<string, number> = {
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
  ms: 1,
  us: 0.001,
};

/**
 * Parse durations such as `10s`, `1m30s` or `500ms` into milliseconds
 */
export function parseDuration(text: string): ParseResult<number> {
  const pattern = /(\d+(?:\.\d+)?)(ms|us|h|m|s)/y;
  let total = 0;
  let consumed = 0;

  while (consumed < text.length) {
    pattern.lastIndex = consumed;
    const match = pattern.exec(text);
    if (!match) {
      return fail(`Invalid duration '${text}'`);
    }
    total += Number(match[1]) * DURATION_UNITS[match[2]];
    consumed = pattern.lastIndex;
  }

  if (consumed === 0) {
    return fail(`Invalid duration '${text}'`);
  }
  return ok(Math.round(total));
}

/**
 * Normalize a healthcheck section. Yields undefined when the check is
 * disabled or has no test.
 */
export function parseHealthcheck(
  section: StackFileHealthcheck
): ParseResult<Healthcheck | undefined> {
  if (section.disable || section.test === undefined) {
    return ok(undefined);
  }

  let test: string[];
  let shell: boolean;

  if (typeof section.test === "string") {
    test = [section.test];
    shell = true;
  } else {
    const [kind, ...rest] = section.test;
    if (kind === "NONE") return ok(undefined);
    if (kind === "CMD") {
      test = rest;
      shell = false;
    } else if (kind === "CMD-SHELL") {
      test = [rest.join(" ")];
      shell = true;
    } else {
      return fail(`Healthcheck test must start with CMD, CMD-SHELL or NONE, got '${kind}'`);
    }
    if (test.length === 0 || test[0] === "") {
      return fail("Healthcheck test has no command");
    }
  }

  const healthcheck: Healthcheck = { test, shell };

  const durations = [
    ["interval", "intervalMs"],
    ["timeout", "timeoutMs"],
    ["start_period", "startPeriodMs"],
  ] as const;

  for (const [key, field] of durations) {
    const raw = section[key];
    if (raw === undefined) continue;
    const parsed = parseDuration(raw);
    if (!parsed.ok) return fail(`Healthcheck ${key}: ${parsed.error}`);
    healthcheck[field] = parsed.value;
  }

  if (section.retries !== undefined) {
    healthcheck.retries = section.retries;
  }

  return ok(healthcheck);
}

/**
 * Shell-style split used for string commands: whitespace separated,
 * single and double quotes group words
 */
export function splitCommand(command: string): string[] {
  const words: string[] = [];
  const pattern = /"((?:[^"\\]|\\.)*)"|'([^']*)'|(\S+)/g;

  for (const match of command.matchAll(pattern)) {
    if (match[1] !== undefined) words.push(match[1].replace(/\\(.)/g, "$1"));
    else if (match[2] !== undefined) words.push(match[2]);
    else words.push(match[3]);
  }

  return words;
}
