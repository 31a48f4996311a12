import type { ValidationError } from "./types";

/**
 * Raised when a stack descriptor cannot be brought up as written.
 * Carries every problem found, not just the first.
 */
export class ConfigurationError extends Error {
  readonly issues: ValidationError[];

  constructor(issues: ValidationError[], file?: string) {
    const where = file ? ` in ${file}` : "";
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    super(`Invalid stack descriptor${where}: ${summary}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Raised when a container engine command exits non-zero
 */
export class RuntimeCommandError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    const detail = stderr.trim() || "no output";
    super(`Command failed (${exitCode}): ${command}: ${detail}`);
    this.name = "RuntimeCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
