/**
 * Variable substitution for descriptor values (`${VAR}`, `${VAR:-default}`,
 * `$VAR`, `$$` ...). Only string values are substituted, never keys.
 * Defaults may hold one level of nested `${...}`.
 */

import type { ValidationError, ValidationWarning } from "../types";

export type VariableLookup = (name: string) => string | undefined;

export interface InterpolationResult {
  value: unknown;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

const REFERENCE =
  /\$(?:(\$)|\{([A-Za-z_][A-Za-z0-9_]*)(?:(:?[-?+])((?:\$\{[^}]*\}|[^}])*))?\}|([A-Za-z_][A-Za-z0-9_]*)|(\{[^}]*\}?))/g;

function escapeSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

class Interpolator {
  readonly errors: ValidationError[] = [];
  readonly warnings: ValidationWarning[] = [];
  private readonly warned = new Set<string>();

  constructor(private readonly lookup: VariableLookup) {}

  walk(value: unknown, path: string): unknown {
    if (typeof value === "string") {
      return this.substitute(value, path);
    }
    if (Array.isArray(value)) {
      return value.map((item, i) => this.walk(item, `${path}/${i}`));
    }
    if (value !== null && typeof value === "object") {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [
          key,
          this.walk(item, `${path}/${escapeSegment(key)}`),
        ])
      );
    }
    return value;
  }

  substitute(text: string, path: string): string {
    return text.replace(
      REFERENCE,
      (
        whole: string,
        dollar: string | undefined,
        braced: string | undefined,
        operator: string | undefined,
        operand: string | undefined,
        bare: string | undefined,
        invalid: string | undefined
      ) => {
        if (dollar) return "$";

        if (invalid !== undefined) {
          this.errors.push({
            type: "error",
            message: `Invalid interpolation format '${whole}'`,
            path: path || "/",
          });
          return whole;
        }

        const name = braced ?? bare ?? "";
        const value = this.lookup(name);

        switch (operator) {
          case ":-":
            return value ? value : this.substitute(operand ?? "", path);
          case "-":
            return value !== undefined ? value : this.substitute(operand ?? "", path);
          case ":+":
            return value ? this.substitute(operand ?? "", path) : "";
          case "+":
            return value !== undefined ? this.substitute(operand ?? "", path) : "";
          case ":?":
          case "?": {
            const missing = operator === ":?" ? !value : value === undefined;
            if (missing) {
              this.errors.push({
                type: "error",
                message: `Required variable ${name} is missing a value${operand ? `: ${operand}` : ""}`,
                path: path || "/",
              });
              return "";
            }
            return value ?? "";
          }
        }

        if (value === undefined) {
          if (!this.warned.has(name)) {
            this.warned.add(name);
            this.warnings.push({
              type: "warning",
              message: `Variable ${name} is not set, substituting an empty string`,
              path: path || "/",
            });
          }
          return "";
        }
        return value;
      }
    );
  }
}

export function interpolate(value: unknown, lookup: VariableLookup): InterpolationResult {
  const interpolator = new Interpolator(lookup);
  const result = interpolator.walk(value, "");
  return {
    value: result,
    errors: interpolator.errors,
    warnings: interpolator.warnings,
  };
}

/**
 * Lookup that consults each source in order
 */
export function chainLookup(
  ...sources: Array<Record<string, string | undefined>>
): VariableLookup {
  return (name) => {
    for (const source of sources) {
      const value = source[name];
      if (value !== undefined) return value;
    }
    return undefined;
  };
}
