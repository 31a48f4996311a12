import type { BringUpResult } from "./sequencer";
import type { ValidationError, ValidationResult, ValidationWarning } from "./types";

const SERVICE_PATH = /^\/services\/([^/]+)(?:\/(.*))?$/;

type Issue = ValidationError | ValidationWarning;

/**
 * Issues grouped by the service they point into; the rest fall under "stack"
 */
function groupByService(issues: Issue[]): Map<string, Array<{ issue: Issue; where?: string }>> {
  const groups = new Map<string, Array<{ issue: Issue; where?: string }>>();
  for (const issue of issues) {
    const match = issue.path?.match(SERVICE_PATH);
    const key = match ? match[1] : "stack";
    const where = match ? match[2] : issue.path;
    const group = groups.get(key) ?? [];
    group.push({ issue, where });
    groups.set(key, group);
  }
  return groups;
}

export function formatResults(filePath: string, result: ValidationResult): string {
  const lines = [`\n📄 ${filePath}`, "─".repeat(60)];
  const issues: Issue[] = [...result.errors, ...result.warnings];

  if (issues.length === 0) {
    lines.push("  ✅ Valid - no issues found");
    return lines.join("\n");
  }

  for (const [owner, group] of groupByService(issues)) {
    lines.push(`  ${owner}:`);
    for (const { issue, where } of group) {
      const at = where ? ` (${where})` : "";
      lines.push(
        issue.type === "error"
          ? `    ❌ ERROR${at}: ${issue.message}`
          : `    ⚠️  WARNING${at}: ${issue.message}`
      );
    }
  }

  lines.push(
    result.valid
      ? `  ✅ Valid with ${result.warnings.length} warning(s)`
      : `  ❌ Invalid: ${result.errors.length} error(s), ${result.warnings.length} warning(s)`
  );
  return lines.join("\n");
}

export function formatWarnings(warnings: ValidationWarning[]): string[] {
  return warnings.map((w) => `⚠️  ${w.path ? `(${w.path}) ` : ""}${w.message}`);
}

/**
 * Summary block printed at the end of `up`
 */
export function formatSummary(result: BringUpResult): string {
  const lines: string[] = [];
  const started = result.services.filter((s) => s.outcome === "started");
  const failed = result.services.filter((s) => s.outcome === "failed");
  const skipped = result.services.filter((s) => s.outcome === "skipped");

  lines.push("\n" + "═".repeat(60));
  lines.push("📊 SUMMARY");
  lines.push("═".repeat(60));
  lines.push(`   ✅ Started: ${started.length}`);
  lines.push(`   ❌ Failed: ${failed.length}`);
  lines.push(`   ⏭️  Skipped: ${skipped.length}`);

  if (failed.length + skipped.length > 0) {
    lines.push("\n   Services not running:");
    for (const service of [...failed, ...skipped]) {
      lines.push(`   - ${service.service} (${service.outcome}): ${service.error ?? "unknown error"}`);
    }
  }

  return lines.join("\n");
}
