import { Hono } from "hono";
import { html } from "hono/html";
import { collectStatus, type ServiceStatus } from "../../scripts/lib/status";
import { errorMessage } from "../../scripts/lib/errors";
import type { ContainerRuntime } from "../../scripts/lib/runtime/types";
import type { StackDescriptor } from "../../scripts/lib/types";

export interface StatusAppOptions {
  descriptor: StackDescriptor;
  runtime: ContainerRuntime;
  now?: () => Date;
}

const BADGE_COLORS: Record<string, string> = {
  running: "#22c55e",
  healthy: "#22c55e",
  starting: "#3b82f6",
  restarting: "#3b82f6",
  created: "#3b82f6",
  exited: "#ef4444",
  dead: "#ef4444",
  unhealthy: "#ef4444",
  missing: "#6b7280",
};

function statusBadge(status: string) {
  const color = BADGE_COLORS[status] ?? BADGE_COLORS.missing;
  return html`<span class="badge" style="background: ${color};">${status}</span>`;
}

export function timeAgo(dateStr: string, now: Date): string {
  const diff = now.getTime() - new Date(dateStr).getTime();
  const mins = Math.floor(diff / 60000);
  const hours = Math.floor(mins / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ago`;
  if (hours > 0) return `${hours}h ago`;
  if (mins > 0) return `${mins}m ago`;
  return "just now";
}

function isUp(row: ServiceStatus): boolean {
  return row.state === "running" && row.health !== "unhealthy";
}

/**
 * Dashboard over the containers of one stack
 */
export function createStatusApp(options: StatusAppOptions): Hono {
  const { descriptor, runtime } = options;
  const now = options.now ?? (() => new Date());
  const app = new Hono();

  app.get("/", async (c) => {
    let rows: ServiceStatus[] = [];
    let error: string | null = null;

    try {
      rows = await collectStatus(descriptor, runtime);
    } catch (e) {
      error = errorMessage(e);
    }

    const up = rows.filter(isUp).length;
    const down = rows.length - up;
    const renderedAt = now();

    const page = html`<!DOCTYPE html>
      <html lang="en">
        <head>
          <meta charset="UTF-8" />
          <title>${descriptor.project} - stack status</title>
          <style>
            body { font-family: -apple-system, "Segoe UI", sans-serif; background: #0f172a; color: #e2e8f0; padding: 20px; }
            .stats { display: flex; gap: 16px; margin-bottom: 24px; }
            .stat { background: #1e293b; padding: 16px; border-radius: 8px; min-width: 120px; text-align: center; }
            .stat-value { font-size: 28px; font-weight: bold; }
            .stat-label { font-size: 13px; color: #94a3b8; }
            table { width: 100%; border-collapse: collapse; background: #1e293b; border-radius: 8px; }
            th, td { text-align: left; padding: 10px 12px; border-bottom: 1px solid #334155; font-size: 14px; }
            th { color: #94a3b8; font-weight: 500; }
            .badge { padding: 2px 8px; border-radius: 4px; font-size: 12px; color: white; margin-right: 4px; }
            .error-banner { background: #7f1d1d; color: #fecaca; padding: 16px; border-radius: 8px; margin-bottom: 20px; }
            .muted { color: #64748b; }
          </style>
        </head>
        <body>
          <h1>Stack: ${descriptor.project}</h1>
          ${error ? html`<div class="error-banner">${error}</div>` : ""}
          <div class="stats">
            <div class="stat">
              <div class="stat-value">${rows.length}</div>
              <div class="stat-label">Services</div>
            </div>
            <div class="stat">
              <div class="stat-value">${up}</div>
              <div class="stat-label">Up</div>
            </div>
            <div class="stat">
              <div class="stat-value">${down}</div>
              <div class="stat-label">Down</div>
            </div>
          </div>
          <table>
            <thead>
              <tr><th>Service</th><th>Container</th><th>State</th><th>Ports</th><th>Started</th></tr>
            </thead>
            <tbody>
              ${rows.map(
                (row) => html`
                  <tr>
                    <td>${row.service}</td>
                    <td class="muted">${row.container}</td>
                    <td>${statusBadge(row.state)}${row.health ? statusBadge(row.health) : ""}</td>
                    <td>${row.ports.join(", ")}</td>
                    <td class="muted">${row.startedAt ? timeAgo(row.startedAt, renderedAt) : "-"}</td>
                  </tr>
                `
              )}
            </tbody>
          </table>
          <script>
            setTimeout(() => location.reload(), 10000);
          </script>
        </body>
      </html>`;

    return c.html(page);
  });

  app.get("/api/status", async (c) => {
    try {
      const services = await collectStatus(descriptor, runtime);
      return c.json({ project: descriptor.project, services });
    } catch (e) {
      return c.json({ project: descriptor.project, error: errorMessage(e) }, 502);
    }
  });

  app.get("/health", (c) => c.json({ status: "ok" }));

  return app;
}
