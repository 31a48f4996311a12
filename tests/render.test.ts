import { test, expect } from "vitest";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { parse as parseYaml } from "yaml";
import { loadStack } from "../scripts/lib/stack/loader";
import { renderStack } from "../scripts/lib/stack/render";

const stackFile = join(
  dirname(fileURLToPath(import.meta.url)),
  "fixtures",
  "stack",
  "docker-compose.yaml"
);

const load = () => loadStack({ file: stackFile, env: {} }).descriptor;

test("rendered output is deterministic", () => {
  expect(renderStack(load())).toBe(renderStack(load()));
});

test("short syntax is expanded and paths made relative", () => {
  expect(parseYaml(renderStack(load()))).toEqual({
    name: "stack",
    services: {
      db: {
        image: "postgres:12.13-alpine",
        env_file: ["./.env"],
        ports: ["5432:5432"],
      },
      adminer: {
        image: "adminer:latest",
        ports: ["8080:8080"],
        depends_on: { db: { condition: "service_started" } },
      },
      backend: {
        build: { context: ".", dockerfile: "./devel.Dockerfile" },
        ports: ["8000:8000"],
        env_file: ["./.env"],
        depends_on: { db: { condition: "service_started" } },
        volumes: [".:/usr/src/app:z"],
      },
    },
  });
});

test("services are emitted in sorted order", () => {
  const lines = renderStack(load()).split("\n");
  const keys = lines.filter((l) => /^ {2}\S.*:$/.test(l));
  expect(keys).toEqual(["  adminer:", "  backend:", "  db:"]);
});
