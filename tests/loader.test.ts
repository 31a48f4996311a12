import { describe, test, expect } from "vitest";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { analyzeStack, findStackFile, loadStack, validateStack } from "../scripts/lib/stack/loader";
import { ConfigurationError } from "../scripts/lib/errors";

const stackDir = join(dirname(fileURLToPath(import.meta.url)), "fixtures", "stack");
const stackFile = join(stackDir, "docker-compose.yaml");

function analyze(content: string, env: Record<string, string> = {}) {
  return analyzeStack(content, {
    file: join(stackDir, "inline.yaml"),
    projectDir: stackDir,
    env,
  });
}

function messages(content: string): string[] {
  return analyze(content).errors.map((e) => e.message);
}

describe("reference stack", () => {
  test("loads the three services in declaration order", () => {
    const { descriptor } = loadStack({ file: stackFile, env: {} });
    expect(descriptor.project).toBe("stack");
    expect(descriptor.services.map((s) => s.name)).toEqual(["db", "adminer", "backend"]);
  });

  test("normalizes image, ports and env file of db", () => {
    const { descriptor } = loadStack({ file: stackFile, env: {} });
    const db = descriptor.services[0];
    expect(db.source).toEqual({ type: "image", image: "postgres:12.13-alpine" });
    expect(db.ports).toEqual([{ hostPort: 5432, containerPort: 5432, protocol: "tcp" }]);
    expect(db.envFiles).toEqual([join(stackDir, ".env")]);
    expect(db.dependsOn).toEqual([]);
  });

  test("normalizes build context, build file and bind mount of backend", () => {
    const { descriptor } = loadStack({ file: stackFile, env: {} });
    const backend = descriptor.services[2];
    expect(backend.source).toEqual({
      type: "build",
      context: stackDir,
      dockerfile: join(stackDir, "devel.Dockerfile"),
      args: {},
    });
    expect(backend.mounts).toEqual([
      { type: "bind", source: stackDir, target: "/usr/src/app", mode: "z" },
    ]);
    expect(backend.dependsOn).toEqual([{ service: "db", condition: "service_started" }]);
  });

  test("warns about the latest tag and the dependency without healthcheck", () => {
    const { warnings } = loadStack({ file: stackFile, env: {} });
    expect(warnings.map((w) => w.path)).toEqual([
      "/services/adminer/image",
      "/services/db/healthcheck",
    ]);
  });

  test("descriptor is frozen", () => {
    const { descriptor } = loadStack({ file: stackFile, env: {} });
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.services[0].ports)).toBe(true);
  });

  test("project name can be overridden", () => {
    const { descriptor } = loadStack({ file: stackFile, env: {}, project: "My App" });
    expect(descriptor.project).toBe("myapp");
  });

  test("finds the descriptor by conventional name", () => {
    expect(findStackFile(stackDir)).toBe(stackFile);
    expect(findStackFile(dirname(stackDir))).toBeNull();
  });
});

describe("dependency checks", () => {
  test("dangling dependency is a configuration error", () => {
    expect(
      messages(`
services:
  api:
    image: api:1.0
    depends_on: [db]
`)
    ).toEqual(["Service 'api' depends on undeclared service 'db'"]);
  });

  test("cycles are reported as a path", () => {
    expect(
      messages(`
services:
  a:
    image: a:1
    depends_on: [b]
  b:
    image: b:1
    depends_on: [c]
  c:
    image: c:1
    depends_on: [a]
`)
    ).toEqual(["Dependency cycle: a -> b -> c -> a"]);
  });

  test("self dependency is rejected", () => {
    expect(messages(`
services:
  a:
    image: a:1
    depends_on: [a]
`)).toEqual(["Service 'a' depends on itself", "Dependency cycle: a -> a"]);
  });

  test("service_healthy requires a healthcheck on the dependency", () => {
    expect(
      messages(`
services:
  db:
    image: postgres:16
  api:
    image: api:1.0
    depends_on:
      db:
        condition: service_healthy
`)
    ).toEqual(["Service 'api' waits for 'db' to be healthy, but 'db' has no healthcheck"]);
  });

  test("long form keeps conditions", () => {
    const result = analyze(`
services:
  db:
    image: postgres:16
    healthcheck:
      test: ["CMD", "pg_isready"]
      interval: 5s
  migrate:
    image: api:1.0
    depends_on:
      db:
        condition: service_healthy
  api:
    image: api:1.0
    depends_on:
      migrate:
        condition: service_completed_successfully
      db: {}
`);
    expect(result.valid).toBe(true);
    const api = result.descriptor?.services[2];
    expect(api?.dependsOn).toEqual([
      { service: "migrate", condition: "service_completed_successfully" },
      { service: "db", condition: "service_started" },
    ]);
  });
});

describe("resource checks", () => {
  test("host port collisions across services", () => {
    expect(
      messages(`
services:
  a:
    image: a:1
    ports: ["8080:80"]
  b:
    image: b:1
    ports: ["127.0.0.1:8080:8080"]
`)
    ).toEqual(["Host port 127.0.0.1:8080:8080 collides with 8080:80 published by service 'a'"]);
  });

  test("same host port on different protocols does not collide", () => {
    const result = analyze(`
services:
  a:
    image: a:1
    ports: ["5353:53/udp"]
  b:
    image: b:1
    ports: ["5353:53"]
`);
    expect(result.errors).toEqual([]);
  });

  test("container-only ports claim nothing", () => {
    const result = analyze(`
services:
  a:
    image: a:1
    ports: [80]
  b:
    image: b:1
    ports: ["80"]
`);
    expect(result.errors).toEqual([]);
  });

  test("bind sources may be shared between services", () => {
    const result = analyze(`
services:
  a:
    image: a:1
    volumes: ["./:/srv"]
  b:
    image: b:1
    volumes: ["./:/data:ro"]
`);
    expect(result.valid).toBe(true);
    expect(result.descriptor?.services.map((s) => s.mounts[0].source)).toEqual([stackDir, stackDir]);
  });

  test("missing env file and build file are reported together", () => {
    const result = analyze(`
services:
  api:
    build:
      context: .
      dockerfile: missing.Dockerfile
    env_file: missing.env
`);
    expect(result.errors).toEqual([
      {
        type: "error",
        message: `Build file not found: ${join(stackDir, "missing.Dockerfile")}`,
        path: "/services/api/build",
      },
      {
        type: "error",
        message: `Environment file not found: ${join(stackDir, "missing.env")}`,
        path: "/services/api/env_file/0",
      },
    ]);
  });

  test("missing build context", () => {
    expect(messages(`
services:
  api:
    build: ./nowhere
`)).toEqual([`Build context not found: ${join(stackDir, "nowhere")}`]);
  });

  test("image and build are mutually exclusive", () => {
    expect(messages(`
services:
  api:
    image: api:1.0
    build: .
`)).toEqual(["Service must declare either image or build, not both"]);
    expect(messages(`
services:
  api:
    ports: ["80:80"]
`)).toEqual(["Service must declare an image or a build section"]);
  });

  test("named volumes must be declared", () => {
    expect(messages(`
services:
  db:
    image: postgres:16
    volumes: ["pgdata:/var/lib/postgresql/data"]
`)).toEqual(["Service 'db' refers to undeclared volume 'pgdata'"]);

    const result = analyze(`
services:
  db:
    image: postgres:16
    volumes: ["pgdata:/var/lib/postgresql/data"]
volumes:
  pgdata:
`);
    expect(result.descriptor?.volumes).toEqual([
      { key: "pgdata", name: "stack_pgdata", external: false },
    ]);
  });

  test("duplicate container names", () => {
    expect(messages(`
services:
  a:
    image: a:1
    container_name: shared
  b:
    image: b:1
    container_name: shared
`)).toEqual(["Container name 'shared' is already used by service 'a'"]);
  });
});

describe("parsing and schema", () => {
  test("invalid YAML", () => {
    const result = analyze("services: [unclosed");
    expect(result.valid).toBe(false);
    expect(result.errors[0].message).toMatch(/^Failed to parse YAML: /);
  });

  test("unknown service keys fail the schema", () => {
    const result = analyze(`
services:
  a:
    image: a:1
    privileged: true
`);
    expect(result.errors).toEqual([
      {
        type: "error",
        message: "Schema: must NOT have additional properties",
        path: "/services/a",
      },
    ]);
  });

  test("variables are substituted before validation", () => {
    const result = analyze(
      `
services:
  db:
    image: postgres:\${PG_VERSION:-16}
    ports: ["\${DB_PORT}:5432"]
`,
      { DB_PORT: "15432" }
    );
    const db = result.descriptor?.services[0];
    expect(db?.source).toEqual({ type: "image", image: "postgres:16" });
    expect(db?.ports).toEqual([{ hostPort: 15432, containerPort: 5432, protocol: "tcp" }]);
  });

  test("project .env feeds interpolation after the process environment", () => {
    const result = analyze(`
services:
  db:
    image: postgres:16
    environment:
      USER_FROM_DOTENV: \${POSTGRES_USER}
`);
    expect(result.descriptor?.services[0].environment).toEqual({ USER_FROM_DOTENV: "app" });
  });

  test("environment list and map forms", () => {
    const result = analyze(
      `
services:
  a:
    image: a:1
    environment:
      - MODE=dev
      - FROM_SHELL
      - UNSET_IN_SHELL
  b:
    image: b:1
    environment:
      RETRIES: 3
      DEBUG: true
      FROM_SHELL:
`,
      { FROM_SHELL: "yes" }
    );
    const [a, b] = result.descriptor?.services ?? [];
    expect(a.environment).toEqual({ MODE: "dev", FROM_SHELL: "yes" });
    expect(b.environment).toEqual({ RETRIES: "3", DEBUG: "true", FROM_SHELL: "yes" });
  });

  test("string commands are split into words", () => {
    const result = analyze(`
services:
  a:
    image: a:1
    command: npm run "dev server"
`);
    expect(result.descriptor?.services[0].command).toEqual(["npm", "run", "dev server"]);
  });
});

describe("validateStack", () => {
  test("reports a missing file without throwing", () => {
    const result = validateStack({ file: join(stackDir, "absent.yaml") });
    expect(result).toEqual({
      valid: false,
      errors: [{ type: "error", message: `File not found: ${join(stackDir, "absent.yaml")}` }],
      warnings: [],
    });
  });

  test("loadStack throws ConfigurationError with every issue", () => {
    expect(() => loadStack({ file: join(stackDir, "absent.yaml") })).toThrow(ConfigurationError);
  });
});
