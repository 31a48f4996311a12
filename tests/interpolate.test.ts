import { test, expect } from "vitest";
import { chainLookup, interpolate } from "../scripts/lib/stack/interpolate";

const lookup = chainLookup({ USER: "app", EMPTY: "" }, { USER: "ignored", PORT: "5432" });

test("substitutes braced and bare references", () => {
  const result = interpolate({ url: "postgres://${USER}@db:$PORT/app" }, lookup);
  expect(result.value).toEqual({ url: "postgres://app@db:5432/app" });
  expect(result.errors).toEqual([]);
  expect(result.warnings).toEqual([]);
});

test("defaults distinguish unset from empty", () => {
  const result = interpolate(
    ["${EMPTY:-fallback}", "${EMPTY-fallback}", "${MISSING-fallback}", "${USER:+set}", "${MISSING+set}"],
    lookup
  );
  expect(result.value).toEqual(["fallback", "", "fallback", "set", ""]);
});

test("defaults may reference another variable", () => {
  const result = interpolate(["${MISSING:-${USER}}", "${MISSING-db:${PORT}/x}", "${USER:-${PORT}}"], lookup);
  expect(result.value).toEqual(["app", "db:5432/x", "app"]);
  expect(result.errors).toEqual([]);
});

test("double dollar escapes", () => {
  expect(interpolate("cost $$5 and $${USER}", lookup).value).toBe("cost $5 and ${USER}");
});

test("unset variables warn once and become empty", () => {
  const result = interpolate({ a: "${NOPE}", b: ["x${NOPE}"] }, lookup);
  expect(result.value).toEqual({ a: "", b: ["x"] });
  expect(result.warnings).toEqual([
    { type: "warning", message: "Variable NOPE is not set, substituting an empty string", path: "/a" },
  ]);
});

test("required variables produce errors", () => {
  const result = interpolate({ services: { db: { image: "${TAG:?set a tag}" } } }, lookup);
  expect(result.errors).toEqual([
    {
      type: "error",
      message: "Required variable TAG is missing a value: set a tag",
      path: "/services/db/image",
    },
  ]);
});

test("malformed references are errors", () => {
  const result = interpolate("${1BAD}", lookup);
  expect(result.errors.map((e) => e.message)).toEqual(["Invalid interpolation format '${1BAD}'"]);
});

test("keys and non-string values are left alone", () => {
  const result = interpolate({ "${USER}": 5, flag: true, nothing: null }, lookup);
  expect(result.value).toEqual({ "${USER}": 5, flag: true, nothing: null });
});
