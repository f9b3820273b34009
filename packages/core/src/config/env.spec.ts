import test from "node:test";
import assert from "node:assert/strict";
import { defineEnvSchema, env } from "./env";

const schema = defineEnvSchema({
  SERVICE: env.string({ default: "checks" }),
  LEVEL: env.oneOf(["low", "high"], { default: "low" }),
  STRICT: env.boolean({ default: false }),
  OWNER: env.optional(env.string()),
});

test("defaults apply when variables are missing or empty", () => {
  assert.deepEqual(schema.parse({ SERVICE: "" }), {
    SERVICE: "checks",
    LEVEL: "low",
    STRICT: false,
    OWNER: undefined,
  });
});

test("provided values are parsed", () => {
  assert.deepEqual(
    schema.parse({
      SERVICE: "billing",
      LEVEL: "high",
      STRICT: "YES",
      OWNER: "team-a",
    }),
    { SERVICE: "billing", LEVEL: "high", STRICT: true, OWNER: "team-a" },
  );
});

test("invalid values are rejected", () => {
  assert.throws(() => schema.parse({ LEVEL: "medium" }), {
    message: "Environment variable LEVEL must be one of low, high",
  });
  assert.throws(() => schema.parse({ STRICT: "maybe" }), {
    message: "Environment variable STRICT must be boolean",
  });
});

test("required variables without a default must be set", () => {
  const required = defineEnvSchema({ TOKEN: env.string() });
  assert.throws(() => required.parse({}), {
    message: "Environment variable TOKEN is required",
  });
});
