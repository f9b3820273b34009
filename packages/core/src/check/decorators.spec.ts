import test from "node:test";
import assert from "node:assert/strict";
import { PolicyConfigurationError, ReportFailure } from "../errors";
import {
  Check,
  getCheckPolicy,
  Reported,
  ReportedAsync,
} from "./decorators";
import type { SyncGuard } from "./decorators";
import { activePolicies, report } from "./report-scope";

class Sensor {
  seen: string[] = [];

  @Check("seen-policy")
  checkSeen(): boolean {
    this.seen = [...(activePolicies() ?? [])];
    return true;
  }

  @Check("broken-policy")
  checkBroken(): boolean {
    throw new TypeError("broken");
  }

  checkLoose(): boolean {
    return false;
  }
}

class ExtendedSensor extends Sensor {}

class RewrittenSensor extends Sensor {
  checkSeen(): boolean {
    return false;
  }
}

test("Check rejects an empty policy name when applied", () => {
  assert.throws(() => Check(""), {
    name: "PolicyConfigurationError",
    message: "Check policy not set!",
  });
  assert.throws(() => Check("   "), PolicyConfigurationError);
});

test("Check accepts a non-empty policy name", () => {
  assert.equal(typeof Check("policy_1"), "function");
});

test("tagged checks run normally outside a report", () => {
  const sensor = new Sensor();
  assert.equal(sensor.checkSeen(), true);
  assert.deepEqual(sensor.seen, []);
  assert.equal(activePolicies(), undefined);
});

test("the policy is recorded before the check body runs", () => {
  const sensor = new Sensor();
  const checks = report((trail) => {
    sensor.checkSeen();
    return [...trail];
  });
  assert.deepEqual(sensor.seen, ["seen-policy"]);
  assert.deepEqual(checks, ["seen-policy"]);
});

test("a throwing check still appears in the report", () => {
  const sensor = new Sensor();
  assert.throws(
    () =>
      report(() => {
        sensor.checkSeen();
        sensor.checkBroken();
      }),
    (error: unknown) => {
      assert.ok(error instanceof ReportFailure);
      assert.deepEqual(error.checks, ["seen-policy", "broken-policy"]);
      assert.ok(error.cause instanceof TypeError);
      return true;
    },
  );
});

test("getCheckPolicy resolves tagged methods through the prototype chain", () => {
  assert.equal(getCheckPolicy(Sensor.prototype, "checkSeen"), "seen-policy");
  assert.equal(getCheckPolicy(new Sensor(), "checkBroken"), "broken-policy");
  assert.equal(
    getCheckPolicy(ExtendedSensor.prototype, "checkSeen"),
    "seen-policy",
  );
  assert.equal(getCheckPolicy(Sensor.prototype, "checkLoose"), undefined);
});

test("getCheckPolicy follows the implementation that runs", () => {
  const sensor = new RewrittenSensor();
  assert.equal(getCheckPolicy(sensor, "checkSeen"), undefined);
  assert.equal(getCheckPolicy(sensor, "checkBroken"), "broken-policy");
  const checks = report((trail) => {
    sensor.checkSeen();
    return [...trail];
  });
  assert.deepEqual(checks, []);
});

class Audit {
  sensor = new Sensor();

  @Reported()
  run(): string[] {
    this.sensor.checkSeen();
    return [...(activePolicies() ?? [])];
  }

  @Reported({ message: "Audit failed." })
  runBroken(): boolean {
    return this.sensor.checkBroken();
  }

  @ReportedAsync()
  async runLater(): Promise<string[]> {
    this.sensor.checkSeen();
    await new Promise<void>((resolve) => setImmediate(resolve));
    this.sensor.checkSeen();
    return [...(activePolicies() ?? [])];
  }
}

test("Reported runs each call in its own report", () => {
  const audit = new Audit();
  assert.deepEqual(audit.run(), ["seen-policy"]);
  assert.deepEqual(audit.run(), ["seen-policy"]);
  assert.equal(activePolicies(), undefined);
});

test("Reported converts a failing call into a report failure", () => {
  const audit = new Audit();
  assert.throws(() => audit.runBroken(), {
    name: "ReportFailure",
    message: "Audit failed.",
    checks: ["broken-policy"],
  });
});

test("Reported only takes synchronous methods", () => {
  const syncGuard: SyncGuard<string[]> = {};
  const promiseGuard: keyof SyncGuard<Promise<string[]>> =
    "@Reported methods must not return a promise, use @ReportedAsync";
  assert.deepEqual(syncGuard, {});
  assert.equal(
    promiseGuard,
    "@Reported methods must not return a promise, use @ReportedAsync",
  );
});

test("ReportedAsync keeps the report across awaits", async () => {
  const audit = new Audit();
  assert.deepEqual(await audit.runLater(), ["seen-policy", "seen-policy"]);
  assert.equal(activePolicies(), undefined);
});
