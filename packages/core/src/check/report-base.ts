import { assertPolicyName } from "../errors";
import { getCheckPolicy } from "./decorators";
import { recordPolicy } from "./report-scope";

export const CHECK_PREFIX = "check";

// `checkLimit` and `check_limit` are checks; `checksum` and `checkout` are not.
const isCheckName = (name: string) =>
  name.startsWith(CHECK_PREFIX) &&
  /^[A-Z0-9_]/.test(name.slice(CHECK_PREFIX.length));

export interface CheckDescriptor {
  name: string;
  policy?: string;
}

interface CheckEntry extends CheckDescriptor {
  invoke: () => unknown;
}

interface ComposedCheck {
  policy: string;
  check: () => boolean;
}

/**
 * Base class for objects carrying validation checks. Every method named
 * {@link CHECK_PREFIX} followed by an uppercase letter, digit or underscore
 * is a check. Base-class checks come first, then each class's checks in
 * declaration order, then the checks added with {@link ReportBase.addCheck}
 * in registration order.
 */
export abstract class ReportBase {
  private readonly composed: ComposedCheck[] = [];

  protected addCheck(policy: string, check: () => boolean): this {
    this.composed.push({ policy: assertPolicyName(policy), check });
    return this;
  }

  describeChecks(): CheckDescriptor[] {
    return this.collectChecks().map(({ name, policy }) =>
      policy === undefined ? { name } : { name, policy },
    );
  }

  /**
   * Runs every check, without short-circuiting, and returns whether any of
   * them passed. The first check that throws aborts the run.
   */
  applyRules(): boolean {
    const results = this.collectChecks().map((entry) => entry.invoke());
    return results.some(Boolean);
  }

  validate(): void {
    this.applyRules();
  }

  private collectChecks(): CheckEntry[] {
    const names = discoverCheckNames(this);
    const discovered = names.map((name): CheckEntry => {
      const method: unknown = Reflect.get(this, name);
      return {
        name,
        policy: getCheckPolicy(this, name),
        invoke: () =>
          typeof method === "function" ? method.call(this) : undefined,
      };
    });
    const composed = this.composed.map(
      ({ policy, check }, index): CheckEntry => ({
        name: `${policy}#${index}`,
        policy,
        invoke: () => {
          recordPolicy(policy);
          return check.call(this);
        },
      }),
    );
    return [...discovered, ...composed];
  }
}

const discoverCheckNames = (instance: ReportBase): string[] => {
  const chain: object[] = [];
  let prototype: object | null = Object.getPrototypeOf(instance);
  while (prototype && prototype !== ReportBase.prototype) {
    chain.unshift(prototype);
    prototype = Object.getPrototypeOf(prototype);
  }
  const names: string[] = [];
  for (const candidate of chain) {
    for (const name of Object.getOwnPropertyNames(candidate)) {
      if (!isCheckName(name) || names.includes(name)) {
        continue;
      }
      const descriptor = Object.getOwnPropertyDescriptor(candidate, name);
      if (typeof descriptor?.value === "function") {
        names.push(name);
      }
    }
  }
  return names;
};
