import { assertPolicyName, PolicyConfigurationError } from "../errors";
import { recordPolicy, ReportScope } from "./report-scope";
import type { ReportOptions } from "./report-scope";

export type CheckMethod = () => boolean;

type PolicyTable = Map<string | symbol, string>;

const policyRegistry = new WeakMap<object, PolicyTable>();

/**
 * Tags a check method with a policy. The policy is recorded into the active
 * report before the method body runs, so a check that throws still shows up
 * in the trail. Outside a report the method runs untouched.
 */
export const Check = (policy: string) => {
  const name = assertPolicyName(policy);
  return (
    target: object,
    propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<CheckMethod>,
  ): void => {
    const original = descriptor.value;
    if (!original) {
      throw new PolicyConfigurationError(
        `@Check("${name}") can only decorate methods`,
      );
    }
    descriptor.value = function (this: unknown): boolean {
      recordPolicy(name);
      return original.call(this);
    };
    registerPolicy(target, propertyKey, name);
  };
};

/**
 * Policy of the implementation that runs for `method`: the one owned by the
 * nearest prototype. An untagged override hides the policy of the method it
 * overrides.
 */
export const getCheckPolicy = (
  target: object,
  method: string | symbol,
): string | undefined => {
  let prototype: object | null = target;
  while (prototype) {
    if (Object.prototype.hasOwnProperty.call(prototype, method)) {
      return policyRegistry.get(prototype)?.get(method);
    }
    prototype = Object.getPrototypeOf(prototype);
  }
  return undefined;
};

const registerPolicy = (
  target: object,
  method: string | symbol,
  policy: string,
) => {
  const table: PolicyTable = policyRegistry.get(target) ?? new Map();
  table.set(method, policy);
  policyRegistry.set(target, table);
};

export type SyncGuard<R> = R extends PromiseLike<unknown>
  ? { "@Reported methods must not return a promise, use @ReportedAsync": never }
  : unknown;

/**
 * Runs each call of the decorated method inside its own report scope.
 * Promise-returning methods are rejected by the type; they take
 * {@link ReportedAsync}.
 */
export const Reported = (options?: ReportOptions) => {
  return <A extends unknown[], R>(
    _target: object,
    _propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<(...args: A) => R> & SyncGuard<R>,
  ): void => {
    const original = descriptor.value;
    if (!original) {
      throw new PolicyConfigurationError("@Reported can only decorate methods");
    }
    descriptor.value = function (this: unknown, ...args: A): R {
      return new ReportScope(options).run(() => original.apply(this, args));
    };
  };
};

export const ReportedAsync = (options?: ReportOptions) => {
  return <A extends unknown[], R>(
    _target: object,
    _propertyKey: string | symbol,
    descriptor: TypedPropertyDescriptor<(...args: A) => Promise<R>>,
  ): void => {
    const original = descriptor.value;
    if (!original) {
      throw new PolicyConfigurationError(
        "@ReportedAsync can only decorate methods",
      );
    }
    descriptor.value = function (this: unknown, ...args: A): Promise<R> {
      return new ReportScope(options).runAsync(() =>
        original.apply(this, args),
      );
    };
  };
};
