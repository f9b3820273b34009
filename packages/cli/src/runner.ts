import path from "node:path";
import kleur from "kleur";
import { ReportBase, ReportFailure, ReportScope } from "@policy-report/core";
import type { CheckDescriptor, ReportLogger } from "@policy-report/core";

export type CheckableClass = new () => ReportBase;

export interface CheckableExport {
  name: string;
  target: CheckableClass;
}

export interface CheckOutcome {
  name: string;
  status: "completed" | "failed";
  checks: string[];
  anyPassed?: boolean;
  error?: string;
}

export interface RunOptions {
  logger?: ReportLogger;
}

const isCheckableClass = (value: unknown): value is CheckableClass =>
  typeof value === "function" && value.prototype instanceof ReportBase;

export const collectCheckables = (
  moduleExports: unknown,
  only?: string,
): CheckableExport[] => {
  if (typeof moduleExports !== "object" || moduleExports === null) {
    return [];
  }
  const checkables = Object.entries(moduleExports)
    .filter(([name]) => !only || name === only)
    .flatMap(([name, value]) =>
      isCheckableClass(value) ? [{ name, target: value }] : [],
    );
  if (only && !checkables.length) {
    throw new Error(`Export "${only}" is not a ReportBase subclass`);
  }
  return checkables;
};

export const loadCheckables = async (
  entry: string,
  only?: string,
): Promise<CheckableExport[]> => {
  const target = path.resolve(process.cwd(), entry);
  const loaded: unknown = await import(target);
  return collectCheckables(loaded, only);
};

/**
 * Validates each class in its own report. A failing report becomes a
 * `failed` outcome. Classes are built before their report opens, so a
 * configuration error in a constructor is thrown as is.
 */
export const runCheckables = (
  checkables: CheckableExport[],
  options: RunOptions = {},
): CheckOutcome[] =>
  checkables.map(({ name, target }): CheckOutcome => {
    const instance = new target();
    const scope = new ReportScope({ logger: options.logger });
    try {
      const anyPassed = scope.run(() => instance.applyRules());
      return {
        name,
        status: "completed",
        checks: [...scope.checks],
        anyPassed,
      };
    } catch (error) {
      if (!(error instanceof ReportFailure)) {
        throw error;
      }
      return {
        name,
        status: "failed",
        checks: [...error.checks],
        error: describeCause(error.cause),
      };
    }
  });

export const describeCheckables = (
  checkables: CheckableExport[],
): Array<{ name: string; checks: CheckDescriptor[] }> =>
  checkables.map(({ name, target }) => ({
    name,
    checks: new target().describeChecks(),
  }));

export const formatOutcome = (outcome: CheckOutcome): string => {
  const trail = outcome.checks.length ? outcome.checks.join(" -> ") : "(none)";
  if (outcome.status === "completed") {
    return `${kleur.green("PASS")} ${outcome.name}: ${trail}`;
  }
  return `${kleur.red("FAIL")} ${outcome.name}: ${trail} (${outcome.error})`;
};

export const formatDescriptor = (descriptor: CheckDescriptor): string =>
  `  ${descriptor.name} ${kleur.gray("->")} ${descriptor.policy ?? kleur.yellow("untagged")}`;

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
