import { AsyncLocalStorage } from "node:async_hooks";
import { ReportFailure, ReportScopeStateError } from "../errors";

export type ReportState = "idle" | "active" | "completed" | "failed";

export interface ReportLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
}

export interface ReportOptions {
  logger?: ReportLogger;
  message?: string;
}

const storage = new AsyncLocalStorage<string[]>();

export const recordPolicy = (policy: string): void => {
  storage.getStore()?.push(policy);
};

export const activePolicies = (): readonly string[] | undefined =>
  storage.getStore();

/**
 * Collects the policies tagged while its body runs. Each scope installs a
 * fresh trail for its body and the enclosing trail comes back on exit,
 * whichever way the body ends. A failing body is rethrown as a
 * {@link ReportFailure} carrying the trail.
 */
export class ReportScope {
  private readonly trail: string[] = [];
  private current: ReportState = "idle";

  constructor(private readonly options: ReportOptions = {}) {}

  get checks(): readonly string[] {
    return this.trail;
  }

  get state(): ReportState {
    return this.current;
  }

  run<T>(body: (checks: readonly string[]) => T): T {
    this.enter();
    let result: T;
    try {
      result = storage.run(this.trail, () => body(this.trail));
    } catch (error) {
      throw this.fail(error);
    }
    this.complete();
    return result;
  }

  async runAsync<T>(
    body: (checks: readonly string[]) => Promise<T> | T,
  ): Promise<T> {
    this.enter();
    let result: T;
    try {
      result = await storage.run(this.trail, () => body(this.trail));
    } catch (error) {
      throw this.fail(error);
    }
    this.complete();
    return result;
  }

  private enter() {
    if (this.current !== "idle") {
      throw new ReportScopeStateError(
        `Report scope cannot be entered while ${this.current}`,
      );
    }
    this.current = "active";
  }

  private complete() {
    this.current = "completed";
    this.options.logger?.debug("Report completed", {
      checks: [...this.trail],
    });
  }

  private fail(error: unknown): ReportFailure {
    this.current = "failed";
    const failure = new ReportFailure(
      [...this.trail],
      error,
      this.options.message,
    );
    this.options.logger?.warn(failure.message, {
      checks: failure.checks,
      error,
    });
    return failure;
  }
}

export const report = <T>(
  body: (checks: readonly string[]) => T,
  options?: ReportOptions,
): T => new ReportScope(options).run(body);

export const reportAsync = <T>(
  body: (checks: readonly string[]) => Promise<T> | T,
  options?: ReportOptions,
): Promise<T> => new ReportScope(options).runAsync(body);
