export class PolicyConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyConfigurationError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ReportScopeStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReportScopeStateError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const REPORT_FAILURE_MESSAGE =
  "Checks failed while applying rules in validation.";

/**
 * Raised by a report scope whose body failed. `checks` lists every policy
 * started inside the scope, including the one whose check threw; the
 * original error is kept as `cause`.
 */
export class ReportFailure extends Error {
  constructor(
    public readonly checks: readonly string[],
    cause: unknown,
    message = REPORT_FAILURE_MESSAGE,
  ) {
    super(message, { cause });
    this.name = "ReportFailure";
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get lastPolicy(): string | undefined {
    return this.checks[this.checks.length - 1];
  }
}

export const assertPolicyName = (policy: unknown): string => {
  if (typeof policy !== "string" || !policy.trim()) {
    throw new PolicyConfigurationError("Check policy not set!");
  }
  return policy;
};
