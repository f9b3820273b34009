import { report, ReportFailure } from "@policy-report/core";
import { StructuredLogger } from "@policy-report/observability";
import { Evaluation } from "./evaluation";

// policy_3 throws, so the report fails after policy_1, policy_2, policy_3.
function bootstrap() {
  const logger = new StructuredLogger({
    serviceName: "checker-example",
    logLevel: "debug",
  });
  const evaluatee = new Evaluation();
  report(() => evaluatee.validate(), { logger });
}

try {
  bootstrap();
} catch (error) {
  if (error instanceof ReportFailure) {
    console.error(`${error.message} Last policy: ${error.lastPolicy}`, {
      checks: error.checks,
      cause: error.cause,
    });
  } else {
    console.error("Checker example failed", error);
  }
  process.exit(1);
}
