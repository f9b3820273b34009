import { defineEnvSchema, env } from "@policy-report/core";
import type { EnvSource } from "@policy-report/core";
import { LOG_LEVELS } from "./interfaces";
import type { LoggingOptions, LogLevel } from "./interfaces";

export const loggingEnvSchema = defineEnvSchema({
  POLICY_REPORT_SERVICE: env.string({ default: "policy-report" }),
  POLICY_REPORT_LOG_LEVEL: env.oneOf<LogLevel>(LOG_LEVELS, { default: "warn" }),
  POLICY_REPORT_LOG: env.boolean({ default: false }),
});

export interface ResolvedLoggingOptions extends LoggingOptions {
  enabled: boolean;
}

export const loadLoggingOptions = (
  source?: EnvSource,
): ResolvedLoggingOptions => {
  const config = loggingEnvSchema.parse(source);
  return {
    serviceName: config.POLICY_REPORT_SERVICE,
    logLevel: config.POLICY_REPORT_LOG_LEVEL,
    enabled: config.POLICY_REPORT_LOG,
  };
};
