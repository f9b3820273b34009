#!/usr/bin/env node
import { Command } from "commander";
import kleur from "kleur";
import {
  loadLoggingOptions,
  StructuredLogger,
} from "@policy-report/observability";
import {
  describeCheckables,
  formatDescriptor,
  formatOutcome,
  loadCheckables,
  runCheckables,
} from "./runner";

interface RunCommandOptions {
  export?: string;
  json?: boolean;
}

interface ListCommandOptions {
  export?: string;
}

const createLogger = () => {
  const options = loadLoggingOptions();
  return options.enabled ? new StructuredLogger(options) : undefined;
};

const program = new Command();

program
  .name("policy-report")
  .description("Run and inspect the policy checks declared on ReportBase classes")
  .version("0.1.0");

program
  .command("run")
  .description("Validate every exported ReportBase subclass inside a report")
  .argument("<entry>", "Path to the module exporting the checkable classes")
  .option("--export <name>", "Only run the named export")
  .option("--json", "Print the outcomes as JSON")
  .action(async (entry: string, options: RunCommandOptions) => {
    const checkables = await loadCheckables(entry, options.export);
    if (!checkables.length) {
      console.log(kleur.yellow(`No ReportBase subclasses exported by ${entry}`));
      return;
    }
    const logger = createLogger();
    const outcomes = logger
      ? await logger.profile(`run ${entry}`, () =>
          runCheckables(checkables, { logger }),
        )
      : runCheckables(checkables);
    if (options.json) {
      console.log(JSON.stringify(outcomes, null, 2));
    } else {
      outcomes.forEach((outcome) => console.log(formatOutcome(outcome)));
    }
    if (outcomes.some((outcome) => outcome.status === "failed")) {
      process.exitCode = 1;
    }
  });

program
  .command("list")
  .description("List the checks and policies of every exported ReportBase subclass")
  .argument("<entry>", "Path to the module exporting the checkable classes")
  .option("--export <name>", "Only list the named export")
  .action(async (entry: string, options: ListCommandOptions) => {
    const checkables = await loadCheckables(entry, options.export);
    describeCheckables(checkables).forEach(({ name, checks }) => {
      console.log(kleur.cyan(name));
      checks.forEach((descriptor) => console.log(formatDescriptor(descriptor)));
    });
  });

program.parseAsync(process.argv).catch((error) => {
  console.error(
    kleur.red(error instanceof Error ? error.message : String(error)),
  );
  process.exit(1);
});
