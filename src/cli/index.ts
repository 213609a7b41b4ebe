#!/usr/bin/env node
import "dotenv/config";

import { OrchestrationCancelledError, describeError } from "../errors.js";
import { createStderrFormatter, createStdoutFormatter } from "../ui/fmt.js";
import { parseArgs, runArbitrate, runAsk, runValidate } from "./commands.js";
import { getHelpCommand, renderCommandHelp, renderRootHelp } from "./help.js";

const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);
  const command = args[0];
  const stdoutFmt = createStdoutFormatter();

  if (!command || command === "--help" || command === "-h") {
    process.stdout.write(renderRootHelp(stdoutFmt));
    return;
  }

  const help = getHelpCommand(command);
  if (!help) {
    process.stderr.write(renderRootHelp(createStderrFormatter()));
    process.exitCode = EXIT_FAILURE;
    return;
  }

  const parsed = parseArgs(args.slice(1));
  if (parsed.flags["--help"] || args.includes("-h")) {
    process.stdout.write(renderCommandHelp(stdoutFmt, help));
    return;
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    console.error("SIGINT received: cancelling (press Ctrl+C again to force exit)");
    controller.abort(new Error("Interrupted by SIGINT"));
  };
  process.on("SIGINT", onSigint);

  try {
    if (command === "ask") {
      await runAsk(parsed, { signal: controller.signal });
    } else if (command === "arbitrate") {
      await runArbitrate(parsed, { signal: controller.signal });
    } else {
      runValidate(parsed);
    }
  } catch (error) {
    const cancelled = error instanceof OrchestrationCancelledError || controller.signal.aborted;
    console.error(createStderrFormatter().errorBlock(describeError(error)));
    process.exitCode = cancelled ? EXIT_INTERRUPTED : EXIT_FAILURE;
  } finally {
    process.off("SIGINT", onSigint);
  }
};

void main();
