import { Command, Flags } from "@oclif/core";

import { createPoller } from "../../poller/index.js";
import { JsonLinesSink } from "../../poller/sink/jsonLinesSink.js";
import { createShutdownHandler, loadConfigOrExit, summarizeCycle } from "../support/poller.js";

export default class Poll extends Command {
  static override summary = "Poll CloudWatch Logs and write each event as a JSON line to stdout";

  static override description =
    "Runs the poll loop until SIGINT/SIGTERM. On shutdown the stream currently being processed finishes its fetch, emit and cursor save before the process exits.";

  static override flags = {
    config: Flags.string({ char: "c", description: "Path to the poller JSON config (default: LOGPULL_CONFIG or <home>/config/poller.json)" }),
    once: Flags.boolean({ description: "Run a single cycle and exit", default: false })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(Poll);
    const config = await loadConfigOrExit(this, flags.config);
    const { scheduler } = createPoller(config, {
      sink: new JsonLinesSink(process.stdout),
      onCycleComplete: (report) => this.logToStderr(summarizeCycle(report))
    });

    if (flags.once) {
      const report = await scheduler.runCycle();
      this.logToStderr(summarizeCycle(report));
      if (report.resolveError || report.streams.some((outcome) => outcome.status === "failed")) {
        process.exitCode = 1;
      }
      return;
    }

    const shutdown = createShutdownHandler(scheduler, (line) => this.logToStderr(line));
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    try {
      await scheduler.start();
    } finally {
      process.off("SIGINT", shutdown);
      process.off("SIGTERM", shutdown);
    }
  }
}
