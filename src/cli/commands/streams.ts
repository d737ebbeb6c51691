import { Command, Flags } from "@oclif/core";

import { createPoller } from "../../poller/index.js";
import { JsonLinesSink } from "../../poller/sink/jsonLinesSink.js";
import { loadConfigOrExit } from "../support/poller.js";

export default class Streams extends Command {
  static override summary = "List the log streams the next cycle would poll";

  static override flags = {
    config: Flags.string({ char: "c", description: "Path to the poller JSON config" }),
    details: Flags.boolean({ description: "Include last event timestamps", default: false })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(Streams);
    const config = await loadConfigOrExit(this, flags.config);
    const { catalog } = createPoller(config, { sink: new JsonLinesSink(process.stderr) });

    let count = 0;
    for await (const stream of catalog.discover()) {
      count += 1;
      if (flags.details) {
        const last = stream.lastEventTimestamp === undefined ? "-" : new Date(stream.lastEventTimestamp).toISOString();
        this.log(`${stream.name}\t${last}`);
      } else {
        this.log(stream.name);
      }
    }
    if (count === 0) {
      this.logToStderr("no matching streams");
    }
  }
}
