import { Command, Flags } from "@oclif/core";

import { CursorFileStore } from "../../../shared/persistence/CursorFileStore.js";
import { loadConfigOrExit } from "../../support/poller.js";

export default class CursorsSet extends Command {
  static override summary = "Seed or overwrite the cursor of one stream";

  static override description =
    "Writes the token through the same atomic path the poller uses. The next cycle for that stream resumes from it.";

  static override flags = {
    config: Flags.string({ char: "c", description: "Path to the poller JSON config" }),
    stream: Flags.string({ description: "Log stream name", required: true }),
    token: Flags.string({ description: "Continuation token issued by CloudWatch Logs", required: true })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(CursorsSet);
    const config = await loadConfigOrExit(this, flags.config);
    const store = new CursorFileStore({ basePath: config.stateFile });

    try {
      await store.save(flags.stream, flags.token);
      this.log(`cursor for ${flags.stream} written to ${store.pathFor(flags.stream)}`);
    } catch (error) {
      this.error(error instanceof Error ? error.message : String(error), { exit: 1 });
    }
  }
}
