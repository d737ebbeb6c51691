import { Command, Flags } from "@oclif/core";

import { CursorFileStore } from "../../../shared/persistence/CursorFileStore.js";
import { formatPersistedCursor, listPersistedCursors } from "../../cursors.js";
import { loadConfigOrExit } from "../../support/poller.js";

export default class CursorsShow extends Command {
  static override summary = "Show the persisted cursor of every stream";

  static override flags = {
    config: Flags.string({ char: "c", description: "Path to the poller JSON config" })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(CursorsShow);
    const config = await loadConfigOrExit(this, flags.config);
    const store = new CursorFileStore({ basePath: config.stateFile });

    try {
      const entries = await listPersistedCursors(store, config.stateFile);
      if (entries.length === 0) {
        this.log(`no cursors under ${config.stateFile}_*`);
        return;
      }
      for (const entry of entries) {
        this.log(formatPersistedCursor(entry));
      }
    } catch (error) {
      this.error(error instanceof Error ? error.message : String(error), { exit: 1 });
    }
  }
}
