import type { SqlHandle, SqlRow, VersionStore } from "../interfaces";
import { versionApiMessage } from "../utils/api-response";
import { BackendUnavailable } from "../utils/errors";
import { withTimeout } from "../utils/timeout/withTimeout";

export const VERSION_QUERY = "SELECT VERSION()";

// Read-only: proves the relational backend answers, mutates nothing.
export class MySqlVersionStore implements VersionStore {
  constructor(
    private readonly handle: SqlHandle,
    private readonly timeoutMs: number
  ) {}

  async version(): Promise<string> {
    let rows: SqlRow[];
    try {
      rows = await withTimeout(this.handle.query(VERSION_QUERY), this.timeoutMs);
    } catch (error) {
      throw BackendUnavailable.from(VERSION_QUERY, error);
    }

    if (rows.length === 0) {
      throw new BackendUnavailable(versionApiMessage.noVersionRow);
    }
    const [version] = Object.values(rows[0]);
    if (typeof version !== "string") {
      throw new BackendUnavailable(versionApiMessage.nonStringVersion);
    }
    return version;
  }
}
