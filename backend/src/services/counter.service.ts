import type { CounterStore, VersionStore } from "../interfaces";
import logger from "../logger/logger";
import { counterApiMessage, versionApiMessage } from "../utils/api-response";

class GreetingService {
  // Never touches the backend.
  greet(): string {
    return counterApiMessage.welcome;
  }
}

export class CounterService extends GreetingService {
  constructor(
    private readonly store: CounterStore,
    private readonly counterKey: string
  ) {
    super();
  }

  /** Throws BackendUnavailable when the store cannot increment. */
  async countVisit(): Promise<string> {
    const count = await this.store.increment(this.counterKey);
    logger.debug(`Visit count: ${count}`);
    return counterApiMessage.visited(count);
  }
}

export class VersionService extends GreetingService {
  constructor(private readonly store: VersionStore) {
    super();
  }

  async describe(): Promise<string> {
    const version = await this.store.version();
    return versionApiMessage.mysqlVersion(version);
  }
}
