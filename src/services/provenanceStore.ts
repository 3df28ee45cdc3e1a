import {
  ProvenanceInvariantViolationError,
  UniqueViolationError,
} from "../domain/errors.js";
import { IngestionSession, withSavepoint } from "../domain/ingestionStore.js";
import { LogSink } from "../infra/logging/logger.js";

/**
 * Resolves copyright holders and sources by their unique keys, creating them on
 * first sight. Protocol: lookup, insert under a savepoint, and on a unique-key
 * conflict roll back that savepoint only and look up again.
 */
export class ProvenanceStore {
  // Savepoints on one connection must not interleave, so resolutions on a session
  // run one at a time. Sessions never wait on each other here.
  private readonly queues = new WeakMap<IngestionSession, Promise<void>>();

  constructor(private readonly logger: LogSink) {}

  resolveCopyrightHolder(session: IngestionSession, name: string): Promise<number> {
    return this.serialize(session, () =>
      this.lookupOrInsert(
        "copyright_holders",
        name,
        () => session.findCopyrightHolderId(name),
        () => withSavepoint(session, () => session.insertCopyrightHolder(name)),
      ),
    );
  }

  resolveSource(
    session: IngestionSession,
    copyrightHolderId: number,
    url: string,
  ): Promise<number> {
    return this.serialize(session, () =>
      this.lookupOrInsert(
        "sources",
        url,
        () => session.findSourceId(url),
        () => withSavepoint(session, () => session.insertSource(copyrightHolderId, url)),
      ),
    );
  }

  private async lookupOrInsert(
    table: string,
    key: string,
    lookup: () => Promise<number | null>,
    insert: () => Promise<number>,
  ): Promise<number> {
    const existing = await lookup();
    if (existing !== null) {
      return existing;
    }

    try {
      return await insert();
    } catch (error) {
      if (!(error instanceof UniqueViolationError)) {
        throw error;
      }
      this.logger.debug(`Duplicate key on ${table} for "${key}", re-reading existing row`);
    }

    const recovered = await lookup();
    if (recovered === null) {
      throw new ProvenanceInvariantViolationError(table, key);
    }
    return recovered;
  }

  private serialize<T>(session: IngestionSession, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(session) ?? Promise.resolve();
    const run = previous.then(task);
    this.queues.set(
      session,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );
    return run;
  }
}
