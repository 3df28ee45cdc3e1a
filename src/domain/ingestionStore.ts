import { IngestionError, describeError } from "./errors.js";
import {
  DatabaseStatistics,
  EmbeddedChunk,
  EmbeddingCheck,
  StoredChunk,
} from "./types.js";

/**
 * One long-lived unit of work against the store. A transaction is always open:
 * `commit()` and `rollback()` end the current one and begin the next.
 */
export interface IngestionSession {
  findCopyrightHolderId(name: string): Promise<number | null>;
  /** Throws UniqueViolationError when the name already exists. */
  insertCopyrightHolder(name: string): Promise<number>;
  findSourceId(url: string): Promise<number | null>;
  /** Throws UniqueViolationError when the url already exists. */
  insertSource(copyrightHolderId: number, url: string): Promise<number>;
  insertChunks(sourceId: number, chunks: EmbeddedChunk[]): Promise<void>;
  savepoint(): Promise<string>;
  rollbackToSavepoint(name: string): Promise<void>;
  releaseSavepoint(name: string): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export interface ListChunksInput {
  sourceUrl?: string;
  limit?: number;
}

export interface IngestionStore {
  initialize(): Promise<void>;
  openSession(): Promise<IngestionSession>;
  listChunks(input?: ListChunksInput): Promise<StoredChunk[]>;
  getStatistics(): Promise<DatabaseStatistics>;
  checkEmbeddings(): Promise<EmbeddingCheck>;
  close(): Promise<void>;
}

export async function withSavepoint<T>(
  session: IngestionSession,
  work: () => Promise<T>,
): Promise<T> {
  const savepoint = await session.savepoint();
  let result: T;
  try {
    result = await work();
  } catch (error) {
    try {
      await session.rollbackToSavepoint(savepoint);
    } catch (rollbackError) {
      throw new IngestionError(
        `Rollback to savepoint ${savepoint} failed: ${describeError(rollbackError)}`,
        { cause: error },
      );
    }
    throw error;
  }
  await session.releaseSavepoint(savepoint);
  return result;
}
