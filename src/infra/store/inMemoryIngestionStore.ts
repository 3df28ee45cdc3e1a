import {
  IngestionSession,
  IngestionStore,
  ListChunksInput,
} from "../../domain/ingestionStore.js";
import { IngestionError, UniqueViolationError } from "../../domain/errors.js";
import {
  ChunkRecord,
  CopyrightHolderRecord,
  DatabaseStatistics,
  EmbeddedChunk,
  EmbeddingCheck,
  SourceRecord,
  StoredChunk,
} from "../../domain/types.js";

interface MemoryTables {
  holdersByName: Map<string, CopyrightHolderRecord>;
  sourcesByUrl: Map<string, SourceRecord>;
  chunks: ChunkRecord[];
  sequences: { holder: number; source: number; chunk: number };
}

interface SavepointMark {
  name: string;
  undoLength: number;
}

// Writes land in the shared tables immediately; an undo log makes rollback and
// savepoints possible. Sequences are never rewound, as in Postgres.
export class InMemoryIngestionStore implements IngestionStore {
  private readonly tables: MemoryTables = {
    holdersByName: new Map(),
    sourcesByUrl: new Map(),
    chunks: [],
    sequences: { holder: 1, source: 1, chunk: 1 },
  };

  constructor(private readonly vectorDimension: number) {}

  async initialize(): Promise<void> {}

  async openSession(): Promise<IngestionSession> {
    return new InMemoryIngestionSession(this.tables, this.vectorDimension);
  }

  async listChunks(input?: ListChunksInput): Promise<StoredChunk[]> {
    const holderNames = new Map<number, string>();
    for (const holder of this.tables.holdersByName.values()) {
      holderNames.set(holder.id, holder.name);
    }
    const sourcesById = new Map<number, SourceRecord>();
    for (const source of this.tables.sourcesByUrl.values()) {
      sourcesById.set(source.id, source);
    }

    const limit = input?.limit && input.limit > 0 ? Math.floor(input.limit) : 100000;
    const results: StoredChunk[] = [];
    for (const chunk of this.tables.chunks) {
      const source = sourcesById.get(chunk.sourceId);
      if (!source) {
        continue;
      }
      if (input?.sourceUrl && source.url !== input.sourceUrl) {
        continue;
      }
      results.push({
        chunk,
        source,
        copyrightHolder: holderNames.get(source.copyrightHolderId) ?? "",
      });
      if (results.length >= limit) {
        break;
      }
    }
    return results;
  }

  async getStatistics(): Promise<DatabaseStatistics> {
    return {
      copyright_holders: this.tables.holdersByName.size,
      sources: this.tables.sourcesByUrl.size,
      chunks: this.tables.chunks.length,
    };
  }

  async checkEmbeddings(): Promise<EmbeddingCheck> {
    const chunk = this.tables.chunks.find((item) => item.embedding.length > 0);
    if (!chunk) {
      return { hasEmbeddings: false, embeddingDimension: null, sampleText: null };
    }
    return {
      hasEmbeddings: true,
      embeddingDimension: chunk.embedding.length,
      sampleText: `${chunk.content.slice(0, 100)}...`,
    };
  }

  async close(): Promise<void> {}
}

class InMemoryIngestionSession implements IngestionSession {
  private undoLog: Array<() => void> = [];

  private savepoints: SavepointMark[] = [];

  private savepointCounter = 0;

  constructor(
    private readonly tables: MemoryTables,
    private readonly vectorDimension: number,
  ) {}

  async findCopyrightHolderId(name: string): Promise<number | null> {
    return this.tables.holdersByName.get(name)?.id ?? null;
  }

  async insertCopyrightHolder(name: string): Promise<number> {
    if (this.tables.holdersByName.has(name)) {
      throw new UniqueViolationError("copyright_holders_name_key");
    }
    const record: CopyrightHolderRecord = {
      id: this.tables.sequences.holder++,
      name,
      createdAt: new Date().toISOString(),
    };
    this.tables.holdersByName.set(name, record);
    this.undoLog.push(() => {
      this.tables.holdersByName.delete(name);
    });
    return record.id;
  }

  async findSourceId(url: string): Promise<number | null> {
    return this.tables.sourcesByUrl.get(url)?.id ?? null;
  }

  async insertSource(copyrightHolderId: number, url: string): Promise<number> {
    const holderExists = [...this.tables.holdersByName.values()].some(
      (holder) => holder.id === copyrightHolderId,
    );
    if (!holderExists) {
      throw new IngestionError(
        `insert on "sources" violates foreign key: copyright holder ${copyrightHolderId} does not exist`,
      );
    }
    if (this.tables.sourcesByUrl.has(url)) {
      throw new UniqueViolationError("sources_url_key");
    }
    const record: SourceRecord = {
      id: this.tables.sequences.source++,
      copyrightHolderId,
      url,
      createdAt: new Date().toISOString(),
    };
    this.tables.sourcesByUrl.set(url, record);
    this.undoLog.push(() => {
      this.tables.sourcesByUrl.delete(url);
    });
    return record.id;
  }

  async insertChunks(sourceId: number, chunks: EmbeddedChunk[]): Promise<void> {
    const sourceExists = [...this.tables.sourcesByUrl.values()].some(
      (source) => source.id === sourceId,
    );
    if (!sourceExists) {
      throw new IngestionError(
        `insert on "chunks" violates foreign key: source ${sourceId} does not exist`,
      );
    }
    for (const chunk of chunks) {
      if (chunk.embedding.length !== this.vectorDimension) {
        throw new IngestionError(
          `expected ${this.vectorDimension} dimensions, not ${chunk.embedding.length}`,
        );
      }
    }

    const previousLength = this.tables.chunks.length;
    const createdAt = new Date().toISOString();
    for (const chunk of chunks) {
      this.tables.chunks.push({
        id: this.tables.sequences.chunk++,
        sourceId,
        content: chunk.content,
        embedding: [...chunk.embedding],
        metadata: chunk.metadata,
        createdAt,
      });
    }
    this.undoLog.push(() => {
      this.tables.chunks.length = previousLength;
    });
  }

  async savepoint(): Promise<string> {
    this.savepointCounter += 1;
    const name = `sp_${this.savepointCounter}`;
    this.savepoints.push({ name, undoLength: this.undoLog.length });
    return name;
  }

  async rollbackToSavepoint(name: string): Promise<void> {
    const index = this.findSavepoint(name);
    this.undoTo(this.savepoints[index].undoLength);
    this.savepoints = this.savepoints.slice(0, index);
  }

  async releaseSavepoint(name: string): Promise<void> {
    const index = this.findSavepoint(name);
    this.savepoints = this.savepoints.slice(0, index);
  }

  async commit(): Promise<void> {
    this.undoLog = [];
    this.savepoints = [];
  }

  async rollback(): Promise<void> {
    this.undoTo(0);
    this.savepoints = [];
  }

  async close(): Promise<void> {
    await this.rollback();
  }

  private findSavepoint(name: string): number {
    const index = this.savepoints.findIndex((mark) => mark.name === name);
    if (index < 0) {
      throw new IngestionError(`savepoint "${name}" does not exist`);
    }
    return index;
  }

  private undoTo(length: number) {
    while (this.undoLog.length > length) {
      const undo = this.undoLog.pop();
      undo?.();
    }
  }
}
