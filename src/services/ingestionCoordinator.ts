import {
  EmbeddingUnavailableError,
  IngestionError,
  ProvenanceInvariantViolationError,
  RowProcessingError,
  RowRollbackError,
} from "../domain/errors.js";
import { IngestionSession } from "../domain/ingestionStore.js";
import { ChunkDraft, EmbeddedChunk, QaRow } from "../domain/types.js";
import { EmbeddingService } from "../infra/ai/types.js";
import { LogSink } from "../infra/logging/logger.js";
import { Chunker } from "../pipelines/chunking.js";
import { characterLength } from "../utils/text.js";
import { ProvenanceStore } from "./provenanceStore.js";

export const QUESTION_CHUNK_METHOD = "single";

export type RowOutcome =
  | { status: "ingested"; chunkCount: number; sourceId: number }
  | { status: "failed"; chunkCount: 0; error: RowProcessingError };

export interface IngestionCoordinatorDeps {
  chunker: Chunker;
  embeddings: EmbeddingService;
  provenance: ProvenanceStore;
  logger: LogSink;
}

export class IngestionCoordinator {
  constructor(private readonly deps: IngestionCoordinatorDeps) {}

  /**
   * Ingests one row under its own savepoint, so a failure leaves none of the
   * row's records behind. Row failures come back as a `failed` outcome; a
   * provenance invariant violation or a failed savepoint rollback is rethrown.
   */
  async processRow(
    session: IngestionSession,
    row: QaRow,
    strategy: string,
  ): Promise<RowOutcome> {
    const savepoint = await session.savepoint();

    try {
      const copyrightHolderId = await this.deps.provenance.resolveCopyrightHolder(
        session,
        row.copyright,
      );
      const sourceId = await this.deps.provenance.resolveSource(
        session,
        copyrightHolderId,
        row.url,
      );

      const drafts = await this.buildChunkDrafts(row, strategy);
      const chunks = await this.embedDrafts(drafts);

      await session.insertChunks(sourceId, chunks);
      await session.releaseSavepoint(savepoint);
      return { status: "ingested", chunkCount: chunks.length, sourceId };
    } catch (error) {
      try {
        await session.rollbackToSavepoint(savepoint);
      } catch (rollbackError) {
        throw new RowRollbackError(row.url, rollbackError, error);
      }
      if (error instanceof ProvenanceInvariantViolationError) {
        throw error;
      }

      const failure = new RowProcessingError(row.url, error);
      this.deps.logger.error(
        `Error (processing row with URL: ${row.url || "unknown"}): ${failure.message}`,
      );
      return { status: "failed", chunkCount: 0, error: failure };
    }
  }

  async buildChunkDrafts(row: QaRow, strategy: string): Promise<ChunkDraft[]> {
    const drafts: ChunkDraft[] = [
      {
        content: row.question,
        metadata: {
          type: "question",
          question: row.question,
          answer: row.answer,
          chunk_info: {
            chunk_method: QUESTION_CHUNK_METHOD,
            chunk_index: 0,
            is_question: true,
          },
        },
      },
    ];

    const answerChunks = await this.deps.chunker.chunk(row.answer, strategy);
    const originalLength = characterLength(row.answer);

    answerChunks.forEach((text, i) => {
      drafts.push({
        content: text,
        metadata: {
          type: "answer",
          question: row.question,
          answer: row.answer,
          answer_chunk: text,
          chunk_info: {
            chunk_method: strategy,
            chunk_index: i + 1,
            total_answer_chunks: answerChunks.length,
            original_length: originalLength,
            is_question: false,
          },
        },
      });
    });

    return drafts;
  }

  // One provider round trip per row, question and answer chunks together.
  private async embedDrafts(drafts: ChunkDraft[]): Promise<EmbeddedChunk[]> {
    if (!this.deps.embeddings.isAvailable()) {
      throw new EmbeddingUnavailableError();
    }

    const embeddings = await this.deps.embeddings.embedBatch(
      drafts.map((draft) => draft.content),
    );
    if (embeddings.length !== drafts.length) {
      throw new IngestionError("Embedding count mismatch.");
    }

    return drafts.map((draft, index) => ({
      ...draft,
      embedding: embeddings[index],
    }));
  }
}
