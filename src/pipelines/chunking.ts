import {
  RecursiveCharacterTextSplitter,
  TextSplitter,
  type TextSplitterParams,
} from "@langchain/textsplitters";
import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import { IngestionError } from "../domain/errors.js";
import { normalizeText } from "../utils/text.js";

export const DEFAULT_CHUNK_STRATEGY = "recursive";

export interface ChunkSplitter {
  splitText(text: string): Promise<string[]>;
}

export interface TiktokenTextSplitterParams extends TextSplitterParams {
  encodingName: TiktokenEncoding;
}

/**
 * Sliding window over tiktoken ids. Ranks ship with js-tiktoken, so nothing is
 * fetched at split time.
 */
export class TiktokenTextSplitter extends TextSplitter {
  encodingName: TiktokenEncoding;

  private tokenizer: Tiktoken | null = null;

  constructor(fields?: Partial<TiktokenTextSplitterParams>) {
    super(fields);
    this.encodingName = fields?.encodingName ?? "cl100k_base";
  }

  async splitText(text: string): Promise<string[]> {
    const tokenizer = this.getTokenizer();
    const ids = tokenizer.encode(text);
    const step = this.chunkSize - this.chunkOverlap;
    const splits: string[] = [];

    for (let start = 0; start < ids.length; start += step) {
      const end = Math.min(start + this.chunkSize, ids.length);
      splits.push(tokenizer.decode(ids.slice(start, end)));
      if (end >= ids.length) {
        break;
      }
    }

    return splits;
  }

  private getTokenizer(): Tiktoken {
    if (!this.tokenizer) {
      this.tokenizer = getEncoding(this.encodingName);
    }
    return this.tokenizer;
  }
}

function createDefaultSplitters(): Array<[string, ChunkSplitter]> {
  return [
    [
      "recursive",
      new RecursiveCharacterTextSplitter({
        chunkSize: 500,
        chunkOverlap: 50,
        separators: ["\n\n", "\n", "。", ".", " ", ""],
      }),
    ],
    ["token", new TiktokenTextSplitter({ chunkSize: 400, chunkOverlap: 40 })],
    // Line-based; a line longer than the chunk size is cut by character.
    [
      "character",
      new RecursiveCharacterTextSplitter({
        chunkSize: 600,
        chunkOverlap: 60,
        separators: ["\n", ""],
      }),
    ],
  ];
}

export class Chunker {
  private readonly splitters = new Map<string, ChunkSplitter>(createDefaultSplitters());

  /** Unknown strategy names fall back to DEFAULT_CHUNK_STRATEGY. */
  async chunk(text: string, strategy: string = DEFAULT_CHUNK_STRATEGY): Promise<string[]> {
    const normalized = normalizeText(text);
    if (!normalized) {
      return [];
    }
    return this.getSplitter(strategy).splitText(normalized);
  }

  resolveStrategy(strategy: string): string {
    return this.splitters.has(strategy) ? strategy : DEFAULT_CHUNK_STRATEGY;
  }

  listStrategies(): string[] {
    return [...this.splitters.keys()];
  }

  register(name: string, splitter: ChunkSplitter): void {
    if (this.splitters.has(name)) {
      throw new IngestionError(`Chunk strategy "${name}" is already registered.`);
    }
    this.splitters.set(name, splitter);
  }

  private getSplitter(strategy: string): ChunkSplitter {
    const splitter = this.splitters.get(this.resolveStrategy(strategy));
    if (!splitter) {
      throw new IngestionError(`No splitter registered for "${strategy}".`);
    }
    return splitter;
  }
}
