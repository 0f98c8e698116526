import { EmbeddingProvider } from "../../modules/embeddings/embedding.service";
import { cosineSimilarity } from "../../modules/evaluation/similarity.service";
import { GenerationClient } from "../../modules/llm/ollama.service";
import { Logger, LogLevel } from "../../modules/logging/logger";
import { EmbeddingVector } from "../../modules/rag/types";
import {
  IndexHit,
  IndexRecord,
  ScoreScale,
  WritableVectorIndex,
} from "../../modules/retrieval/retriever.types";

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Bag-of-words embedding over a fixed vocabulary: component i counts the
 * occurrences of `vocabulary[i]`. Deterministic and order-independent.
 */
export class VocabularyEmbeddings implements EmbeddingProvider {
  readonly encoded: string[] = [];
  private failure: Error | null = null;

  constructor(private readonly vocabulary: string[]) {}

  get dimensionality(): number {
    return this.vocabulary.length;
  }

  /** Every later call rejects with `error`; `null` restores the provider. */
  failWith(error: Error | null) {
    this.failure = error;
  }

  vectorFor(text: string): EmbeddingVector {
    const tokens = tokenize(text);
    return this.vocabulary.map((word) => tokens.filter((token) => token === word).length);
  }

  async encode(text: string): Promise<EmbeddingVector> {
    if (this.failure) throw this.failure;
    this.encoded.push(text);
    return this.vectorFor(text);
  }

  async encodeBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (this.failure) throw this.failure;
    const vectors: EmbeddingVector[] = [];
    for (const text of texts) {
      vectors.push(await this.encode(text));
    }
    return vectors;
  }
}

export type GenerationScript = (prompt: string, call: number) => string | Error;

/**
 * Generation client answering from a script. A returned Error is thrown.
 */
export class ScriptedGenerator implements GenerationClient {
  readonly prompts: string[] = [];
  readonly timeouts: number[] = [];

  constructor(private readonly script: GenerationScript) {}

  static replying(answer: string): ScriptedGenerator {
    return new ScriptedGenerator(() => answer);
  }

  async generate(prompt: string, timeoutMs: number): Promise<string> {
    this.prompts.push(prompt);
    this.timeouts.push(timeoutMs);
    const reply = this.script(prompt, this.prompts.length);
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

/**
 * Brute-force stand-in for Chroma. Raw scores are always cosine distances;
 * `scale` only changes how the retriever reads them.
 */
export class InMemoryVectorIndex implements WritableVectorIndex {
  readonly records: IndexRecord[] = [];
  readonly searches: Array<{ k: number; candidateHint: number }> = [];
  collectionReady = false;
  searchFailure: Error | null = null;
  countFailure: Error | null = null;

  constructor(readonly scale: ScoreScale = "cosine_distance") {}

  async search(vector: EmbeddingVector, k: number, candidateHint: number): Promise<IndexHit[]> {
    this.searches.push({ k, candidateHint });
    if (this.searchFailure) throw this.searchFailure;

    return this.records
      .map((record) => ({
        text: record.text,
        source: typeof record.metadata.sourceName === "string" ? record.metadata.sourceName : record.id,
        rawScore: 1 - cosineSimilarity(vector, record.embedding),
      }))
      .sort((a, b) => a.rawScore - b.rawScore)
      .slice(0, Math.max(k, candidateHint));
  }

  async count(): Promise<number> {
    if (this.countFailure) throw this.countFailure;
    return this.records.length;
  }

  async ensureCollection(): Promise<void> {
    this.collectionReady = true;
  }

  async add(records: IndexRecord[]): Promise<void> {
    this.records.push(...records);
  }
}

export class RecordingLogger implements Logger {
  readonly entries: Array<{ level: LogLevel; message: string }> = [];

  debug(message: string) {
    this.entries.push({ level: "debug", message });
  }

  info(message: string) {
    this.entries.push({ level: "info", message });
  }

  warn(message: string) {
    this.entries.push({ level: "warn", message });
  }

  error(message: string) {
    this.entries.push({ level: "error", message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
