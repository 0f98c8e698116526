import crypto from "crypto";
import fs from "fs";
import path from "path";
import { PipelineConfig } from "../config/config";
import { errorMessage } from "../errors/errors";
import { Logger, NullLogger } from "../logging/logger";
import { formatQuestions } from "../questions/questions.loader";
import { Question } from "../rag/types";
import { AggregateStats, EvaluationRun } from "./types";

// Bumped whenever scoring or aggregation changes meaning.
export const EVALUATION_VERSION = "2.0.0";

export interface BenchmarkRecord {
  benchmarkId: string;
  timestamp: string;
  datasetHash: string;
  generationModel: string;
  embeddingModel: string;
  evaluationVersion: string;
  config: PipelineConfig;
  stats: AggregateStats;
  aborted: boolean;
  fatalError?: string;
  /** JSONL copy of a question set extracted from the corpus for this run. */
  questionSetFile?: string;
}

export interface BenchmarkModels {
  generationModel: string;
  embeddingModel: string;
}

export function datasetHash(questions: Question[]): string {
  const str = JSON.stringify(questions.map((q) => [q.text, q.expectedAnswer]));
  return crypto.createHash("sha256").update(str).digest("hex");
}

export function buildBenchmarkRecord(
  run: EvaluationRun,
  questions: Question[],
  config: PipelineConfig,
  models: BenchmarkModels,
  now: Date = new Date()
): BenchmarkRecord {
  const record: BenchmarkRecord = {
    benchmarkId: crypto.randomUUID(),
    timestamp: now.toISOString(),
    datasetHash: datasetHash(questions),
    generationModel: models.generationModel,
    embeddingModel: models.embeddingModel,
    evaluationVersion: EVALUATION_VERSION,
    config,
    stats: run.stats,
    aborted: run.fatalError !== undefined,
  };
  if (run.fatalError) record.fatalError = run.fatalError.message;
  return record;
}

/**
 * Run history kept as one JSON array on disk. History is informational:
 * write and read problems are logged, never raised.
 */
export class BenchmarkStore {
  private readonly logger: Logger;

  constructor(private readonly filePath: string, logger?: Logger) {
    this.logger = logger ?? new NullLogger();
  }

  private ensureFile() {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    if (!fs.existsSync(this.filePath)) fs.writeFileSync(this.filePath, "[]", "utf8");
  }

  private async loadHistory(): Promise<unknown[]> {
    this.ensureFile();
    const content = await fs.promises.readFile(this.filePath, "utf8");
    const parsed: unknown = JSON.parse(content || "[]");
    if (!Array.isArray(parsed)) {
      throw new Error(`${this.filePath} does not hold a JSON array`);
    }
    return parsed;
  }

  /**
   * Returns false when the record was not stored. An unreadable history
   * file is left untouched.
   */
  async append(record: BenchmarkRecord): Promise<boolean> {
    if (record.stats.totalCount === 0) {
      this.logger.warn("[Benchmark] Skipping empty run record");
      return false;
    }

    try {
      const history = await this.loadHistory();
      history.push(record);
      await fs.promises.writeFile(this.filePath, JSON.stringify(history, null, 2), "utf8");
      this.logger.info(`[Benchmark] Record persisted (ID: ${record.benchmarkId})`);
      return true;
    } catch (error) {
      this.logger.warn(`[Benchmark] Failed to persist record: ${errorMessage(error)}`);
      return false;
    }
  }

  async readHistory(): Promise<unknown[]> {
    try {
      return await this.loadHistory();
    } catch (error) {
      this.logger.warn(`[Benchmark] Failed to read history: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Writes `questions` as JSONL beside the history file so the same set can
   * be loaded again. Returns the file path, or null when nothing was written.
   */
  async saveQuestionSet(questions: Question[], now: Date = new Date()): Promise<string | null> {
    const stamp = now.toISOString().replace(/[:.]/g, "-");
    const target = path.join(path.dirname(this.filePath), `questions_${stamp}.jsonl`);
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(target, formatQuestions(questions), "utf8");
      this.logger.info(`[Benchmark] Saved ${questions.length} questions to ${target}`);
      return target;
    } catch (error) {
      this.logger.warn(`[Benchmark] Failed to save question set: ${errorMessage(error)}`);
      return null;
    }
  }
}
