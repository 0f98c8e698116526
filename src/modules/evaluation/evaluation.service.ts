import { errorMessage, toError } from "../errors/errors";
import { Outcome, fatal, ok, recoverable, settledValue } from "../errors/outcome";
import { GenerationClient } from "../llm/ollama.service";
import { Logger, NullLogger } from "../logging/logger";
import { buildRagPrompt } from "../rag/context.builder";
import { QueryRewriter } from "../rag/hyde.service";
import { Question, RetrievalMatch } from "../rag/types";
import { Retriever } from "../retrieval/retriever.types";
import { aggregate } from "./aggregate";
import { RandomSource, createSeededRandom, sampleWithoutReplacement } from "./sampling";
import { SimilarityScorer } from "./similarity.service";
import { EvaluationResult, EvaluationRun } from "./types";

export interface EvaluationDependencies {
  retriever: Retriever;
  rewriter: QueryRewriter;
  generator: GenerationClient;
  scorer: SimilarityScorer;
  logger?: Logger;
}

export interface EvaluationOptions {
  topK: number;
  similarityThreshold: number;
  generationTimeoutMs: number;
  randomSeed?: number;
  maxQuestions?: number;
  /** Questions evaluated at once; 1 keeps the run strictly sequential. */
  concurrency?: number;
  onResult?: (result: EvaluationResult, index: number, total: number) => void;
}

export class ConcurrencyLimiter {
  private running = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly limit: number) {}

  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.running++;
        void fn()
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.processQueue();
          });
      };

      if (this.running < this.limit) {
        start();
      } else {
        this.queue.push(start);
      }
    });
  }

  private processQueue() {
    if (this.queue.length > 0 && this.running < this.limit) {
      const start = this.queue.shift();
      if (start) start();
    }
  }
}

function preview(text: string, length = 80): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

/**
 * Drives each question through rewrite, retrieve, generate and score.
 *
 * Generation and scoring failures degrade only their own result. A
 * retrieval failure means the corpus is unreachable for every remaining
 * question, so it ends the batch; results collected so far are kept.
 */
export class EvaluationOrchestrator {
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(
    private readonly deps: EvaluationDependencies,
    private readonly options: EvaluationOptions
  ) {
    this.random =
      options.randomSeed !== undefined ? createSeededRandom(options.randomSeed) : Math.random;
    this.logger = deps.logger ?? new NullLogger();
  }

  /**
   * Down-samples to `maxQuestions` when the set is larger, in the order
   * the sampler draws them.
   */
  selectQuestions(questions: Question[]): Question[] {
    const max = this.options.maxQuestions;
    if (max === undefined || questions.length <= max) return [...questions];

    this.logger.info(`[Evaluation] Sampling ${max} of ${questions.length} questions`, {
      seed: this.options.randomSeed,
    });
    return sampleWithoutReplacement(questions, max, this.random);
  }

  async evaluateQuestion(question: Question): Promise<Outcome<EvaluationResult>> {
    const started = Date.now();

    const rewrite = await this.deps.rewriter.rewrite(question.text);
    const retrievalQuery = settledValue(rewrite);

    let matches: RetrievalMatch[];
    try {
      matches = await this.deps.retriever.retrieve(retrievalQuery, this.options.topK);
    } catch (error) {
      return fatal(toError(error));
    }

    this.logger.debug(`[Evaluation] Retrieved ${matches.length} chunks`, {
      sources: matches.map((match) => `#${match.rank} ${match.sourceName} (${match.score.toFixed(3)})`),
    });

    const base = {
      question: question.text,
      expectedAnswer: question.expectedAnswer,
      retrievalQuery,
      retrievalMatches: matches,
    };

    let generatedAnswer: string;
    try {
      generatedAnswer = await this.deps.generator.generate(
        buildRagPrompt(question.text, matches),
        this.options.generationTimeoutMs
      );
    } catch (error) {
      const cause = toError(error);
      return recoverable(cause, {
        ...base,
        generatedAnswer: `ERROR: ${cause.message}`,
        similarity: 0,
        isCorrect: false,
        elapsedMs: Date.now() - started,
        error: cause.message,
      });
    }

    const scored = await this.deps.scorer.scoreText(generatedAnswer, question.expectedAnswer);
    if (scored.status === "recoverable") {
      return recoverable(scored.cause, {
        ...base,
        generatedAnswer,
        similarity: 0,
        isCorrect: false,
        elapsedMs: Date.now() - started,
        error: scored.cause.message,
      });
    }

    return ok({
      ...base,
      generatedAnswer,
      similarity: scored.value,
      isCorrect: scored.value >= this.options.similarityThreshold,
      elapsedMs: Date.now() - started,
    });
  }

  async run(questions: Question[]): Promise<EvaluationRun> {
    const selected = this.selectQuestions(questions);
    this.logger.info(`[Evaluation] Evaluating ${selected.length} questions`, {
      topK: this.options.topK,
      threshold: this.options.similarityThreshold,
      hyde: this.deps.rewriter.enabled,
      backend: this.deps.retriever.backend,
    });

    const concurrency = this.options.concurrency ?? 1;
    const { results, fatalError } =
      concurrency > 1
        ? await this.runConcurrently(selected, concurrency)
        : await this.runSequentially(selected);

    const stats = aggregate(results);
    if (fatalError) {
      this.logger.error(
        `[Evaluation] Aborted after ${results.length}/${selected.length} questions: ${fatalError.message}`
      );
    } else {
      this.logger.info(
        `[Evaluation] Done: ${stats.correctCount}/${stats.totalCount} correct (${(stats.accuracy * 100).toFixed(1)}%)`
      );
    }

    return fatalError ? { results, stats, fatalError } : { results, stats };
  }

  private async runSequentially(
    questions: Question[]
  ): Promise<{ results: EvaluationResult[]; fatalError?: Error }> {
    const results: EvaluationResult[] = [];

    for (let index = 0; index < questions.length; index++) {
      this.logger.info(`[${index + 1}/${questions.length}] ${preview(questions[index].text)}`);
      const outcome = await this.evaluateQuestion(questions[index]);
      if (outcome.status === "fatal") {
        return { results, fatalError: outcome.cause };
      }
      this.record(settledValue(outcome), index, questions.length, outcome.status);
      results.push(settledValue(outcome));
    }

    return { results };
  }

  /**
   * Same contract as the sequential loop: input order is preserved and an
   * abort keeps only the results that precede the failing question.
   */
  private async runConcurrently(
    questions: Question[],
    concurrency: number
  ): Promise<{ results: EvaluationResult[]; fatalError?: Error }> {
    const limiter = new ConcurrencyLimiter(concurrency);
    const slots: Array<EvaluationResult | undefined> = new Array(questions.length).fill(undefined);
    const state: { abort?: { index: number; cause: Error } } = {};

    await Promise.all(
      questions.map((question, index) =>
        limiter.run(async () => {
          if (state.abort && state.abort.index < index) return;

          const outcome = await this.evaluateQuestion(question);
          if (outcome.status === "fatal") {
            if (!state.abort || index < state.abort.index) {
              state.abort = { index, cause: outcome.cause };
            }
            return;
          }
          slots[index] = settledValue(outcome);
          this.record(settledValue(outcome), index, questions.length, outcome.status);
        })
      )
    );

    const { abort } = state;
    const limit = abort ? abort.index : questions.length;
    const results = slots
      .slice(0, limit)
      .filter((result): result is EvaluationResult => result !== undefined);
    return abort ? { results, fatalError: abort.cause } : { results };
  }

  private record(
    result: EvaluationResult,
    index: number,
    total: number,
    status: "ok" | "recoverable"
  ) {
    if (status === "recoverable") {
      this.logger.warn(`  [ERROR] ${errorMessage(result.error)}`);
    } else {
      const label = result.isCorrect ? "[OK]" : "[FAIL]";
      this.logger.info(
        `  ${label} similarity ${(result.similarity * 100).toFixed(1)}% in ${result.elapsedMs}ms`
      );
    }
    this.options.onResult?.(result, index, total);
  }
}
