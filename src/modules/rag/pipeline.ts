import { PipelineConfig, PipelineConfigInput, resolvePipelineConfig } from "../config/config";
import { EmbeddingProvider } from "../embeddings/embedding.service";
import { ConfigError } from "../errors/errors";
import { EvaluationOrchestrator } from "../evaluation/evaluation.service";
import { SimilarityScorer } from "../evaluation/similarity.service";
import { EvaluationResult, EvaluationRun } from "../evaluation/types";
import { GenerationClient } from "../llm/ollama.service";
import { Logger, NullLogger } from "../logging/logger";
import { createRetriever } from "../retrieval/retriever.factory";
import { VectorIndex } from "../retrieval/retriever.types";
import { createQueryRewriter } from "./hyde.service";
import { Document, Question } from "./types";

export interface PipelineDependencies {
  embeddings: EmbeddingProvider;
  generator: GenerationClient;
  /** Required when `retrieverBackend` is `remote`. */
  vectorIndex?: VectorIndex;
  logger?: Logger;
  /** Base settings the per-run overrides are merged onto. */
  defaults?: Partial<PipelineConfigInput>;
  onResult?: (result: EvaluationResult, index: number, total: number) => void;
}

export interface PipelineRun extends EvaluationRun {
  config: PipelineConfig;
}

/**
 * Evaluates `questions` against `documents` end to end.
 *
 * Everything that can be checked before the first question (settings,
 * embedding dimensionality, backend reachability) fails here with a
 * {@link ConfigError}; once questions are flowing, failures are reported
 * through the returned run instead.
 */
export async function runEvaluationPipeline(
  documents: Document[],
  questions: Question[],
  overrides: Partial<PipelineConfigInput>,
  deps: PipelineDependencies
): Promise<PipelineRun> {
  const logger = deps.logger ?? new NullLogger();
  const config = resolvePipelineConfig(overrides, deps.defaults);

  if (!(deps.embeddings.dimensionality > 0)) {
    throw new ConfigError(
      `Embedding provider reports ${deps.embeddings.dimensionality} dimensions`
    );
  }

  logger.info("[Pipeline] Starting evaluation", {
    documents: documents.length,
    questions: questions.length,
    backend: config.retrieverBackend,
    hyde: config.hydeEnabled,
  });

  const retriever = await createRetriever(documents, config, {
    embeddings: deps.embeddings,
    vectorIndex: deps.vectorIndex,
    logger,
  });

  const orchestrator = new EvaluationOrchestrator(
    {
      retriever,
      rewriter: createQueryRewriter(
        config.hydeEnabled,
        deps.generator,
        config.generationTimeoutMs,
        logger
      ),
      generator: deps.generator,
      scorer: new SimilarityScorer(deps.embeddings),
      logger,
    },
    {
      topK: config.topK,
      similarityThreshold: config.similarityThreshold,
      generationTimeoutMs: config.generationTimeoutMs,
      randomSeed: config.randomSeed,
      maxQuestions: config.maxQuestions,
      concurrency: config.concurrency,
      onResult: deps.onResult,
    }
  );

  const run = await orchestrator.run(questions);
  return { ...run, config };
}
