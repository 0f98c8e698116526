import express, { Application, NextFunction, Request, Response } from "express";
import { z } from "zod";
import { AppConfig, PipelineOverrides, pipelineOverridesSchema, resolvePipelineConfig } from "../modules/config/config";
import { loadCorpus, toDocument } from "../modules/corpus/corpus.loader";
import { EmbeddingProvider } from "../modules/embeddings/embedding.service";
import {
  BackendUnavailableError,
  ConfigError,
  NotInitializedError,
  errorMessage,
} from "../modules/errors/errors";
import { BenchmarkModels, BenchmarkStore, buildBenchmarkRecord } from "../modules/evaluation/benchmark.store";
import { GenerationClient } from "../modules/llm/ollama.service";
import { Logger } from "../modules/logging/logger";
import { extractQuestions, loadQuestions, questionRecordSchema } from "../modules/questions/questions.loader";
import { runEvaluationPipeline } from "../modules/rag/pipeline";
import { Document, Question } from "../modules/rag/types";
import { WritableVectorIndex } from "../modules/retrieval/retriever.types";
import { indexCorpus } from "../modules/vector/index_corpus";

export interface AppDependencies {
  config: AppConfig;
  embeddings: EmbeddingProvider;
  generator: GenerationClient;
  vectorIndex: WritableVectorIndex;
  benchmarks: BenchmarkStore;
  models: BenchmarkModels;
  logger: Logger;
}

const documentInputSchema = z.object({
  sourceName: z.string().trim().min(1),
  text: z.string().min(1),
});

export const evaluateBatchSchema = z.object({
  questions: z.array(questionRecordSchema).min(1).optional(),
  documents: z.array(documentInputSchema).min(1).optional(),
  config: pipelineOverridesSchema.optional(),
});

export const indexCorpusSchema = z.object({
  documents: z.array(documentInputSchema).min(1).optional(),
  config: pipelineOverridesSchema.pick({ chunkSize: true, chunkOverlap: true }).optional(),
});

export type EvaluateBatchRequest = z.infer<typeof evaluateBatchSchema>;

/**
 * Validates a request body, turning schema failures into a {@link ConfigError}.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid request body",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function statusForError(error: unknown): number {
  if (error instanceof ConfigError || error instanceof NotInitializedError) return 400;
  if (error instanceof BackendUnavailableError) return 503;
  return 500;
}

function inlineDocuments(inputs: Array<{ sourceName: string; text: string }>): Document[] {
  return inputs
    .map((input) => toDocument(input.sourceName, input.text))
    .filter((document): document is Document => document !== null);
}

export function createApp(deps: AppDependencies): Application {
  const { config, logger } = deps;
  const app: Application = express();

  app.use(express.json({ limit: "10mb" }));

  const corpusFor = async (inputs?: Array<{ sourceName: string; text: string }>) =>
    inputs
      ? inlineDocuments(inputs)
      : loadCorpus(config.corpus.dir, { encoding: config.corpus.encoding, logger });

  const questionsFor = async (
    body: EvaluateBatchRequest,
    documents: () => Promise<Document[]>
  ): Promise<{ questions: Question[]; extracted: boolean }> => {
    if (body.questions) {
      const questions = body.questions.map((record) => ({ text: record.question, expectedAnswer: record.answer }));
      return { questions, extracted: false };
    }
    if (config.questionsPath) {
      return { questions: await loadQuestions(config.questionsPath), extracted: false };
    }
    const questions = extractQuestions(await documents());
    logger.info(`[Server] Extracted ${questions.length} questions from the corpus`);
    return { questions, extracted: true };
  };

  const sendError = (res: Response, route: string, error: unknown) => {
    const status = statusForError(error);
    const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[Server] ${route} failed: ${errorMessage(error)}`);
    res.status(status).json({ success: false, error: errorMessage(error) });
  };

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      generationModel: deps.models.generationModel,
      embeddingModel: deps.models.embeddingModel,
      retrieverBackend: config.pipeline.retrieverBackend,
    });
  });

  app.post("/rag/evaluate/batch", async (req: Request, res: Response) => {
    try {
      const body = parseBody(evaluateBatchSchema, req.body);
      const pipelineConfig = resolvePipelineConfig(body.config ?? {}, config.pipeline);

      let documents: Document[] | undefined;
      const getDocuments = async () => {
        documents ??= await corpusFor(body.documents);
        return documents;
      };

      const { questions, extracted } = await questionsFor(body, getDocuments);
      if (questions.length === 0) {
        throw new ConfigError("No questions to evaluate");
      }

      const corpus = pipelineConfig.retrieverBackend === "local" ? await getDocuments() : [];
      const run = await runEvaluationPipeline(corpus, questions, pipelineConfig, {
        embeddings: deps.embeddings,
        generator: deps.generator,
        vectorIndex: deps.vectorIndex,
        logger,
      });

      const record = buildBenchmarkRecord(run, questions, run.config, deps.models);
      if (extracted) {
        const questionSetFile = await deps.benchmarks.saveQuestionSet(questions, new Date(record.timestamp));
        if (questionSetFile) record.questionSetFile = questionSetFile;
      }
      const persisted = await deps.benchmarks.append(record);
      const payload = {
        benchmarkId: persisted ? record.benchmarkId : undefined,
        config: run.config,
        stats: run.stats,
        results: run.results,
      };

      if (run.fatalError) {
        res.status(statusForError(run.fatalError)).json({
          success: false,
          error: run.fatalError.message,
          ...payload,
        });
        return;
      }

      res.json({ success: true, ...payload });
    } catch (error) {
      sendError(res, "/rag/evaluate/batch", error);
    }
  });

  app.post("/corpus/index", async (req: Request, res: Response) => {
    try {
      const body = parseBody(indexCorpusSchema, req.body);
      const overrides: PipelineOverrides = body.config ?? {};
      const pipelineConfig = resolvePipelineConfig(overrides, config.pipeline);

      const documents = await corpusFor(body.documents);
      if (documents.length === 0) {
        throw new ConfigError("No documents to index");
      }

      const summary = await indexCorpus(documents, {
        index: deps.vectorIndex,
        embeddings: deps.embeddings,
        chunkSize: pipelineConfig.chunkSize,
        chunkOverlap: pipelineConfig.chunkOverlap,
        logger,
      });
      res.json({ success: true, collection: config.chroma.collection, ...summary });
    } catch (error) {
      sendError(res, "/corpus/index", error);
    }
  });

  app.get("/benchmark/history", async (_req: Request, res: Response) => {
    const data = await deps.benchmarks.readHistory();
    res.json({ success: true, data });
  });

  // Body parser failures land here.
  app.use((error: Error, req: Request, res: Response, _next: NextFunction) => {
    sendError(res, req.path, error instanceof SyntaxError ? new ConfigError("Malformed JSON body", [], error) : error);
  });

  return app;
}
