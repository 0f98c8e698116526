import assert from "assert/strict";
import fs from "fs/promises";
import os from "os";
import path from "path";
import fetch from "node-fetch";
import { after, before, describe, it } from "node:test";
import { loadAppConfig } from "../modules/config/config";
import { BackendUnavailableError } from "../modules/errors/errors";
import { BenchmarkStore } from "../modules/evaluation/benchmark.store";
import { parseQuestions } from "../modules/questions/questions.loader";
import { createApp, statusForError } from "../server/app";
import { InMemoryVectorIndex, RecordingLogger, ScriptedGenerator, VocabularyEmbeddings } from "./helpers/fakes";
import { startServer, StubServer } from "./helpers/server";

interface ApiResponse {
  success: boolean;
  error?: string;
  benchmarkId?: string;
  config?: { topK: number; retrieverBackend: string };
  stats?: { totalCount: number; correctCount: number };
  results?: Array<{ question: string; isCorrect: boolean }>;
  collection?: string;
  documents?: number;
  chunks?: number;
  data?: Array<{
    benchmarkId: string;
    evaluationVersion: string;
    stats: { totalCount: number };
    questionSetFile?: string;
  }>;
}

const VOCABULARY = ["refund", "shipping", "thirty", "two", "days"];

const DOCUMENTS = [
  { sourceName: "refunds.md", text: "A refund takes thirty days." },
  { sourceName: "shipping.md", text: "Shipping takes two days." },
];

const QUESTIONS = [
  { question: "refund days?", answer: "refund thirty days" },
  { question: "shipping days?", answer: "refund thirty days" },
];

describe("HTTP API", () => {
  let dir = "";
  let server: StubServer;
  const vectorIndex = new InMemoryVectorIndex();
  const logger = new RecordingLogger();

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rag-app-"));
    await fs.mkdir(path.join(dir, "corpus"));
    await fs.writeFile(
      path.join(dir, "corpus", "faq.md"),
      "Q: How long does a refund take?\nA: A refund takes thirty days.\n\nQ: How long does shipping take?\nA: Shipping takes two days.\n"
    );

    const config = loadAppConfig({
      CORPUS_DIR: path.join(dir, "corpus"),
      BENCHMARK_FILE: path.join(dir, "benchmarks.json"),
      TOP_K: "2",
    });

    const app = createApp({
      config,
      embeddings: new VocabularyEmbeddings(VOCABULARY),
      // Answers from whichever passage was ranked first.
      generator: new ScriptedGenerator((prompt) =>
        prompt.includes("[Chunk 1 | refunds.md") ? "refund thirty days" : "shipping two days"
      ),
      vectorIndex,
      benchmarks: new BenchmarkStore(config.benchmarkFile, logger),
      models: { generationModel: config.ollama.model, embeddingModel: config.ollama.embeddingModel },
      logger,
    });
    server = await startServer(app);
  });

  after(async () => {
    await server.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function call(method: "GET" | "POST", route: string, body?: string | object) {
    const response = await fetch(`${server.baseUrl}${route}`, {
      method,
      headers: { "Content-Type": "application/json" },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    });
    return { status: response.status, body: (await response.json()) as ApiResponse };
  }

  it("reports health and the configured models", async () => {
    const response = await fetch(`${server.baseUrl}/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      status: "ok",
      generationModel: "gemma2:2b",
      embeddingModel: "nomic-embed-text",
      retrieverBackend: "local",
    });
  });

  it("evaluates inline questions against inline documents", async () => {
    const { status, body } = await call("POST", "/rag/evaluate/batch", {
      documents: DOCUMENTS,
      questions: QUESTIONS,
    });

    assert.equal(status, 200);
    assert.equal(body.success, true);
    assert.equal(typeof body.benchmarkId, "string");
    assert.equal(body.config?.topK, 2);
    assert.deepEqual(
      body.results?.map((result) => [result.question, result.isCorrect]),
      [
        ["refund days?", true],
        ["shipping days?", false],
      ]
    );
    assert.equal(body.stats?.totalCount, 2);
    assert.equal(body.stats?.correctCount, 1);
  });

  it("extracts questions from the corpus directory when none are sent", async () => {
    const { status, body } = await call("POST", "/rag/evaluate/batch", {});

    assert.equal(status, 200);
    assert.deepEqual(
      body.results?.map((result) => [result.question, result.isCorrect]),
      [
        ["How long does a refund take?", false],
        ["How long does shipping take?", true],
      ]
    );
    assert.ok(logger.messages("info").includes("[Server] Extracted 2 questions from the corpus"));

    const { body: history } = await call("GET", "/benchmark/history");
    const record = history.data?.find((entry) => entry.benchmarkId === body.benchmarkId);
    assert.ok(record?.questionSetFile);
    assert.equal(path.dirname(record.questionSetFile), dir);
    const saved = parseQuestions(await fs.readFile(record.questionSetFile, "utf8"));
    assert.deepEqual(
      saved.map((question) => question.text),
      ["How long does a refund take?", "How long does shipping take?"]
    );
  });

  it("applies per-request overrides", async () => {
    const { body } = await call("POST", "/rag/evaluate/batch", {
      documents: DOCUMENTS,
      questions: QUESTIONS.slice(0, 1),
      config: { topK: 1 },
    });
    assert.equal(body.config?.topK, 1);
  });

  it("rejects an invalid body", async () => {
    const { status, body } = await call("POST", "/rag/evaluate/batch", {
      questions: [{ question: "", answer: "x" }],
    });
    assert.equal(status, 400);
    assert.equal(body.success, false);
    assert.ok(body.error?.startsWith("Invalid request body"));
  });

  it("rejects unknown pipeline settings", async () => {
    const { status } = await call("POST", "/rag/evaluate/batch", {
      questions: QUESTIONS,
      config: { temperature: 0.3 },
    });
    assert.equal(status, 400);
  });

  it("rejects malformed JSON", async () => {
    const { status, body } = await call("POST", "/rag/evaluate/batch", "{not json");
    assert.equal(status, 400);
    assert.ok(body.error?.startsWith("Malformed JSON body"));
  });

  it("refuses a run without questions", async () => {
    const { status, body } = await call("POST", "/rag/evaluate/batch", {
      documents: DOCUMENTS,
    });
    assert.equal(status, 400);
    assert.equal(body.error, "No questions to evaluate");
  });

  it("indexes inline documents into the vector index", async () => {
    const { status, body } = await call("POST", "/corpus/index", { documents: DOCUMENTS });

    assert.equal(status, 200);
    assert.deepEqual(body, { success: true, collection: "rag_eval_chunks", documents: 2, chunks: 2 });
    assert.equal(vectorIndex.collectionReady, true);
  });

  it("refuses to index documents that clean to nothing", async () => {
    const { status, body } = await call("POST", "/corpus/index", {
      documents: [{ sourceName: "legal.txt", text: "Copyright 2024 Example Shop" }],
    });
    assert.equal(status, 400);
    assert.equal(body.error, "No documents to index");
  });

  it("returns partial results with 503 when the remote index fails", async () => {
    await call("POST", "/corpus/index", { documents: DOCUMENTS });
    vectorIndex.searchFailure = new BackendUnavailableError("chroma", "request failed");

    try {
      const { status, body } = await call("POST", "/rag/evaluate/batch", {
        questions: QUESTIONS,
        config: { retrieverBackend: "remote" },
      });

      assert.equal(status, 503);
      assert.equal(body.success, false);
      assert.equal(body.error, "chroma unavailable: request failed");
      assert.deepEqual(body.results, []);
      assert.equal(body.stats?.totalCount, 0);
      assert.equal(body.benchmarkId, undefined);
    } finally {
      vectorIndex.searchFailure = null;
    }
  });

  it("keeps a history of stored runs", async () => {
    const { body: run } = await call("POST", "/rag/evaluate/batch", {
      documents: DOCUMENTS,
      questions: QUESTIONS,
    });
    const { status, body } = await call("GET", "/benchmark/history");

    assert.equal(status, 200);
    assert.equal(body.success, true);
    const record = body.data?.find((entry) => entry.benchmarkId === run.benchmarkId);
    assert.ok(record);
    assert.equal(record.evaluationVersion, "2.0.0");
    assert.equal(record.stats.totalCount, 2);
    assert.equal(record.questionSetFile, undefined);
  });
});

describe("statusForError", () => {
  it("maps error kinds to HTTP statuses", () => {
    assert.equal(statusForError(new BackendUnavailableError("chroma", "down")), 503);
    assert.equal(statusForError(new Error("unexpected")), 500);
  });
});
