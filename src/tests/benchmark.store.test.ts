import assert from "assert/strict";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { after, before, describe, it } from "node:test";
import { resolvePipelineConfig } from "../modules/config/config";
import { aggregate } from "../modules/evaluation/aggregate";
import { BenchmarkRecord, BenchmarkStore, buildBenchmarkRecord } from "../modules/evaluation/benchmark.store";
import { parseQuestions } from "../modules/questions/questions.loader";
import { RecordingLogger } from "./helpers/fakes";

const MODELS = { generationModel: "gemma2:2b", embeddingModel: "nomic-embed-text" };

function record(totalCount = 1): BenchmarkRecord {
  const stats = { ...aggregate([]), totalCount };
  return buildBenchmarkRecord(
    { results: [], stats },
    [{ text: "q", expectedAnswer: "a" }],
    resolvePipelineConfig(),
    MODELS,
    new Date("2024-05-01T10:00:00.000Z")
  );
}

describe("BenchmarkStore", () => {
  let dir = "";

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "benchmarks-"));
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates the history file and appends records", async () => {
    const file = path.join(dir, "nested", "history.json");
    const store = new BenchmarkStore(file);
    const first = record();
    const second = record();

    assert.equal(await store.append(first), true);
    assert.equal(await store.append(second), true);

    const history = await store.readHistory();
    assert.deepEqual(
      history.map((entry) =>
        typeof entry === "object" && entry !== null && "benchmarkId" in entry ? entry.benchmarkId : null
      ),
      [first.benchmarkId, second.benchmarkId]
    );
  });

  it("skips runs without results", async () => {
    const file = path.join(dir, "empty-run.json");
    const logger = new RecordingLogger();

    assert.equal(await new BenchmarkStore(file, logger).append(record(0)), false);
    assert.deepEqual(logger.messages("warn"), ["[Benchmark] Skipping empty run record"]);
    await assert.rejects(fs.access(file));
  });

  it("leaves a truncated history file untouched", async () => {
    const file = path.join(dir, "truncated.json");
    const content = '[{"benchmarkId":"old-1"},{"benchmarkId":"old-2"}';
    await fs.writeFile(file, content);
    const logger = new RecordingLogger();

    assert.equal(await new BenchmarkStore(file, logger).append(record()), false);
    assert.equal(await fs.readFile(file, "utf8"), content);
    const warnings = logger.messages("warn");
    assert.equal(warnings.length, 1);
    assert.ok(warnings[0].startsWith("[Benchmark] Failed to persist record: "));
  });

  it("refuses to overwrite a file that is not a JSON array", async () => {
    const file = path.join(dir, "object.json");
    await fs.writeFile(file, '{"runs":[]}');
    const logger = new RecordingLogger();
    const store = new BenchmarkStore(file, logger);

    assert.equal(await store.append(record()), false);
    assert.equal(await fs.readFile(file, "utf8"), '{"runs":[]}');
    assert.deepEqual(logger.messages("warn"), [
      `[Benchmark] Failed to persist record: ${file} does not hold a JSON array`,
    ]);
    assert.deepEqual(await store.readHistory(), []);
  });

  it("saves a question set beside the history file", async () => {
    const store = new BenchmarkStore(path.join(dir, "runs", "history.json"));
    const questions = [
      { text: "How long does a refund take?", expectedAnswer: "Thirty days." },
      { text: "Is shipping free?", expectedAnswer: 'Yes, on orders marked "free".' },
    ];

    const saved = await store.saveQuestionSet(questions, new Date("2024-05-01T10:00:00.000Z"));

    assert.equal(saved, path.join(dir, "runs", "questions_2024-05-01T10-00-00-000Z.jsonl"));
    assert.ok(saved !== null);
    assert.deepEqual(parseQuestions(await fs.readFile(saved, "utf8")), questions);
  });
});
