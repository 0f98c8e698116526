import assert from "assert/strict";
import { after, before, beforeEach, describe, it } from "node:test";
import {
  EmbeddingRequestError,
  OllamaEmbeddingProvider,
} from "../modules/embeddings/embedding.service";
import { ConfigError, GenerationError } from "../modules/errors/errors";
import { cleanGeneratedText, OllamaGenerationClient } from "../modules/llm/ollama.service";
import { jsonApp, startServer, StubServer } from "./helpers/server";

type GenerateMode = "answer" | "blank" | "missing-model" | "slow" | "broken";

interface OllamaStubState {
  generateMode: GenerateMode;
  answer: string;
  generateBodies: unknown[];
  embeddingPrompts: string[];
  // Dimensions returned for every embedding after the first request.
  laterDimensions: number | null;
  firstDimensions: number;
}

function freshState(): OllamaStubState {
  return {
    generateMode: "answer",
    answer: "Thirty days",
    generateBodies: [],
    embeddingPrompts: [],
    laterDimensions: null,
    firstDimensions: 3,
  };
}

async function startOllamaStub(state: OllamaStubState): Promise<StubServer> {
  const app = jsonApp();

  app.get("/api/tags", (_req, res) => {
    res.json({ models: [{ name: "gemma2:2b" }] });
  });

  app.post("/api/generate", (req, res) => {
    state.generateBodies.push(req.body);
    switch (state.generateMode) {
      case "answer":
        res.json({ response: state.answer, done: true });
        return;
      case "blank":
        res.json({ response: "  \n", done: true });
        return;
      case "missing-model":
        res.status(404).send("model not found");
        return;
      case "slow":
        setTimeout(() => res.json({ response: "late", done: true }), 150);
        return;
      case "broken":
        res.status(500).send("out of memory");
        return;
    }
  });

  app.post("/api/embeddings", (req, res) => {
    const prompt = typeof req.body?.prompt === "string" ? req.body.prompt : "";
    const dimensions =
      state.embeddingPrompts.length === 0 || state.laterDimensions === null
        ? state.firstDimensions
        : state.laterDimensions;
    state.embeddingPrompts.push(prompt);
    const embedding = Array.from({ length: dimensions }, (_value, index) =>
      index === 0 ? prompt.length : index
    );
    res.json({ embedding });
  });

  return startServer(app);
}

describe("OllamaGenerationClient", () => {
  const state = freshState();
  let stub: StubServer;

  before(async () => {
    stub = await startOllamaStub(state);
  });

  beforeEach(() => {
    Object.assign(state, freshState());
  });

  after(async () => {
    await stub.close();
  });

  function client(): OllamaGenerationClient {
    return new OllamaGenerationClient({ baseUrl: `${stub.baseUrl}/`, model: "gemma2:2b" });
  }

  it("posts a non-streaming request and cleans the reply", async () => {
    state.answer = "**Answer:** Thirty days\n";
    const answer = await client().generate("How long?", 1_000);

    assert.equal(answer, "Thirty days");
    assert.equal(state.generateBodies.length, 1);
    assert.deepEqual(state.generateBodies[0], {
      model: "gemma2:2b",
      prompt: "How long?",
      stream: false,
      options: {
        temperature: 0.1,
        top_p: 0.9,
        top_k: 40,
        num_predict: 200,
        repeat_penalty: 1.1,
      },
    });
  });

  it("rejects an empty reply", async () => {
    state.generateMode = "blank";
    await assert.rejects(client().generate("q", 1_000), {
      name: "GenerationError",
      message: "Ollama returned an empty response.",
    });
  });

  it("names a missing model", async () => {
    state.generateMode = "missing-model";
    await assert.rejects(client().generate("q", 1_000), {
      name: "GenerationError",
      message: 'Ollama model "gemma2:2b" not found: model not found',
    });
  });

  it("reports other HTTP failures with their status", async () => {
    state.generateMode = "broken";
    await assert.rejects(client().generate("q", 1_000), {
      message: "Ollama error (500): out of memory",
    });
  });

  it("times out a slow reply", async () => {
    state.generateMode = "slow";
    await assert.rejects(client().generate("q", 20), (error: unknown) => {
      assert.ok(error instanceof GenerationError);
      assert.ok(error.message.startsWith("Ollama timed out after 20ms"));
      return true;
    });
  });

  it("checks the connection through the tags endpoint", async () => {
    assert.equal(await client().checkConnection(), true);

    const closed = await startServer(jsonApp());
    await closed.close();
    const offline = new OllamaGenerationClient({ baseUrl: closed.baseUrl, model: "gemma2:2b" });
    assert.equal(await offline.checkConnection(), false);
  });
});

describe("OllamaEmbeddingProvider", () => {
  const state = freshState();
  let stub: StubServer;

  before(async () => {
    stub = await startOllamaStub(state);
  });

  beforeEach(() => {
    Object.assign(state, freshState());
  });

  after(async () => {
    await stub.close();
  });

  function connect(batchSize?: number): Promise<OllamaEmbeddingProvider> {
    return OllamaEmbeddingProvider.connect({
      baseUrl: stub.baseUrl,
      model: "nomic-embed-text",
      timeoutMs: 1_000,
      batchSize,
    });
  }

  it("learns the dimensionality from a probe", async () => {
    const provider = await connect();
    assert.equal(provider.dimensionality, 3);
    assert.deepEqual(state.embeddingPrompts, ["dimension probe"]);
  });

  it("encodes single texts and batches in order", async () => {
    const provider = await connect(2);

    assert.deepEqual(await provider.encode("abcd"), [4, 1, 2]);
    assert.deepEqual(await provider.encodeBatch(["a", "bb", "ccc"]), [
      [1, 1, 2],
      [2, 1, 2],
      [3, 1, 2],
    ]);
  });

  it("rejects vectors whose size changed", async () => {
    state.laterDimensions = 2;
    const provider = await connect();

    await assert.rejects(provider.encode("text"), (error: unknown) => {
      assert.ok(error instanceof EmbeddingRequestError);
      assert.equal(error.message, "Expected 3 dimensions, received 2");
      return true;
    });
  });

  it("rejects blank text without a request", async () => {
    const provider = await connect();
    await assert.rejects(provider.encode("   "), EmbeddingRequestError);
    assert.equal(state.embeddingPrompts.length, 1);
  });

  it("refuses a model that returns empty vectors", async () => {
    state.firstDimensions = 0;
    await assert.rejects(connect(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.message, 'Embedding model "nomic-embed-text" returned zero-dimension vectors');
      return true;
    });
  });

  it("refuses an unreachable server", async () => {
    const closed = await startServer(jsonApp());
    await closed.close();
    await assert.rejects(
      OllamaEmbeddingProvider.connect({ baseUrl: closed.baseUrl, model: "nomic-embed-text", timeoutMs: 500 }),
      ConfigError
    );
  });
});

describe("cleanGeneratedText", () => {
  it("drops emphasis, list markers and headings", () => {
    assert.equal(cleanGeneratedText("## Summary\n1. **First**\n- *Second*\n• Third"), "Summary\nFirst\nSecond\nThird");
  });

  it("drops a leading answer label", () => {
    assert.equal(cleanGeneratedText("Short answer: two days"), "two days");
    assert.equal(cleanGeneratedText("  plain  "), "plain");
  });
});
