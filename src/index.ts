import dotenv from "dotenv";
import { createApp } from "./server/app";
import { loadAppConfig } from "./modules/config/config";
import { OllamaEmbeddingProvider } from "./modules/embeddings/embedding.service";
import { errorMessage } from "./modules/errors/errors";
import { BenchmarkStore } from "./modules/evaluation/benchmark.store";
import { OllamaGenerationClient } from "./modules/llm/ollama.service";
import { ConsoleLogger } from "./modules/logging/logger";
import { ChromaVectorIndex } from "./modules/vector-db/chroma.service";

dotenv.config();

async function main() {
  const config = loadAppConfig();
  const logger = new ConsoleLogger(config.logLevel);

  const generator = new OllamaGenerationClient({
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.model,
  });
  if (!(await generator.checkConnection())) {
    logger.warn(`[Server] Ollama is not reachable at ${config.ollama.baseUrl}; generation will fail`);
  }

  const embeddings = await OllamaEmbeddingProvider.connect({
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.embeddingModel,
    timeoutMs: config.pipeline.embeddingTimeoutMs,
    logger,
  });

  const vectorIndex = new ChromaVectorIndex({
    ...config.chroma,
    timeoutMs: config.pipeline.retrievalTimeoutMs,
    logger,
  });

  const app = createApp({
    config,
    embeddings,
    generator,
    vectorIndex,
    benchmarks: new BenchmarkStore(config.benchmarkFile, logger),
    models: {
      generationModel: config.ollama.model,
      embeddingModel: config.ollama.embeddingModel,
    },
    logger,
  });

  app.listen(config.port, () => {
    logger.info(`Backend server is running on http://localhost:${config.port}`);
  });
}

main().catch((error: unknown) => {
  console.error(`Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
