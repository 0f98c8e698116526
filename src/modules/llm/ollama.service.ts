import fetch, { FetchError, Response } from "node-fetch";
import { GenerationError } from "../errors/errors";

/**
 * Answers a prompt. Rejects on timeout, transport errors or an unusable reply.
 */
export interface GenerationClient {
  generate(prompt: string, timeoutMs: number): Promise<string>;
}

export interface OllamaGenerationOptions {
  baseUrl: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

const CONNECTION_CHECK_TIMEOUT_MS = 5_000;

/**
 * Removes the markdown a chat model tends to add around a short answer.
 */
export function cleanGeneratedText(text: string): string {
  return text
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/\*([^*]+)\*/g, "$1")
    .replace(/^#{1,6}\s+/gm, "")
    .replace(/^\d+\.\s+/gm, "")
    .replace(/^[-•]\s+/gm, "")
    .replace(/^(answer|short answer):\s*/i, "")
    .trim();
}

export class OllamaGenerationClient implements GenerationClient {
  private readonly baseUrl: string;

  constructor(private readonly options: OllamaGenerationOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  get model(): string {
    return this.options.model;
  }

  /**
   * True when the server answers `/api/tags`; used once at start-up.
   */
  async checkConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        timeout: CONNECTION_CHECK_TIMEOUT_MS,
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  async generate(prompt: string, timeoutMs: number): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/generate`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.model,
          prompt,
          stream: false,
          options: {
            temperature: this.options.temperature ?? 0.1,
            top_p: 0.9,
            top_k: 40,
            num_predict: this.options.maxTokens ?? 200,
            repeat_penalty: 1.1,
          },
        }),
        timeout: timeoutMs,
      });
    } catch (error) {
      if (error instanceof FetchError && error.type === "request-timeout") {
        throw new GenerationError(`Ollama timed out after ${timeoutMs}ms`, error);
      }
      throw new GenerationError("Ollama request failed", error);
    }

    if (!response.ok) {
      const text = await response.text();
      if (response.status === 404) {
        throw new GenerationError(`Ollama model "${this.options.model}" not found: ${text}`);
      }
      throw new GenerationError(`Ollama error (${response.status}): ${text}`);
    }

    const data = (await response.json()) as { response?: unknown };
    const answer =
      typeof data.response === "string" ? cleanGeneratedText(data.response) : "";

    if (!answer) {
      throw new GenerationError("Ollama returned an empty response.");
    }

    return answer;
  }
}
