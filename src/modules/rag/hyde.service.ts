import { GenerationError } from "../errors/errors";
import { Settled, ok, recoverable } from "../errors/outcome";
import { GenerationClient } from "../llm/ollama.service";
import { Logger, NullLogger } from "../logging/logger";

export const HYDE_MAX_LENGTH = 500;

export interface QueryRewriter {
  readonly enabled: boolean;
  rewrite(question: string): Promise<Settled<string>>;
}

export function buildHydePrompt(question: string): string {
  return `Write a short passage (2-3 sentences) that answers the question below, as it would appear in a reference document.
Do not mention that the answer is hypothetical and do not ask follow-up questions.

Question: ${question}

Passage:`;
}

export class IdentityRewriter implements QueryRewriter {
  readonly enabled = false;

  async rewrite(question: string): Promise<Settled<string>> {
    return ok(question);
  }
}

/**
 * Hypothetical Document Embeddings: retrieval searches with a generated
 * answer instead of the bare question. One generation call per question;
 * on any failure the original question is used.
 */
export class HydeRewriter implements QueryRewriter {
  readonly enabled = true;

  constructor(
    private readonly generator: GenerationClient,
    private readonly timeoutMs: number,
    private readonly logger: Logger = new NullLogger()
  ) {}

  async rewrite(question: string): Promise<Settled<string>> {
    try {
      const hypothetical = (await this.generator.generate(buildHydePrompt(question), this.timeoutMs)).trim();
      if (!hypothetical) {
        throw new GenerationError("Empty hypothetical answer");
      }
      const rewritten = Array.from(hypothetical).slice(0, HYDE_MAX_LENGTH).join("");
      this.logger.debug(`[HyDE] ${rewritten.slice(0, 80)}...`);
      return ok(rewritten);
    } catch (error) {
      const cause = error instanceof Error ? error : new GenerationError(String(error));
      this.logger.warn(`[HyDE] Falling back to the original question: ${cause.message}`);
      return recoverable(cause, question);
    }
  }
}

export function createQueryRewriter(
  enabled: boolean,
  generator: GenerationClient,
  timeoutMs: number,
  logger?: Logger
): QueryRewriter {
  return enabled ? new HydeRewriter(generator, timeoutMs, logger) : new IdentityRewriter();
}
