import { RetrievalMatch } from "./types";

function formatRelevance(score: number): string {
  return `${Math.round(score * 100)}%`;
}

/**
 * Context block handed to the generator, best match first.
 */
export function buildContext(matches: RetrievalMatch[]): string {
  return [...matches]
    .sort((a, b) => a.rank - b.rank)
    .map(
      (match) =>
        `[Chunk ${match.rank} | ${match.sourceName} | Relevance ${formatRelevance(match.score)}]\n${match.chunkText}`
    )
    .join("\n\n");
}

export function buildRagPrompt(question: string, matches: RetrievalMatch[]): string {
  if (matches.length === 0) {
    return `No reference documents were found for this question. Answer briefly from general knowledge, or reply exactly "I cannot find this information in the provided documents." if you do not know.

Question:
${question}

Answer:`;
  }

  return `You are an assistant that answers questions using only the provided documentation.

Rules:
- Use ONLY the information in the context below.
- Answer briefly and precisely (1-3 sentences).
- Copy exact numbers, amounts and formulas from the context.
- Prefer chunks with higher relevance.
- Do not use markdown formatting.
- If the context does not contain the answer, reply exactly: "I cannot find this information in the provided documents."

Context:
${buildContext(matches)}

Question:
${question}

Answer:`;
}
