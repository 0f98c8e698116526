import fetch, { FetchError, RequestInit, Response } from "node-fetch";
import { BackendUnavailableError, PipelineError } from "../errors/errors";
import { Logger, NullLogger } from "../logging/logger";
import { EmbeddingVector } from "../rag/types";
import {
  IndexHit,
  IndexRecord,
  ScoreScale,
  WritableVectorIndex,
} from "../retrieval/retriever.types";

export type ChromaDistance = "cosine" | "l2" | "ip";

export interface ChromaOptions {
  baseUrl: string;
  tenant: string;
  database: string;
  collection: string;
  distance: ChromaDistance;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Raw body of a Chroma v2 `query` call for a single query embedding.
 */
export interface ChromaQueryResponse {
  ids?: string[][];
  documents?: (string | null)[][];
  distances?: (number | null)[][];
  metadatas?: (Record<string, string | number | boolean> | null)[][];
}

export class ChromaRequestError extends PipelineError {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = "ChromaRequestError";
  }
}

const SCALE_BY_DISTANCE: Record<ChromaDistance, ScoreScale> = {
  cosine: "cosine_distance",
  l2: "l2_distance",
  ip: "inner_product_distance",
};

/**
 * Flattens the nested per-query arrays of a Chroma response into hits,
 * keeping Chroma's order. The hit source is the chunk's `sourceName`
 * metadata, falling back to its id. A missing distance becomes NaN, which
 * normalises to the lowest score.
 */
export function mapQueryResponse(data: ChromaQueryResponse): IndexHit[] {
  const ids = data.ids?.[0] ?? [];
  return ids.map((id, index) => {
    const metadata = data.metadatas?.[0]?.[index] ?? undefined;
    const sourceName = metadata?.sourceName;
    return {
      text: data.documents?.[0]?.[index] ?? "",
      source: typeof sourceName === "string" && sourceName.length > 0 ? sourceName : id,
      rawScore: data.distances?.[0]?.[index] ?? Number.NaN,
    };
  });
}

/**
 * Chroma v2 REST client scoped to one collection.
 */
export class ChromaVectorIndex implements WritableVectorIndex {
  readonly scale: ScoreScale;
  private readonly apiBase: string;
  private readonly logger: Logger;
  private collectionId: string | null = null;

  constructor(private readonly options: ChromaOptions) {
    const baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiBase = `${baseUrl}/api/v2/tenants/${options.tenant}/databases/${options.database}`;
    this.scale = SCALE_BY_DISTANCE[options.distance];
    this.logger = options.logger ?? new NullLogger();
  }

  async search(vector: EmbeddingVector, k: number, candidateHint: number): Promise<IndexHit[]> {
    if (vector.length === 0) {
      throw new ChromaRequestError("Query embedding cannot be empty");
    }

    const collectionId = await this.resolveCollectionId();
    const data = await this.request<ChromaQueryResponse>(
      `/collections/${collectionId}/query`,
      {
        method: "POST",
        body: JSON.stringify({
          query_embeddings: [vector],
          n_results: Math.max(k, candidateHint),
          include: ["documents", "distances", "metadatas"],
        }),
      }
    );

    return mapQueryResponse(data);
  }

  async count(): Promise<number> {
    const collectionId = await this.resolveCollectionId();
    return this.request<number>(`/collections/${collectionId}/count`, { method: "GET" });
  }

  /**
   * Creates the collection with the configured distance space when missing.
   */
  async ensureCollection(): Promise<void> {
    const existing = await this.findCollectionId();
    if (existing) {
      this.collectionId = existing;
      return;
    }

    const created = await this.request<{ id: string; name: string }>("/collections", {
      method: "POST",
      body: JSON.stringify({
        name: this.options.collection,
        metadata: { "hnsw:space": this.options.distance },
      }),
    });
    this.collectionId = created.id;
    this.logger.info(`[Chroma] Collection "${created.name}" created (id: ${created.id})`);
  }

  async add(records: IndexRecord[]): Promise<void> {
    if (records.length === 0) return;

    const collectionId = await this.resolveCollectionId();
    await this.request<unknown>(`/collections/${collectionId}/add`, {
      method: "POST",
      body: JSON.stringify({
        ids: records.map((record) => record.id),
        embeddings: records.map((record) => record.embedding),
        documents: records.map((record) => record.text),
        metadatas: records.map((record) => record.metadata),
      }),
    });
    this.logger.debug(`[Chroma] Added ${records.length} records to ${this.options.collection}`);
  }

  private async resolveCollectionId(): Promise<string> {
    if (this.collectionId) return this.collectionId;

    const id = await this.findCollectionId();
    if (!id) {
      throw new ChromaRequestError(`Collection "${this.options.collection}" does not exist`, 404);
    }
    this.collectionId = id;
    return id;
  }

  private async findCollectionId(): Promise<string | null> {
    const json = await this.request<unknown>("/collections", { method: "GET" });
    const collections = Array.isArray(json) ? json : collectionsOf(json);
    for (const entry of collections) {
      if (isCollectionInfo(entry) && entry.name === this.options.collection) {
        return entry.id;
      }
    }
    return null;
  }

  /**
   * Transport failures, timeouts and 5xx answers mean the index is gone:
   * those surface as {@link BackendUnavailableError}. Other non-2xx answers
   * are request errors.
   */
  private async request<T>(path: string, init: RequestInit): Promise<T> {
    let response: Response;
    try {
      response = await fetch(`${this.apiBase}${path}`, {
        ...init,
        headers: { "Content-Type": "application/json" },
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      const reason =
        error instanceof FetchError && error.type === "request-timeout"
          ? `request timed out after ${this.options.timeoutMs}ms`
          : "request failed";
      throw new BackendUnavailableError("chroma", reason, error);
    }

    if (response.status >= 500) {
      const text = await response.text();
      throw new BackendUnavailableError("chroma", `HTTP ${response.status}: ${text}`);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new ChromaRequestError(`Chroma ${path} failed (${response.status}): ${text}`, response.status);
    }

    return (await response.json()) as T;
  }
}

function isCollectionInfo(value: unknown): value is { id: string; name: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    "name" in value &&
    typeof value.id === "string" &&
    typeof value.name === "string"
  );
}

// Older servers wrap the list as { collections: [...] }.
function collectionsOf(json: unknown): unknown[] {
  if (typeof json === "object" && json !== null && "collections" in json) {
    return Array.isArray(json.collections) ? json.collections : [];
  }
  return [];
}
