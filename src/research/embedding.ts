/**
 * Optional semantic re-ranking. Insights are scored by blending provider
 * confidence with cosine similarity between the query and the insight text.
 */

import type { ResearchInsight } from "../types.js";

const CONFIDENCE_WEIGHT = 0.6;
const SIMILARITY_WEIGHT = 0.4;

export interface Embedder {
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** The part of the openai SDK's `embeddings` resource the embedder calls. */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string[] },
    options?: { signal?: AbortSignal },
  ): Promise<{ data: { embedding: number[]; index: number }[] }>;
}

export class OpenAiEmbedder implements Embedder {
  constructor(
    private readonly api: EmbeddingsApi,
    private readonly model: string,
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.api.create({ model: this.model, input: texts }, { signal });
    const slots: (number[] | undefined)[] = texts.map(() => undefined);
    for (const item of response.data) {
      if (item.index >= 0 && item.index < slots.length) {
        slots[item.index] = item.embedding;
      }
    }
    const vectors = slots.filter((vector): vector is number[] => vector !== undefined);
    if (vectors.length !== texts.length) {
      throw new Error(`Embedding response covered ${vectors.length} of ${texts.length} inputs`);
    }
    return vectors;
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Returns the insights ordered by blended score. Ties keep the incoming
 * order, which is already confidence then provider rank.
 */
export async function rerankInsights(
  embedder: Embedder,
  query: string,
  insights: ResearchInsight[],
  signal?: AbortSignal,
): Promise<ResearchInsight[]> {
  if (insights.length < 2) {
    return insights;
  }

  const [queryVector, ...insightVectors] = await embedder.embed(
    [query, ...insights.map((insight) => insight.summaryText)],
    signal,
  );

  return insights
    .map((insight, index) => {
      const similarity = Math.max(0, cosineSimilarity(queryVector, insightVectors[index]));
      return {
        insight,
        index,
        score: CONFIDENCE_WEIGHT * insight.confidence + SIMILARITY_WEIGHT * similarity,
      };
    })
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((entry) => entry.insight);
}
