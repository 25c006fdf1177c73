import {
  clampConfidence,
  fetchProviderJson,
  isRecord,
  numberField,
  requireApiKey,
  stringField,
  type FetchLike,
  type HttpProviderOptions,
  type ResearchProvider,
} from "../provider.js";
import type { ResearchInsight } from "../../types.js";

const MAX_RESULTS = 5;
const DEFAULT_CONFIDENCE = 0.6;
const ANSWER_CONFIDENCE = 0.7;

/** Tavily web search: one insight per result, plus the synthesized answer when present. */
export class TavilyProvider implements ResearchProvider {
  readonly name = "tavily";
  readonly priority: number;
  readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: HttpProviderOptions) {
    this.priority = options.priority;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async search(query: string, signal: AbortSignal): Promise<ResearchInsight[]> {
    const apiKey = requireApiKey(this.name, this.options.apiKey);
    const url = `${this.options.baseUrl.replace(/\/$/, "")}/search`;

    const body = await fetchProviderJson(this.name, this.fetchImpl, url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        api_key: apiKey,
        query,
        max_results: MAX_RESULTS,
        search_depth: "basic",
        include_answer: true,
      }),
      signal,
    });

    return this.toInsights(query, body);
  }

  private toInsights(query: string, body: unknown): ResearchInsight[] {
    if (!isRecord(body)) {
      return [];
    }

    const retrievedAt = this.now().toISOString();
    const insights: ResearchInsight[] = [];

    const answer = stringField(body, "answer");
    if (answer) {
      insights.push({
        providerName: this.name,
        query,
        summaryText: answer,
        confidence: ANSWER_CONFIDENCE,
        retrievedAt,
        rawPayload: { answer },
        simulated: false,
      });
    }

    const results = Array.isArray(body.results) ? body.results : [];
    for (const result of results.slice(0, MAX_RESULTS)) {
      if (!isRecord(result)) continue;

      const title = stringField(result, "title");
      const content = stringField(result, "content");
      if (!title && !content) continue;

      insights.push({
        providerName: this.name,
        query,
        summaryText: title && content ? `${title}: ${content}` : (title ?? content ?? ""),
        confidence: clampConfidence(numberField(result, "score") ?? DEFAULT_CONFIDENCE),
        retrievedAt,
        rawPayload: result,
        simulated: false,
        sourceUrl: stringField(result, "url"),
      });
    }

    return insights;
  }
}
