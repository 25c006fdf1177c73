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

export class SerpApiProvider implements ResearchProvider {
  readonly name = "serpapi";
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
    const params = new URLSearchParams({
      engine: "google",
      q: query,
      num: String(MAX_RESULTS),
      api_key: apiKey,
    });
    const url = `${this.options.baseUrl.replace(/\/$/, "")}/search.json?${params.toString()}`;

    const body = await fetchProviderJson(this.name, this.fetchImpl, url, { method: "GET", signal });
    if (!isRecord(body) || !Array.isArray(body.organic_results)) {
      return [];
    }

    const retrievedAt = this.now().toISOString();
    const insights: ResearchInsight[] = [];

    for (const result of body.organic_results.slice(0, MAX_RESULTS)) {
      if (!isRecord(result)) continue;

      const snippet = stringField(result, "snippet");
      if (!snippet) continue;

      const title = stringField(result, "title");
      const position = numberField(result, "position") ?? insights.length + 1;
      insights.push({
        providerName: this.name,
        query,
        summaryText: title ? `${title}: ${snippet}` : snippet,
        confidence: positionConfidence(position),
        retrievedAt,
        rawPayload: result,
        simulated: false,
        sourceUrl: stringField(result, "link"),
      });
    }

    return insights;
  }
}

// Organic rank 1 scores 0.75, each lower rank 0.05 less, floored at 0.3.
function positionConfidence(position: number): number {
  return clampConfidence(Math.max(0.3, 0.75 - 0.05 * (Math.max(1, position) - 1)));
}
