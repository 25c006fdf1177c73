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

export const REDDIT_ACTOR_ID = "trudax~reddit-scraper-lite";
const MAX_ITEMS = 10;
const MAX_INSIGHTS = 5;
const BASE_CONFIDENCE = 0.5;
const MAX_VOTE_BONUS = 0.3;

/**
 * Runs the Reddit scraper actor synchronously and turns the most upvoted
 * posts into success-story insights.
 */
export class ApifyProvider implements ResearchProvider {
  readonly name = "apify";
  readonly priority: number;
  readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(private readonly options: HttpProviderOptions & { actorId?: string }) {
    this.priority = options.priority;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async search(query: string, signal: AbortSignal): Promise<ResearchInsight[]> {
    const token = requireApiKey(this.name, this.options.apiKey);
    const actorId = this.options.actorId ?? REDDIT_ACTOR_ID;
    const url =
      `${this.options.baseUrl.replace(/\/$/, "")}/v2/acts/${actorId}/run-sync-get-dataset-items` +
      `?token=${encodeURIComponent(token)}`;

    const body = await fetchProviderJson(this.name, this.fetchImpl, url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        searches: [`${query} success story`],
        maxItems: MAX_ITEMS,
        sort: "top",
      }),
      signal,
    });

    if (!Array.isArray(body)) {
      return [];
    }

    const retrievedAt = this.now().toISOString();
    const posts = body
      .filter(isRecord)
      .map((item) => ({ item, votes: numberField(item, "upVotes") ?? 0 }))
      .filter(({ item }) => stringField(item, "title") !== undefined)
      .sort((a, b) => b.votes - a.votes)
      .slice(0, MAX_INSIGHTS);

    return posts.map(({ item, votes }) => {
      const title = stringField(item, "title") ?? "";
      const text = stringField(item, "body");
      return {
        providerName: this.name,
        query,
        summaryText: text ? `${title}: ${text.slice(0, 280)}` : title,
        confidence: clampConfidence(BASE_CONFIDENCE + Math.min(MAX_VOTE_BONUS, votes / 1000)),
        retrievedAt,
        rawPayload: item,
        simulated: false,
        sourceUrl: stringField(item, "url"),
      };
    });
  }
}
