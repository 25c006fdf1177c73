import type { ResearchProviderSettings } from "../../config.js";
import type { FetchLike, ResearchProvider } from "../provider.js";
import { ApifyProvider } from "./apify.js";
import { SerpApiProvider } from "./serpapi.js";
import { TavilyProvider } from "./tavily.js";

export { ApifyProvider } from "./apify.js";
export { SerpApiProvider } from "./serpapi.js";
export { SimulatedProvider } from "./simulated.js";
export { TavilyProvider } from "./tavily.js";

/** Builds the enabled live providers; keys are read from the environment. */
export function createResearchProviders(
  settings: ResearchProviderSettings[],
  env: NodeJS.ProcessEnv = process.env,
  fetchImpl?: FetchLike,
): ResearchProvider[] {
  return settings
    .filter((entry) => entry.enabled)
    .map((entry) => {
      const options = {
        apiKey: env[entry.apiKeyEnvVar],
        baseUrl: entry.baseUrl,
        priority: entry.priority,
        timeoutMs: entry.timeoutMs,
        fetch: fetchImpl,
      };
      switch (entry.id) {
        case "tavily":
          return new TavilyProvider(options);
        case "serpapi":
          return new SerpApiProvider(options);
        case "apify":
          return new ApifyProvider(options);
      }
    });
}
