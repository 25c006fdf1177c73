import type { ResearchInsight } from "../../types.js";
import type { ResearchProvider } from "../provider.js";

const PLAYBOOK: { text: string; confidence: number }[] = [
  {
    text: "Creators in this space report steady follower growth from daily short-form video plus replying to every comment in the first hour.",
    confidence: 0.45,
  },
  {
    text: "Posting four to five times a week with a mix of mid-size and niche hashtags keeps reach stable without triggering spam limits.",
    confidence: 0.4,
  },
  {
    text: "Engaging with accounts that follow similar creators converts better than broad follow campaigns.",
    confidence: 0.35,
  },
];

/**
 * Deterministic stand-in used when too few live providers answered. Its
 * insights are marked simulated so no caller mistakes them for research.
 */
export class SimulatedProvider implements ResearchProvider {
  readonly name = "simulated";
  readonly priority = Number.MAX_SAFE_INTEGER;
  readonly timeoutMs = 1_000;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async search(query: string): Promise<ResearchInsight[]> {
    const retrievedAt = this.now().toISOString();
    return PLAYBOOK.map((entry, index) => ({
      providerName: this.name,
      query,
      summaryText: entry.text,
      confidence: entry.confidence,
      retrievedAt,
      rawPayload: { playbookEntry: index },
      simulated: true,
    }));
  }
}
