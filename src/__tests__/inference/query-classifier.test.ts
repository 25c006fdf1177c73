import { describe, expect, it, vi } from "vitest";
import {
  KeywordQueryClassifier,
  LlmQueryClassifier,
  classifyByKeywords,
  tierForIntent,
  ttlForIntent,
} from "../../inference/query-classifier.js";
import type { InferenceClient } from "../../inference/inference-client.js";
import { LlmError } from "../../errors.js";
import { completion } from "../helpers.js";

function fakeClient(chat: InferenceClient["chat"]): InferenceClient {
  return { chat: vi.fn(chat) };
}

describe("classifyByKeywords", () => {
  it.each([
    ["How do my competitors get so many likes?", "competitor_analysis"],
    ["compare me vs @fitcoach", "competitor_analysis"],
    ["fitness instagram growth from 500 to 5000 followers in 60 days", "growth_research"],
    ["which hashtags are trending", "growth_research"],
    ["build me a content calendar", "strategy"],
    ["hello there", "simple_chat"],
    ["   ", "simple_chat"],
    ["what time is it in Lisbon", "general"],
  ])("classifies %j as %s", (query, intent) => {
    expect(classifyByKeywords(query)).toBe(intent);
  });

  it("KeywordQueryClassifier delegates to the keyword rules", async () => {
    await expect(new KeywordQueryClassifier().classify("my posting plan")).resolves.toBe("strategy");
  });
});

describe("ttlForIntent / tierForIntent", () => {
  it("maps intents to cache lifetimes in seconds", () => {
    expect(ttlForIntent("growth_research")).toBe(600);
    expect(ttlForIntent("competitor_analysis")).toBe(1800);
    expect(ttlForIntent("strategy")).toBe(3600);
    expect(ttlForIntent("simple_chat")).toBe(86400);
    expect(ttlForIntent("general")).toBe(3600);
  });

  it("routes heavy intents to the reasoning tier", () => {
    expect(tierForIntent("competitor_analysis")).toBe("reasoning");
    expect(tierForIntent("strategy")).toBe("reasoning");
    expect(tierForIntent("growth_research")).toBe("fast");
    expect(tierForIntent("simple_chat")).toBe("cheap");
  });
});

describe("LlmQueryClassifier", () => {
  it("returns the model's label when it is in the closed set", async () => {
    const client = fakeClient(async () => completion(" Competitor_Analysis.\n"));
    const classifier = new LlmQueryClassifier(client);

    await expect(classifier.classify("who is winning in my niche")).resolves.toBe("competitor_analysis");
    expect(client.chat).toHaveBeenCalledWith(
      expect.objectContaining({ tier: "cheap", temperature: 0, maxTokens: 10 }),
    );
  });

  it("falls back to keywords on an unknown label", async () => {
    const classifier = new LlmQueryClassifier(fakeClient(async () => completion("marketing")));

    await expect(classifier.classify("grow my followers")).resolves.toBe("growth_research");
  });

  it("falls back to keywords when the model call fails", async () => {
    const classifier = new LlmQueryClassifier(
      fakeClient(async () => {
        throw new LlmError("unavailable", "All providers failed for tier 'cheap'");
      }),
    );

    await expect(classifier.classify("thanks!")).resolves.toBe("simple_chat");
  });

  it("propagates cancellation instead of falling back", async () => {
    const controller = new AbortController();
    const classifier = new LlmQueryClassifier(
      fakeClient(async () => {
        controller.abort();
        throw new Error("aborted");
      }),
    );

    await expect(classifier.classify("grow my followers", controller.signal)).rejects.toThrow("aborted");
  });
});
