import { describe, expect, it, vi } from "vitest";
import type { InferenceClient } from "../../inference/inference-client.js";
import { LlmError } from "../../errors.js";
import { goalMetrics, runPlaybook } from "../../strategy/playbooks.js";
import {
  HeuristicSpecialist,
  InferenceSpecialist,
  createSpecialists,
  parseProposalResponse,
  validateProposalOutput,
} from "../../strategy/specialists.js";
import type { ResearchResult } from "../../types.js";
import { completion, fitnessContext } from "../helpers.js";

function research(summaryText: string, simulated = false): ResearchResult {
  return {
    queryFingerprint: "fp",
    query: "fitness instagram growth",
    intent: "growth_research",
    insights: [
      {
        providerName: simulated ? "simulated" : "tavily",
        query: "fitness instagram growth",
        summaryText,
        confidence: 0.8,
        retrievedAt: "2026-03-01T12:00:00.000Z",
        rawPayload: {},
        simulated,
      },
    ],
    degraded: simulated,
    synthesizedSummary: `- [tavily] ${summaryText}`,
    providersSucceeded: ["tavily"],
    providersFailed: [],
    reranked: false,
    cachedAt: "2026-03-01T12:00:00.000Z",
    ttlSeconds: 600,
  };
}

const LLM_PROPOSAL = JSON.stringify({
  rationale: "Reels first.",
  recommendations: [
    {
      kind: "posting_frequency",
      subject: "reels",
      value: "daily",
      description: "Post a reel every day",
      rationale: "Reels reach non-followers.",
      parameters: { postsPerWeek: 7, formats: ["reels"] },
    },
  ],
});

describe("goalMetrics", () => {
  it("derives the daily pace and aggressiveness", () => {
    expect(goalMetrics(fitnessContext())).toEqual({
      niche: "fitness",
      currentFollowers: 500,
      targetFollowers: 5000,
      timeframeDays: 60,
      followerDelta: 4500,
      followersPerDay: 75,
      aggressive: true,
    });
  });

  it("fills gaps in an incomplete context", () => {
    const metrics = goalMetrics(fitnessContext({ niche: undefined, currentFollowers: undefined, targetFollowers: 300, timeframeDays: undefined }));

    expect(metrics).toMatchObject({ niche: "general", currentFollowers: 0, timeframeDays: 30, followersPerDay: 10, aggressive: true });
  });
});

describe("playbooks", () => {
  it("posts daily for an aggressive goal and cites research", () => {
    const proposal = runPlaybook("growth", fitnessContext(), research("Post reels daily."));

    expect(proposal.specialistName).toBe("growth");
    expect(proposal.rationale).toBe(
      "Growth focus: maximise reach and follower acquisition. Research signal: Post reels daily.",
    );
    expect(proposal.recommendations[0]).toMatchObject({
      kind: "posting_frequency",
      subject: "feed",
      value: "daily",
      parameters: { postsPerWeek: 7 },
    });
    expect(proposal.recommendations[0].rationale).toContain("about 75 new followers a day");
  });

  it("eases off for a modest goal", () => {
    const proposal = runPlaybook("growth", fitnessContext({ currentFollowers: 1000, targetFollowers: 2000 }), null);

    expect(proposal.recommendations[0].value).toBe("5x_weekly");
    expect(proposal.rationale).toBe("Growth focus: maximise reach and follower acquisition.");
  });

  it("labels simulated research as a playbook signal", () => {
    const proposal = runPlaybook("funnel", fitnessContext(), research("Reply to every comment.", true));

    expect(proposal.rationale).toBe(
      "Funnel focus: convert profile visits into followers and leads. Playbook signal: Reply to every comment.",
    );
  });

  it("suggests behind-the-scenes reels for beginners", () => {
    const proposal = runPlaybook("content", fitnessContext({ experienceLevel: "beginner" }), null);

    expect(proposal.recommendations[0]).toMatchObject({ kind: "content_theme", subject: "reels", value: "behind_the_scenes" });
  });

  it("targets the stated audience", () => {
    const proposal = runPlaybook("engagement", fitnessContext({ targetAudience: ["busy parents"] }), null);

    expect(proposal.recommendations[0].parameters).toEqual({ dailyQuota: 50, audience: ["busy parents"] });
  });
});

describe("InferenceSpecialist", () => {
  it("asks the strategy tier for JSON and validates the answer", async () => {
    const chat = vi.fn<InferenceClient["chat"]>(async () => completion(LLM_PROPOSAL, "reasoning"));
    const specialist = new InferenceSpecialist("content", { chat });

    const proposal = await specialist.propose(fitnessContext(), null, new AbortController().signal);

    expect(proposal).toEqual({
      specialistName: "content",
      rationale: "Reels first.",
      recommendations: [
        {
          kind: "posting_frequency",
          subject: "reels",
          value: "daily",
          description: "Post a reel every day",
          rationale: "Reels reach non-followers.",
          parameters: { postsPerWeek: 7, formats: ["reels"] },
        },
      ],
    });
    expect(chat).toHaveBeenCalledWith(
      expect.objectContaining({ tier: "reasoning", responseFormat: { type: "json_object" } }),
    );
  });

  it("falls back to the playbook on invalid JSON", async () => {
    const specialist = new InferenceSpecialist("growth", { chat: async () => completion("not json") });

    const proposal = await specialist.propose(fitnessContext(), null, new AbortController().signal);

    expect(proposal).toEqual(runPlaybook("growth", fitnessContext(), null));
  });

  it("falls back to the playbook when every provider fails", async () => {
    const specialist = new InferenceSpecialist("funnel", {
      chat: async () => {
        throw new LlmError("unavailable", "All providers failed for tier 'reasoning'");
      },
    });

    const proposal = await specialist.propose(fitnessContext(), null, new AbortController().signal);

    expect(proposal.recommendations.map((entry) => entry.kind)).toEqual([
      "audience_targeting",
      "direct_outreach",
      "analytics_review",
    ]);
  });

  it("propagates cancellation instead of falling back", async () => {
    const controller = new AbortController();
    controller.abort();
    const specialist = new InferenceSpecialist("growth", {
      chat: async () => {
        const error = new Error("aborted");
        error.name = "AbortError";
        throw error;
      },
    });

    await expect(specialist.propose(fitnessContext(), null, controller.signal)).rejects.toThrow("aborted");
  });
});

describe("proposal validation", () => {
  it("rejects unknown kinds", () => {
    expect(() =>
      validateProposalOutput("growth", {
        rationale: "r",
        recommendations: [{ kind: "buy_followers", subject: "s", value: "v", description: "d", rationale: "r" }],
      }),
    ).toThrow(/recommendations\[0\]\.kind must be one of posting_frequency/);
  });

  it("rejects nested parameter objects", () => {
    expect(() =>
      validateProposalOutput("growth", {
        rationale: "r",
        recommendations: [
          { kind: "engagement_like", subject: "s", value: "v", description: "d", rationale: "r", parameters: { quota: { daily: 5 } } },
        ],
      }),
    ).toThrow("recommendations[0].parameters.quota must be a number, string or string array");
  });

  it("rejects an empty recommendation list", () => {
    expect(() => validateProposalOutput("growth", { rationale: "r", recommendations: [] })).toThrow(
      "recommendations cannot be empty",
    );
  });

  it("reports empty and malformed responses", () => {
    expect(() => parseProposalResponse("  ")).toThrow("Specialist returned an empty response");
    expect(() => parseProposalResponse("{")).toThrow(/^Specialist returned invalid JSON/);
  });
});

describe("createSpecialists", () => {
  it("uses playbooks without an inference client", () => {
    const specialists = createSpecialists(["growth", "funnel"], null);

    expect(specialists.map((specialist) => specialist.id)).toEqual(["growth", "funnel"]);
    expect(specialists.every((specialist) => specialist instanceof HeuristicSpecialist)).toBe(true);
  });

  it("uses inference when a client is given", () => {
    const specialists = createSpecialists(["engagement"], { chat: async () => completion(LLM_PROPOSAL) });

    expect(specialists[0]).toBeInstanceOf(InferenceSpecialist);
  });
});
