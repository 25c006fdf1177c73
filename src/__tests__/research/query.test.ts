import { describe, expect, it } from "vitest";
import {
  buildResearchQuery,
  fingerprintQuery,
  normalizeQuery,
  researchCacheKey,
} from "../../research/query.js";

describe("research query helpers", () => {
  it("normalizes case and whitespace", () => {
    expect(normalizeQuery("  Fitness   Instagram\tGrowth \n")).toBe("fitness instagram growth");
  });

  it("gives equal fingerprints to queries that normalize alike", () => {
    const a = fingerprintQuery("Fitness Instagram growth");
    const b = fingerprintQuery("  fitness   instagram GROWTH ");

    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
    expect(fingerprintQuery("fitness tiktok growth")).not.toBe(a);
  });

  it("prefixes cache keys", () => {
    expect(researchCacheKey("abc")).toBe("research:abc");
  });

  it("builds the query from a complete goal context", () => {
    expect(
      buildResearchQuery({
        niche: "fitness",
        currentFollowers: 500,
        targetFollowers: 5000,
        timeframeDays: 60,
        constraints: ["no paid ads"],
        platform: "instagram",
        targetAudience: ["busy parents"],
      }),
    ).toBe("fitness instagram growth from 500 to 5000 followers in 60 days");
  });

  it("omits missing numbers", () => {
    expect(
      buildResearchQuery({ niche: "baking", constraints: [], platform: "instagram", targetAudience: [] }),
    ).toBe("baking instagram growth");
  });
});
