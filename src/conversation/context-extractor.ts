/**
 * Goal context extraction
 *
 * Pulls niche, follower counts, timeframe, experience level, audience and
 * constraints out of free text. Parsed values only fill the context; a
 * caller's structured context is merged last and wins.
 */

import type { ExperienceLevel, GoalContext } from "../types.js";

export type ContextField = "niche" | "currentFollowers" | "targetFollowers" | "timeframeDays";

export type ContextUpdate = Partial<GoalContext>;

const NICHE_KEYWORDS: ReadonlyArray<[string, readonly string[]]> = [
  ["fitness", ["fitness", "workout", "gym", "personal trainer", "bodybuilding"]],
  ["nutrition", ["nutrition", "diet", "meal prep", "nutritionist"]],
  ["wellness", ["wellness", "mindfulness", "meditation", "yoga", "breathwork"]],
  ["beauty", ["beauty", "makeup", "skincare"]],
  ["fashion", ["fashion", "outfit", "streetwear", "clothing"]],
  ["food", ["food", "recipe", "cooking", "baking"]],
  ["travel", ["travel", "backpacking", "wanderlust"]],
  ["tech", ["tech", "software", "coding", "programming"]],
  ["photography", ["photography", "photographer"]],
  ["business", ["business", "entrepreneur", "startup", "consulting", "marketing"]],
];

const AUDIENCE_KEYWORDS: ReadonlyArray<[string, readonly string[]]> = [
  ["entrepreneurs", ["entrepreneurs", "founders", "business owners"]],
  ["fitness enthusiasts", ["fitness enthusiasts", "gym-goers", "athletes", "bodybuilders"]],
  ["professionals", ["professionals", "executives", "managers"]],
  ["students", ["students", "graduates"]],
  ["parents", ["parents", "moms", "dads"]],
  ["gen z", ["gen z", "teens"]],
];

const PLATFORMS = ["instagram", "tiktok", "youtube", "linkedin"] as const;

const BEGINNER_CUES = ["new to", "just started", "beginner", "starting out", "getting started", "never done"];
const ADVANCED_CUES = ["advanced", "expert", "experienced", "established", "scale", "scaling"];

const NUMBER = String.raw`(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)\s*(?:(k|m)\b)?`;
const RANGE_PATTERN = new RegExp(String.raw`\bfrom\s+${NUMBER}\s*(?:followers?\s+)?to\s+${NUMBER}`, "i");
const CURRENT_PATTERN = new RegExp(
  String.raw`\b(?:have|having|at|with|currently|got)\s+(?:about\s+|around\s+|only\s+|just\s+)?${NUMBER}\s*followers?\b`,
  "i",
);
const TARGET_PATTERN = new RegExp(
  String.raw`\b(?:reach|grow to|get to|hit|want|goal of|target of)\s+(?:about\s+|around\s+)?${NUMBER}\s*(followers?\b)?`,
  "i",
);
const BARE_PATTERN = new RegExp(String.raw`${NUMBER}\s*followers?\b`, "gi");
const TIMEFRAME_PATTERN =
  /\b(?:in|within|over|next|for)\s+(?:the\s+next\s+)?(\d+|an?|one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve)\s*(day|week|month|year)s?\b/i;
const CONSTRAINT_PATTERN =
  /\b(?:no|without|avoid(?:ing)?)\s+(paid ads|ads|giveaways|dms|direct messages|bots|weekend posting)\b/gi;

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

const DAYS_PER_UNIT: Record<string, number> = {
  day: 1,
  week: 7,
  month: 30,
  year: 365,
};

export function extractContext(message: string): ContextUpdate {
  const text = message.toLowerCase();
  const update: ContextUpdate = {};

  const niche = matchTable(text, NICHE_KEYWORDS)[0];
  if (niche) {
    update.niche = niche;
  }

  Object.assign(update, extractFollowers(text));

  const timeframeDays = extractTimeframeDays(text);
  if (timeframeDays !== undefined) {
    update.timeframeDays = timeframeDays;
  }

  const experienceLevel = extractExperience(text);
  if (experienceLevel) {
    update.experienceLevel = experienceLevel;
  }

  const audience = matchTable(text, AUDIENCE_KEYWORDS);
  if (audience.length > 0) {
    update.targetAudience = audience;
  }

  const platform = PLATFORMS.find((candidate) => containsWord(text, candidate));
  if (platform) {
    update.platform = platform;
  }

  const constraints = [...text.matchAll(CONSTRAINT_PATTERN)].map((match) => `no ${match[1]}`);
  if (constraints.length > 0) {
    update.constraints = [...new Set(constraints)];
  }

  return update;
}

export function extractFollowers(text: string): Pick<ContextUpdate, "currentFollowers" | "targetFollowers"> {
  const range = RANGE_PATTERN.exec(text);
  if (range) {
    return {
      currentFollowers: parseCount(range[1], range[2]),
      targetFollowers: parseCount(range[3], range[4]),
    };
  }

  let currentFollowers: number | undefined;
  let targetFollowers: number | undefined;

  const current = CURRENT_PATTERN.exec(text);
  if (current) {
    currentFollowers = parseCount(current[1], current[2]);
  }

  // "want 5 tips" is not a goal: a target needs a k/m suffix or the word followers.
  const target = TARGET_PATTERN.exec(text);
  if (target && (target[2] || target[3])) {
    targetFollowers = parseCount(target[1], target[2]);
  }

  for (const bare of text.matchAll(BARE_PATTERN)) {
    const value = parseCount(bare[1], bare[2]);
    if (value === currentFollowers || value === targetFollowers) {
      continue;
    }
    if (currentFollowers === undefined && targetFollowers === undefined) {
      currentFollowers = value;
    } else if (targetFollowers === undefined && currentFollowers !== undefined && value > currentFollowers) {
      targetFollowers = value;
    } else if (currentFollowers === undefined && targetFollowers !== undefined && value < targetFollowers) {
      currentFollowers = value;
    }
  }

  const result: Pick<ContextUpdate, "currentFollowers" | "targetFollowers"> = {};
  if (currentFollowers !== undefined) {
    result.currentFollowers = currentFollowers;
  }
  if (targetFollowers !== undefined) {
    result.targetFollowers = targetFollowers;
  }
  return result;
}

export function extractTimeframeDays(text: string): number | undefined {
  const match = TIMEFRAME_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const amountText = match[1].toLowerCase();
  const amount = NUMBER_WORDS[amountText] ?? Number.parseInt(amountText, 10);
  const days = amount * DAYS_PER_UNIT[match[2].toLowerCase()];
  return days > 0 ? days : undefined;
}

export function extractExperience(text: string): ExperienceLevel | undefined {
  if (containsWord(text, "intermediate")) {
    return "intermediate";
  }
  const beginner = BEGINNER_CUES.filter((cue) => containsWord(text, cue)).length;
  const advanced = ADVANCED_CUES.filter((cue) => containsWord(text, cue)).length;
  if (beginner === 0 && advanced === 0) {
    return undefined;
  }
  if (beginner > advanced) {
    return "beginner";
  }
  return advanced > beginner ? "advanced" : "intermediate";
}

/**
 * Later updates override scalar fields. List fields accumulate without
 * duplicates.
 */
export function mergeContext(base: GoalContext, ...updates: ContextUpdate[]): GoalContext {
  const merged: GoalContext = { ...base, constraints: [...base.constraints], targetAudience: [...base.targetAudience] };
  for (const update of updates) {
    if (update.niche !== undefined) merged.niche = update.niche;
    if (update.currentFollowers !== undefined) merged.currentFollowers = update.currentFollowers;
    if (update.targetFollowers !== undefined) merged.targetFollowers = update.targetFollowers;
    if (update.timeframeDays !== undefined) merged.timeframeDays = update.timeframeDays;
    if (update.platform !== undefined) merged.platform = update.platform;
    if (update.experienceLevel !== undefined) merged.experienceLevel = update.experienceLevel;
    merged.constraints = union(merged.constraints, update.constraints);
    merged.targetAudience = union(merged.targetAudience, update.targetAudience);
  }
  return merged;
}

/** Fields still needed before research can start, in asking order. */
export function missingContextFields(context: GoalContext): ContextField[] {
  const missing: ContextField[] = [];
  if (!context.niche) {
    missing.push("niche");
  }
  if (!isCount(context.currentFollowers)) {
    missing.push("currentFollowers");
  }
  if (!isCount(context.targetFollowers)) {
    missing.push("targetFollowers");
  }
  if (!isPositive(context.timeframeDays)) {
    missing.push("timeframeDays");
  }
  return missing;
}

export function hasGrowthDelta(context: GoalContext): boolean {
  return isCount(context.currentFollowers)
    && isCount(context.targetFollowers)
    && context.targetFollowers > context.currentFollowers;
}

export function isContextComplete(context: GoalContext): boolean {
  return missingContextFields(context).length === 0 && hasGrowthDelta(context);
}

function parseCount(digits: string, suffix: string | undefined): number {
  const value = Number.parseFloat(digits.replace(/,/g, ""));
  const multiplier = suffix?.toLowerCase() === "m" ? 1_000_000 : suffix?.toLowerCase() === "k" ? 1_000 : 1;
  return Math.round(value * multiplier);
}

function matchTable(text: string, table: ReadonlyArray<[string, readonly string[]]>): string[] {
  return table
    .filter(([, keywords]) => keywords.some((keyword) => containsWord(text, keyword)))
    .map(([label]) => label);
}

function containsWord(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?:^|[^a-z])${escaped}s?(?:[^a-z]|$)`, "i").test(text);
}

function union(base: string[], extra: string[] | undefined): string[] {
  return extra ? [...new Set([...base, ...extra])] : base;
}

function isCount(value: number | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isPositive(value: number | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}
