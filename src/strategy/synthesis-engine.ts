/**
 * Strategy Synthesis Engine
 *
 * Runs every configured specialist concurrently, each under its own
 * timeout, and merges whatever proposals come back into one Strategy.
 * A failing specialist is logged and left out; only zero proposals fail
 * the stage.
 */

import { StrategyUnavailableError, TurnCancelledError, normalizeError } from "../errors.js";
import { createLogger } from "../observability/logger.js";
import type {
  GoalContext,
  ResearchResult,
  SpecialistId,
  Strategy,
  StrategyProposal,
} from "../types.js";
import { raceAbort, withTimeout } from "../utils/abort.js";
import { mergeProposals } from "./merge.js";
import type { Specialist } from "./specialists.js";

const logger = createLogger("strategy.engine");

export interface StrategySynthesisEngineOptions {
  specialists: Specialist[];
  timeoutMs: number;
}

type SpecialistOutcome =
  | { specialist: SpecialistId; proposal: StrategyProposal }
  | { specialist: SpecialistId; error: Error };

export class StrategySynthesisEngine {
  constructor(private readonly options: StrategySynthesisEngineOptions) {}

  async synthesize(
    context: GoalContext,
    research: ResearchResult | null,
    opts: { signal?: AbortSignal } = {},
  ): Promise<Strategy> {
    const outcomes = await Promise.all(
      this.options.specialists.map((specialist) => this.consult(specialist, context, research, opts.signal)),
    );

    if (opts.signal?.aborted) {
      throw new TurnCancelledError("strategizing");
    }

    const proposals: StrategyProposal[] = [];
    const failures: { specialist: SpecialistId; error: string }[] = [];
    for (const outcome of outcomes) {
      if ("proposal" in outcome) {
        proposals.push(outcome.proposal);
      } else {
        logger.warn("Specialist failed, omitting its proposal", {
          specialist: outcome.specialist,
          error: outcome.error.message,
        });
        failures.push({ specialist: outcome.specialist, error: outcome.error.message });
      }
    }

    if (proposals.length === 0) {
      throw new StrategyUnavailableError(failures);
    }

    const merged = mergeProposals(proposals);
    for (const resolution of merged.resolutions) {
      logger.info("Resolved conflicting recommendations", { ...resolution });
    }

    const strategy: Strategy = {
      title: strategyTitle(context),
      unifiedRecommendations: merged.unified,
      contributingSpecialists: merged.contributingSpecialists,
      resolutions: merged.resolutions,
    };

    logger.info("Strategy synthesized", {
      recommendations: strategy.unifiedRecommendations.length,
      specialists: strategy.contributingSpecialists,
      failed: failures.map((failure) => failure.specialist),
    });

    return strategy;
  }

  private async consult(
    specialist: Specialist,
    context: GoalContext,
    research: ResearchResult | null,
    callerSignal: AbortSignal | undefined,
  ): Promise<SpecialistOutcome> {
    const signal = withTimeout(callerSignal, this.options.timeoutMs);
    try {
      const proposal = await raceAbort(
        specialist.propose(context, research, signal),
        signal,
        () => new Error(`timed out after ${this.options.timeoutMs}ms`),
      );
      return { specialist: specialist.id, proposal };
    } catch (error) {
      return { specialist: specialist.id, error: normalizeError(error) };
    }
  }
}

export function strategyTitle(context: GoalContext): string {
  const niche = context.niche?.trim() || "Account";
  const label = niche.charAt(0).toUpperCase() + niche.slice(1);
  const { currentFollowers, targetFollowers, timeframeDays } = context;
  if (currentFollowers === undefined || targetFollowers === undefined || timeframeDays === undefined) {
    return `${label} growth strategy`;
  }
  return `${label} growth strategy: ${currentFollowers} to ${targetFollowers} followers in ${timeframeDays} days`;
}
