/**
 * Research Provider contract
 *
 * A provider turns one query into zero or more insights. Failures are
 * raised as ProviderError; the coordinator absorbs them.
 */

import { ProviderError, isAbortError, normalizeError } from "../errors.js";
import type { ResearchInsight } from "../types.js";

export interface ResearchProvider {
  readonly name: string;
  /** Lower ranks first when confidences tie. */
  readonly priority: number;
  readonly timeoutMs: number;
  search(query: string, signal: AbortSignal): Promise<ResearchInsight[]>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpProviderOptions {
  apiKey: string | undefined;
  baseUrl: string;
  priority: number;
  timeoutMs: number;
  fetch?: FetchLike;
  now?: () => Date;
}

/**
 * Performs the request and parses a JSON body. Non-2xx responses, network
 * failures and aborts all surface as ProviderError.
 */
export async function fetchProviderJson(
  providerName: string,
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
): Promise<unknown> {
  let resp: Response;
  try {
    resp = await fetchImpl(url, init);
  } catch (error) {
    if (isAbortError(error)) {
      throw new ProviderError(providerName, "request aborted", { timedOut: true });
    }
    throw new ProviderError(providerName, normalizeError(error).message);
  }

  if (!resp.ok) {
    throw new ProviderError(providerName, `HTTP ${resp.status}`);
  }

  try {
    return await resp.json();
  } catch (error) {
    throw new ProviderError(providerName, `invalid JSON body: ${normalizeError(error).message}`);
  }
}

export function requireApiKey(providerName: string, apiKey: string | undefined): string {
  if (!apiKey) {
    throw new ProviderError(providerName, "no API key configured");
  }
  return apiKey;
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function numberField(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}
