/**
 * Automation Backend client
 *
 * The external service that performs engagement actions. It accepts one
 * task at a time and reports progress per task handle. Rate limits,
 * server errors and timeouts are transient; other rejections are not.
 */

import { DispatchError, isAbortError, normalizeError } from "../errors.js";
import type { FetchLike } from "../research/provider.js";
import { isRecord, stringField } from "../research/provider.js";
import type { Task } from "../types.js";
import { withTimeout } from "../utils/abort.js";

export type BackendTaskState = "queued" | "running" | "completed" | "failed";

export interface BackendStatus {
  state: BackendTaskState;
  error?: string;
}

export interface AutomationBackend {
  /** Returns the backend's handle for the accepted task. */
  enqueue(userId: string, task: Task, signal: AbortSignal): Promise<string>;
  status(handle: string, signal: AbortSignal): Promise<BackendStatus>;
}

export interface HttpAutomationBackendOptions {
  baseUrl: string;
  apiToken: string | undefined;
  requestTimeoutMs: number;
  fetch?: FetchLike;
}

const BACKEND_STATES: readonly BackendTaskState[] = ["queued", "running", "completed", "failed"];

export class HttpAutomationBackend implements AutomationBackend {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpAutomationBackendOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
  }

  async enqueue(userId: string, task: Task, signal: AbortSignal): Promise<string> {
    const body = await this.request(`${this.baseUrl}/api/tasks`, {
      method: "POST",
      body: JSON.stringify({
        userId,
        taskId: task.taskId,
        type: task.category,
        priority: task.priority,
        parameters: task.parameters,
      }),
    }, signal);

    const handle = isRecord(body) ? stringField(body, "handle") ?? stringField(body, "id") : undefined;
    if (!handle) {
      throw new DispatchError(`Backend accepted task ${task.taskId} without a handle`, { transient: false });
    }
    return handle;
  }

  async status(handle: string, signal: AbortSignal): Promise<BackendStatus> {
    const body = await this.request(`${this.baseUrl}/api/tasks/${encodeURIComponent(handle)}`, {
      method: "GET",
    }, signal);

    const state = isRecord(body) ? stringField(body, "status") : undefined;
    const known = BACKEND_STATES.find((candidate) => candidate === state);
    if (!known || !isRecord(body)) {
      throw new DispatchError(`Backend reported unknown status for ${handle}: ${String(state)}`, {
        transient: true,
      });
    }
    const error = stringField(body, "error");
    return error ? { state: known, error } : { state: known };
  }

  private async request(url: string, init: RequestInit, signal: AbortSignal): Promise<unknown> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiToken) {
      headers.Authorization = `Bearer ${this.options.apiToken}`;
    }

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, {
        ...init,
        headers,
        signal: withTimeout(signal, this.options.requestTimeoutMs),
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new DispatchError("Backend request timed out", { transient: true });
      }
      throw new DispatchError(`Backend unreachable: ${normalizeError(error).message}`, { transient: true });
    }

    if (!resp.ok) {
      const transient = resp.status === 408 || resp.status === 429 || resp.status >= 500;
      throw new DispatchError(`Backend returned HTTP ${resp.status}`, { transient, status: resp.status });
    }

    try {
      return await resp.json();
    } catch (error) {
      throw new DispatchError(`Backend sent invalid JSON: ${normalizeError(error).message}`, { transient: true });
    }
  }
}
