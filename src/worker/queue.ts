import PQueue from "p-queue";

import type { Logger } from "@/lib/logger";
import type { CallGate, InvokeOptions } from "@/lib/rate-limiter";

export type JobStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export interface JobHandle<T> {
  id: string;
  promise: Promise<T>;
  cancel: () => void;
  getStatus: () => JobStatus;
}

export interface SubmitOptions extends Omit<InvokeOptions, "signal"> {
  id?: string;
}

export interface InvocationQueueConfig {
  /** Gate shared by every job, so all of them draw from the same budgets */
  gate: CallGate;
  /** Jobs in flight at once, including those waiting for budget (default 4) */
  concurrency?: number;
  logger?: Logger;
}

export interface InvocationQueue {
  submit: <T>(
    operation: (signal: AbortSignal) => Promise<T>,
    options?: SubmitOptions,
  ) => JobHandle<T>;
  /** Null for unknown ids and for jobs removed by `clearFinished` */
  getStatus: (id: string) => JobStatus | null;
  /** Forgets completed, failed and cancelled jobs; returns how many were removed */
  clearFinished: () => number;
  /** Jobs not yet started */
  getPendingCount: () => number;
  /** Jobs started and not yet settled */
  getRunningCount: () => number;
  cancelAll: () => void;
  waitForIdle: () => Promise<void>;
}

/**
 * Runs guarded calls with bounded concurrency. Each job gets its own abort
 * signal, passed to the gate and to the operation. A cancelled job's promise
 * rejects with the signal's reason.
 *
 * @example
 * ```typescript
 * const queue = createInvocationQueue({ gate, concurrency: 8 });
 *
 * const jobs = prompts.map((prompt) =>
 *   queue.submit((signal) => ollama.generate(prompt, { signal }), {
 *     throughputCost: estimateTokenCount(prompt),
 *   }),
 * );
 * const results = await Promise.allSettled(jobs.map((job) => job.promise));
 * ```
 */
export const createInvocationQueue = (config: InvocationQueueConfig): InvocationQueue => {
  const { gate, concurrency = 4, logger } = config;
  const queue = new PQueue({ concurrency });
  const jobs = new Map<string, JobStatus>();
  const cancellers = new Map<string, () => void>();
  let sequence = 0;

  const isActive = (status: JobStatus): boolean => status === "pending" || status === "running";

  const submit = <T>(
    operation: (signal: AbortSignal) => Promise<T>,
    options: SubmitOptions = {},
  ): JobHandle<T> => {
    const { id, ...invokeOptions } = options;
    sequence++;
    const jobId = id ?? `job-${sequence}`;
    const controller = new AbortController();
    const { signal } = controller;

    let status: JobStatus = "pending";
    // Jobs forgotten by clearFinished stay forgotten
    const setStatus = (next: JobStatus): void => {
      status = next;
      if (jobs.has(jobId)) {
        jobs.set(jobId, next);
      }
    };

    const cancel = (): void => {
      if (isActive(status)) {
        controller.abort();
        setStatus("cancelled");
      }
    };

    jobs.set(jobId, status);
    cancellers.set(jobId, cancel);

    const run = async (): Promise<T> => {
      setStatus("running");
      try {
        const result = await gate.invoke(() => operation(signal), {
          label: jobId,
          ...invokeOptions,
          signal,
        });
        setStatus("completed");
        return result;
      } catch (error) {
        if (signal.aborted) {
          setStatus("cancelled");
        } else {
          setStatus("failed");
          logger?.warn("Job failed", {
            jobId,
            error: error instanceof Error ? error.message : String(error),
          });
        }
        throw error;
      } finally {
        cancellers.delete(jobId);
      }
    };

    const promise = queue.add(run, { signal, throwOnTimeout: true }).catch((error: unknown) => {
      if (signal.aborted) {
        setStatus("cancelled");
        cancellers.delete(jobId);
      }
      throw error;
    });

    return {
      id: jobId,
      promise,
      cancel,
      getStatus: () => status,
    };
  };

  const cancelAll = (): void => {
    // Aborted jobs still queued reject when p-queue dequeues them
    for (const cancel of cancellers.values()) {
      cancel();
    }
  };

  const clearFinished = (): number => {
    let removed = 0;
    for (const [id, status] of jobs.entries()) {
      if (!isActive(status)) {
        jobs.delete(id);
        removed++;
      }
    }
    return removed;
  };

  return {
    submit,
    getStatus: (id) => jobs.get(id) ?? null,
    clearFinished,
    getPendingCount: () => queue.size,
    getRunningCount: () => queue.pending,
    cancelAll,
    waitForIdle: () => queue.onIdle(),
  };
};
