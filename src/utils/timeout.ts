export interface TimeoutCalculationOptions {
  promptSize?: number; // characters sent to the backend
  maxTokens?: number; // requested completion length
  operationType: "daemon" | "remote";
}

const BASE_TIMEOUTS = {
  daemon: 30_000,
  remote: 20_000,
} as const;

const MAX_TIMEOUTS = {
  daemon: 120_000,
  remote: 90_000,
} as const;

/** Socket timeout for an HTTP backend call, scaled by prompt and completion size. */
export const calculateDynamicTimeout = (options: TimeoutCalculationOptions): number => {
  const { promptSize = 0, maxTokens = 0, operationType } = options;

  let timeout: number = BASE_TIMEOUTS[operationType];

  if (promptSize > 0) {
    // one extra second per 10 KB of prompt
    timeout += Math.floor(promptSize / 1024 / 10) * 1000;
  }

  if (maxTokens > 0) {
    timeout += Math.min(maxTokens * 20, 30_000);
  }

  return Math.max(Math.min(timeout, MAX_TIMEOUTS[operationType]), BASE_TIMEOUTS[operationType]);
};

export const calculateDaemonTimeout = (
  options: Omit<TimeoutCalculationOptions, "operationType">
): number => calculateDynamicTimeout({ ...options, operationType: "daemon" });

export const calculateRemoteTimeout = (
  options: Omit<TimeoutCalculationOptions, "operationType">
): number => calculateDynamicTimeout({ ...options, operationType: "remote" });
