export function createAbortError(message = "Operation aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes("aborted") || message.includes("cancelled") || message.includes("canceled");
}

export function mergeAbortSignals(signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const active = signals.filter((signal): signal is AbortSignal => Boolean(signal));
  if (active.length === 0) {
    return undefined;
  }

  if (active.length === 1) {
    return active[0];
  }

  return AbortSignal.any(active);
}

export interface TimeoutSignalHandle {
  signal: AbortSignal;
  clear: () => void;
}

export function createTimeoutSignal(timeoutMs: number, message: string): TimeoutSignalHandle {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(createAbortError(message));
  }, timeoutMs);

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timer)
  };
}
