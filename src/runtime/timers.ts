/** Handle returned by {@link runtimeTimers.setTimeout}. */
export type TimeoutHandle = ReturnType<typeof globalThis.setTimeout>;

/**
 * Timer helpers that read the globals on every call, so fake clocks installed
 * after module evaluation (sinon) keep control over deadlines and grace
 * periods.
 */
export const runtimeTimers = {
  setTimeout(callback: () => void, delayMs: number): TimeoutHandle {
    return globalThis.setTimeout(callback, delayMs);
  },
  clearTimeout(handle: TimeoutHandle | null | undefined): void {
    if (handle === null || handle === undefined) {
      return;
    }
    globalThis.clearTimeout(handle);
  },
} as const;

/** Resolves after {@link delayMs} using the runtime-aware timer. */
export function delay(delayMs: number): Promise<void> {
  return new Promise<void>((resolve) => {
    runtimeTimers.setTimeout(resolve, delayMs);
  });
}
