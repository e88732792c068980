import { ExtractionError } from "../errors";

export type Clock = () => number;

const MAX_TIMER_MS = 2_147_483_647;

function timerDelay(ms: number): number {
  return Math.min(Math.max(0, ms), MAX_TIMER_MS);
}

export const systemClock: Clock = () => performance.now();

/**
 * Single remaining-time counter shared by every phase of one extraction. The clock is
 * injectable so tests can advance time by hand.
 */
export class Budget {
  private readonly startedAt: number;

  constructor(readonly totalMs: number, private readonly clock: Clock = systemClock) {
    this.startedAt = clock();
  }

  elapsed(): number {
    return Math.max(0, Math.round(this.clock() - this.startedAt));
  }

  remaining(): number {
    return Math.max(0, this.totalMs - this.elapsed());
  }

  /** Phase timeout clipped to what is left. */
  slice(phaseMs: number): number {
    return Math.min(phaseMs, this.remaining());
  }

  allows(minimumMs: number): boolean {
    const left = this.remaining();
    return left > 0 && left >= minimumMs;
  }
}

/**
 * Races `promise` against a timer. On expiry the returned promise rejects with
 * `Timeout` and `onTimeout` runs so the caller can cancel the underlying work.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  onTimeout?: () => void
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new ExtractionError("Timeout", `${label} timed out after ${timeoutMs}ms`, { timeout_ms: timeoutMs }));
    }, timerDelay(timeoutMs));
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

/** AbortSignal that fires after `timeoutMs` or when `parent` aborts, whichever is first. */
export function deadlineSignal(timeoutMs: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new ExtractionError("Timeout", `deadline of ${timeoutMs}ms exceeded`, { timeout_ms: timeoutMs }));
  }, timerDelay(timeoutMs));
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}
