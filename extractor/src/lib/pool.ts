import { E_CANCELED, Semaphore, withTimeout } from "async-mutex";
import { ExtractionError, isExtractionError } from "../errors";
import { Logger } from "./logger";

export interface PoolFactory<T> {
  create(): Promise<T>;
  destroy(resource: T): Promise<void>;
  isHealthy(resource: T): boolean;
}

export interface PoolStatus {
  size: number;
  idle: number;
  in_use: number;
}

export interface UseOptions {
  /** Longest time to wait for a free slot before failing with ResourceExhausted. */
  waitMs: number;
  /** Caller's deadline; once aborted, `fn` is not started on a late slot or resource. */
  signal?: AbortSignal;
}

function deadlinePassed(signal: AbortSignal | undefined, stage: string): ExtractionError | null {
  if (!signal?.aborted) {
    return null;
  }
  if (isExtractionError(signal.reason)) {
    return signal.reason;
  }
  return new ExtractionError("Timeout", `deadline passed while ${stage}`);
}

/**
 * Bounded pool of expensive resources (browsers). A semaphore caps concurrent use;
 * idle healthy instances are reused, missing ones are created lazily.
 */
export class ResourcePool<T> {
  private readonly semaphore: Semaphore;
  private readonly idle: T[] = [];
  private inUse = 0;
  private draining = false;

  constructor(
    private readonly factory: PoolFactory<T>,
    private readonly size: number,
    private readonly logger: Logger
  ) {
    this.semaphore = new Semaphore(size);
  }

  status(): PoolStatus {
    return { size: this.size, idle: this.idle.length, in_use: this.inUse };
  }

  async use<R>(fn: (resource: T) => Promise<R>, options: UseOptions): Promise<R> {
    if (this.draining) {
      throw new ExtractionError("ResourceExhausted", "rendering pool is shutting down");
    }

    const exhausted = new ExtractionError("ResourceExhausted", `no rendering slot within ${options.waitMs}ms`, {
      wait_ms: options.waitMs,
      pool_size: this.size
    });
    let release: () => void;
    try {
      [, release] = await withTimeout(this.semaphore, Math.max(0, options.waitMs), exhausted).acquire();
    } catch (error) {
      if (error === E_CANCELED) {
        throw new ExtractionError("ResourceExhausted", "rendering pool is shutting down");
      }
      throw error;
    }

    const late = deadlinePassed(options.signal, "waiting for a rendering slot");
    if (late) {
      release();
      throw late;
    }

    this.inUse += 1;
    let resource: T | undefined;
    let healthy = true;
    try {
      resource = await this.checkout();
      const abandoned = deadlinePassed(options.signal, "starting a browser");
      if (abandoned) {
        throw abandoned;
      }
      return await fn(resource);
    } catch (error) {
      healthy = resource !== undefined && this.factory.isHealthy(resource);
      throw error;
    } finally {
      this.inUse -= 1;
      if (resource !== undefined) {
        await this.checkin(resource, healthy);
      }
      release();
    }
  }

  private async checkout(): Promise<T> {
    while (this.idle.length > 0) {
      const candidate = this.idle.pop();
      if (candidate === undefined) {
        break;
      }
      if (this.factory.isHealthy(candidate)) {
        return candidate;
      }
      this.logger.warn("pool_resource_unhealthy", { phase: "checkout" });
      await this.safeDestroy(candidate);
    }
    this.logger.debug("pool_resource_created", { in_use: this.inUse, idle: this.idle.length });
    return this.factory.create();
  }

  private async checkin(resource: T, healthy: boolean): Promise<void> {
    if (!this.draining && healthy && this.factory.isHealthy(resource)) {
      this.idle.push(resource);
      return;
    }
    await this.safeDestroy(resource);
  }

  private async safeDestroy(resource: T): Promise<void> {
    try {
      await this.factory.destroy(resource);
    } catch (error) {
      this.logger.warn("pool_resource_destroy_failed", { error });
    }
  }

  /** Stops handing out resources and destroys the idle ones. */
  async drain(): Promise<void> {
    this.draining = true;
    this.semaphore.cancel();
    const idle = this.idle.splice(0, this.idle.length);
    await Promise.all(idle.map((resource) => this.safeDestroy(resource)));
    this.logger.info("pool_drained", { destroyed: idle.length, in_use: this.inUse });
  }
}
