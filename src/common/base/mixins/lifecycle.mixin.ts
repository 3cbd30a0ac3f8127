import type { OnModuleInit, OnModuleDestroy } from "@nestjs/common";
import type { MixinBase } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";
import { asError } from "../../utils/error.utils";

export type LifecycleState = "created" | "initialized" | "destroyed";

/**
 * Lifecycle management capabilities
 */
export interface LifecycleCapabilities {
  readonly lifecycleState: LifecycleState;
  createTimeout(callback: () => void, delay: number): NodeJS.Timeout;
  createInterval(callback: () => void, delay: number): NodeJS.Timeout;
  clearTimer(timer: NodeJS.Timeout): void;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}

/**
 * Hooks a service into Nest's module lifecycle and owns its timers.
 * Subclasses implement `initialize`/`cleanup`; timers still pending at destroy are cleared.
 */
export function WithLifecycle<TBase extends MixinBase<LoggingCapabilities>>(Base: TBase) {
  abstract class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    public lifecycleState: LifecycleState = "created";
    public managedTimers = new Set<NodeJS.Timeout>();
    public managedIntervals = new Set<NodeJS.Timeout>();
    public initializing?: Promise<void>;
    public destroying?: Promise<void>;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    onModuleInit(): Promise<void> {
      this.initializing ??= this.runInitialize();
      return this.initializing;
    }

    onModuleDestroy(): Promise<void> {
      this.destroying ??= this.runCleanup();
      return this.destroying;
    }

    createTimeout(callback: () => void, delay: number): NodeJS.Timeout {
      const timer = setTimeout(() => {
        this.managedTimers.delete(timer);
        callback();
      }, delay);
      this.managedTimers.add(timer);
      return timer;
    }

    /**
     * Unref'd: a pending interval never holds the process open on its own
     */
    createInterval(callback: () => void, delay: number): NodeJS.Timeout {
      const interval = setInterval(callback, delay);
      interval.unref();
      this.managedIntervals.add(interval);
      return interval;
    }

    clearTimer(timer: NodeJS.Timeout): void {
      clearTimeout(timer);
      this.managedTimers.delete(timer);
    }

    initialize?(): Promise<void>;
    cleanup?(): Promise<void>;

    async runInitialize(): Promise<void> {
      try {
        await this.initialize?.();
        this.lifecycleState = "initialized";
        this.logInitialization();
      } catch (error) {
        this.logError(asError(error), "Service initialization failed");
        throw error;
      }
    }

    async runCleanup(): Promise<void> {
      this.logShutdown();
      this.managedTimers.forEach(timer => clearTimeout(timer));
      this.managedIntervals.forEach(interval => clearInterval(interval));
      this.managedTimers.clear();
      this.managedIntervals.clear();

      try {
        await this.cleanup?.();
        this.lifecycleState = "destroyed";
      } catch (error) {
        this.logError(asError(error), "Service cleanup failed");
        throw error;
      }
    }
  }

  return LifecycleMixin;
}
