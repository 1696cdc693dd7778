// Sales Call Scorecard - Stage Task Queue
// In-process consumer for at-least-once stage triggers. Up to `concurrency`
// tasks run at once; a trigger whose key is already pending is coalesced into
// the pending one. Outcomes surface through session status, so a failed task
// is logged and dropped.

import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { Session, StageTrigger } from "./types.js";
import type { Deferred } from "./utils/deferred.js";
import { createDeferred } from "./utils/deferred.js";

export interface TriggerHandler {
  handleTrigger(trigger: StageTrigger): Promise<Session>;
}

export interface StageTaskQueueOptions {
  concurrency?: number;
  logger?: Logger;
}

export function taskKey(trigger: StageTrigger): string {
  return `${trigger.sessionId}:${trigger.targetStage}`;
}

export class StageTaskQueue {
  private readonly handler: TriggerHandler;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private pending: StageTrigger[] = [];
  private pendingKeys: Set<string> = new Set();
  private running = 0;
  private idleWaiters: Deferred<void>[] = [];

  constructor(handler: TriggerHandler, options: StageTaskQueueOptions = {}) {
    this.handler = handler;
    this.concurrency = Math.max(1, options.concurrency ?? 4);
    this.logger = options.logger ?? createLogger("StageTaskQueue");
  }

  /** Returns false when an identical trigger was already pending. */
  enqueue(trigger: StageTrigger): boolean {
    const key = taskKey(trigger);
    if (this.pendingKeys.has(key)) {
      this.logger.debug(`Coalesced duplicate trigger ${key}`);
      return false;
    }
    this.pendingKeys.add(key);
    this.pending.push(trigger);
    this.pump();
    return true;
  }

  get size(): number {
    return this.pending.length;
  }

  get active(): number {
    return this.running;
  }

  /** Resolves once nothing is pending or running. */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    const waiter = createDeferred<void>();
    this.idleWaiters.push(waiter);
    return waiter.promise;
  }

  private isIdle(): boolean {
    return this.running === 0 && this.pending.length === 0;
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const trigger = this.pending.shift();
      if (!trigger) break;
      this.pendingKeys.delete(taskKey(trigger));
      this.running++;
      void this.execute(trigger);
    }
  }

  private async execute(trigger: StageTrigger): Promise<void> {
    try {
      const session = await this.handler.handleTrigger(trigger);
      this.logger.debug(`Trigger ${taskKey(trigger)} done; session is "${session.status}"`);
    } catch (err) {
      this.logger.error(`Trigger ${taskKey(trigger)} failed: ${errorMessage(err)}`);
    } finally {
      this.running--;
      this.pump();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const waiter of waiters) waiter.resolve();
      }
    }
  }
}
