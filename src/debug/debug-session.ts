import type { Logger } from 'winston';
import type { DebugDecision, DebugEvent, DebugUpdate } from '../types/index.js';
import { Latch } from './latch.js';
import { BoundedEventQueue } from './event-queue.js';
import { extractMessage } from '../exception/classifier.js';

export type StepSnapshot = Omit<DebugUpdate, 'reloadedAt'>;

export interface DebugSessionOptions {
  queueCapacity?: number;
  logger?: Logger;
  /** Take an existing queue instead of creating one. */
  events?: BoundedEventQueue<DebugEvent>;
}

type PendingJump = { kind: 'jump_index'; index: number } | { kind: 'jump_tag'; tag: string } | null;

/**
 * Cooperative pause / resume / jump control between an operator and a
 * running executor. Slot mutations are plain synchronous methods, so each
 * one completes before the executor can observe the state.
 */
export class DebugSession {
  readonly events: BoundedEventQueue<DebugEvent>;
  private latch = new Latch(true);
  private stopFlag = false;
  private isEnabled = true;
  private jump: PendingJump = null;
  private initialIndex: number | null = null;
  private currentAccount = '';
  private reloadedAt: number | null = null;
  private logger?: Logger;

  constructor(options: DebugSessionOptions = {}) {
    this.events = options.events ?? new BoundedEventQueue<DebugEvent>(options.queueCapacity ?? 256);
    this.logger = options.logger;
  }

  get enabled(): boolean {
    return this.isEnabled;
  }

  get paused(): boolean {
    return this.isEnabled && !this.latch.isSet;
  }

  get stopRequested(): boolean {
    return this.stopFlag;
  }

  get lastReloadAt(): number | null {
    return this.reloadedAt;
  }

  get account(): string {
    return this.currentAccount;
  }

  disable(): void {
    this.isEnabled = false;
    this.latch.set();
  }

  pause(): void {
    if (this.isEnabled) this.latch.clear();
  }

  resume(): void {
    this.latch.set();
  }

  requestStop(): void {
    this.stopFlag = true;
    this.latch.set();
  }

  requestJumpToStep(index: number): void {
    if (!Number.isFinite(index)) return;
    this.jump = { kind: 'jump_index', index: Math.max(0, Math.trunc(index)) };
    this.latch.set();
  }

  requestJumpToTag(tag: string): void {
    const trimmed = tag.trim();
    if (!trimmed) return;
    this.jump = { kind: 'jump_tag', tag: trimmed };
    this.latch.set();
  }

  /** Take the pending jump, if any. A second call returns proceed. */
  consumeJump(): DebugDecision {
    const pending = this.jump;
    this.jump = null;
    return pending ?? { kind: 'proceed' };
  }

  setInitialStep(index: number): void {
    if (!Number.isFinite(index)) return;
    this.initialIndex = Math.max(0, Math.trunc(index));
  }

  consumeInitialStep(): number | null {
    const index = this.initialIndex;
    this.initialIndex = null;
    return index;
  }

  notifyReload(): void {
    this.reloadedAt = Date.now();
    this.publish({ type: 'reloaded', at: this.reloadedAt });
  }

  notifyFinished(ok: boolean, reason: string | null): void {
    this.publish({ type: 'finished', ok, reason });
  }

  notifyBrowserClosed(): void {
    this.stopFlag = true;
    this.latch.set();
    this.publish({ type: 'browser_closed' });
  }

  /** Ignored when a different account is the one being debugged. */
  notifyBrowserClosedFor(account: string): void {
    if (this.currentAccount && account && this.currentAccount !== account) return;
    this.notifyBrowserClosed();
  }

  /**
   * Publish the step about to run and wait until the session may proceed.
   * Returns the operator's decision for this step.
   */
  async beforeStep(snapshot: StepSnapshot): Promise<DebugDecision> {
    if (this.stopFlag) return { kind: 'stop' };
    if (!this.isEnabled) return { kind: 'proceed' };

    this.currentAccount = snapshot.account;
    const update: DebugUpdate = Object.freeze({ ...snapshot, reloadedAt: this.reloadedAt });
    this.publish({ type: 'step', update });

    await this.latch.wait();
    if (this.stopFlag) return { kind: 'stop' };
    return this.consumeJump();
  }

  /**
   * Between debug iterations: wait for a jump or a stop. A bare resume
   * without a jump pauses again. A disabled session has no operator left to
   * answer, so it reports stop.
   */
  async waitForCommand(): Promise<DebugDecision> {
    while (true) {
      if (this.stopFlag || !this.isEnabled) return { kind: 'stop' };
      await this.latch.wait();
      if (this.stopFlag) return { kind: 'stop' };
      const decision = this.consumeJump();
      if (decision.kind !== 'proceed') return decision;
      this.pause();
    }
  }

  private publish(event: DebugEvent): void {
    try {
      this.events.push(event);
    } catch (error) {
      this.logger?.warn(`Dropping debug event ${event.type}: ${extractMessage(error)}`);
    }
  }
}
