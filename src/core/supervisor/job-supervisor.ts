import { randomUUID } from "node:crypto";

import { TimeoutExceeded } from "../errors.js";

export type WorkState = "pending" | "running" | "completed" | "failed" | "timed_out";

export type WorkOutcome<T> =
  | { state: "completed"; value: T; durationMs: number }
  | { state: "failed"; error: unknown; durationMs: number }
  | { state: "timed_out"; durationMs: number };

/**
 * A unit of work receives an AbortSignal that fires when the supervisor stops
 * waiting for it. Honouring the signal is up to the work itself.
 */
export type Work<T> = (signal: AbortSignal) => Promise<T>;

export interface WorkHandle<T> {
  readonly id: string;
  readonly name: string;
  readonly state: WorkState;
  readonly outcome: WorkOutcome<T> | undefined;
  readonly signal: AbortSignal;
}

class WorkUnit<T> implements WorkHandle<T> {
  readonly id = randomUUID();
  private readonly controller = new AbortController();
  private current: WorkState = "pending";
  private settled: WorkOutcome<T> | undefined;
  private startedAt = 0;
  private finished: Promise<void> = Promise.resolve();

  constructor(readonly name: string) {}

  get state(): WorkState {
    return this.current;
  }

  get outcome(): WorkOutcome<T> | undefined {
    return this.settled;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Resolves once the underlying work settles, whether or not it still counts. */
  get done(): Promise<void> {
    return this.finished;
  }

  start(work: Work<T>): void {
    this.startedAt = Date.now();
    this.current = "running";
    this.finished = this.execute(work);
  }

  timeOut(timeoutMs: number): void {
    if (this.settle({ state: "timed_out", durationMs: this.elapsed() })) {
      this.controller.abort(new TimeoutExceeded(this.name, timeoutMs));
    }
  }

  cancel(reason: unknown): void {
    if (!this.settled) {
      this.controller.abort(reason);
    }
  }

  private async execute(work: Work<T>): Promise<void> {
    try {
      const value = await work(this.controller.signal);
      this.settle({ state: "completed", value, durationMs: this.elapsed() });
    } catch (error) {
      this.settle({ state: "failed", error, durationMs: this.elapsed() });
    }
  }

  // Write-once: whichever of completion, failure or the deadline lands first wins.
  private settle(outcome: WorkOutcome<T>): boolean {
    if (this.settled) return false;
    this.settled = outcome;
    this.current = outcome.state;
    return true;
  }

  private elapsed(): number {
    return Date.now() - this.startedAt;
  }
}

/**
 * Runs work units concurrently and joins them under one shared deadline.
 *
 * Cancellation is cooperative. When the deadline passes, units still running
 * are marked `timed_out` and their signal is aborted, but the operation
 * behind them may keep going and its side effects may still land; its result
 * is discarded.
 */
export class JobSupervisor {
  private readonly units = new Map<string, WorkUnit<unknown>>();

  /** Starts `work` immediately. */
  submit<T>(name: string, work: Work<T>): WorkHandle<T> {
    const unit = new WorkUnit<T>(name);
    this.units.set(unit.id, unit);
    unit.start(work);
    return unit;
  }

  /**
   * Waits until every handle is terminal or `timeoutMs` elapses, whichever
   * comes first. A unit failing early does not end the wait for the others.
   */
  async awaitAll(
    handles: readonly WorkHandle<unknown>[],
    timeoutMs: number
  ): Promise<Map<string, WorkOutcome<unknown>>> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive finite number, got ${String(timeoutMs)}`);
    }

    const units = handles.map((handle) => this.lookup(handle));

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    const allDone = Promise.all(units.map((unit) => unit.done)).then(() => "done" as const);

    try {
      if ((await Promise.race([allDone, deadline])) === "timeout") {
        for (const unit of units) unit.timeOut(timeoutMs);
      }
    } finally {
      clearTimeout(timer);
    }

    const outcomes = new Map<string, WorkOutcome<unknown>>();
    for (const unit of units) {
      if (unit.outcome) outcomes.set(unit.id, unit.outcome);
    }
    return outcomes;
  }

  /** Aborts every unit that has not settled yet. */
  dispose(reason: unknown = new Error("supervisor disposed")): void {
    for (const unit of this.units.values()) unit.cancel(reason);
    this.units.clear();
  }

  private lookup(handle: WorkHandle<unknown>): WorkUnit<unknown> {
    const unit = this.units.get(handle.id);
    if (!unit) {
      throw new Error(`Unknown work handle: ${handle.name} (${handle.id})`);
    }
    return unit;
  }
}
