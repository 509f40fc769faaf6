/**
 * Block runner: drives a block of actions to completion, one at a time,
 * suspending whenever an action hands back an async test.
 *
 *   idle -> running -> suspended -> running -> ... -> finished
 *
 * A throwing action is reported as an `error` event and the run moves on.
 * Engine state and configuration errors are not isolated; they escape to
 * whoever started or resumed the runner.
 */
import { hasCurrent } from "./env.js";
import { EngineStateError, isFatal } from "./errors.js";
import { getLogger } from "./logger.js";
import { report } from "./report.js";
import type { Action, ActionResult, AsyncTest, Block, TestResult } from "./types.js";
import { asyncTest, isAsyncTest, isBlock } from "./types.js";

export type RunnerState = "idle" | "running" | "suspended" | "finished";

export interface RunBlockOptions {
  onComplete?: () => void;
}

let nextRunnerId = 1;

export class BlockRunner {
  readonly id = nextRunnerId++;
  private queue: Action[];
  private _state: RunnerState = "idle";
  private executed = 0;
  private resumedDuringRun = false;
  private readonly onComplete?: () => void;
  private readonly log = getLogger().child({ runner: this.id });

  constructor(block: Block | readonly Action[], options: RunBlockOptions = {}) {
    this.queue = isBlock(block) ? [...block.actions] : [...block];
    this.onComplete = options.onComplete;
  }

  get state(): RunnerState {
    return this._state;
  }

  /** Number of actions invoked so far. */
  get position(): number {
    return this.executed;
  }

  start(): void {
    if (this._state !== "idle") {
      throw new EngineStateError(
        "E_RUNNER_BUSY",
        `Block runner ${this.id} cannot start while ${this._state}.`,
        { state: this._state }
      );
    }
    this.loop();
  }

  private loop(): void {
    this._state = "running";
    for (;;) {
      const action = this.queue.shift();
      if (action === undefined) {
        this.finish();
        return;
      }
      this.executed++;
      const result = this.invoke(action);
      if (isBlock(result)) {
        this.queue = [...result.actions, ...this.queue];
        continue;
      }
      if (!isAsyncTest(result)) continue;

      if (!this.suspendOn(result)) return;
    }
  }

  private invoke(action: Action): ActionResult {
    try {
      return action();
    } catch (e) {
      this.isolate(e);
      return undefined;
    }
  }

  private isolate(e: unknown): void {
    if (isFatal(e) || !hasCurrent()) throw e;
    report({
      type: "error",
      message: "Uncaught exception in action.",
      expected: undefined,
      actual: e,
    });
  }

  /**
   * Hand `continuation` the resume callback. Returns true when it resumed
   * before returning, so the loop can carry on without nesting.
   */
  private suspendOn(continuation: AsyncTest): boolean {
    this._state = "suspended";
    this.resumedDuringRun = false;
    let resumed = false;
    let inRun = true;
    const done = () => {
      if (resumed) {
        this.log.warn({ position: this.executed }, "Async test called done more than one time.");
        return;
      }
      resumed = true;
      if (inRun) {
        this.resumedDuringRun = true;
        return;
      }
      this.log.debug({ position: this.executed }, "resuming");
      this.loop();
    };

    this.log.debug({ position: this.executed }, "suspending");
    try {
      continuation.run(done);
    } catch (e) {
      inRun = false;
      if (!resumed) {
        resumed = true;
        this.resumedDuringRun = true;
      }
      this.isolate(e);
    }
    inRun = false;
    if (this.resumedDuringRun) {
      this._state = "running";
      return true;
    }
    return false;
  }

  private finish(): void {
    this._state = "finished";
    this.onComplete?.();
  }
}

/**
 * Run `block` to completion. Returns once it finishes or first suspends;
 * `onComplete` fires when the last action is done.
 */
export function runBlock(block: Block | readonly Action[], options: RunBlockOptions = {}): BlockRunner {
  const runner = new BlockRunner(block, options);
  runner.start();
  return runner;
}

/** A started block that callers can wait on, any number of times. */
export interface BlockCompletion {
  readonly finished: boolean;
  /** Call `fn` once the block is done; immediately if it already is. */
  whenFinished(fn: () => void): void;
}

export function startBlock(block: Block | readonly Action[]): BlockCompletion {
  let finished = false;
  const waiters: (() => void)[] = [];
  runBlock(block, {
    onComplete: () => {
      finished = true;
      for (const resume of waiters.splice(0)) resume();
    },
  });
  return {
    get finished() {
      return finished;
    },
    whenFinished(fn) {
      if (finished) fn();
      else waiters.push(fn);
    },
  };
}

/** Nothing for a finished block, otherwise an async test that completes with it. */
export function completionResult(completion: BlockCompletion): TestResult {
  if (completion.finished) return undefined;
  return asyncTest((done) => completion.whenFinished(done));
}

/**
 * Run `block` as one step of an enclosing block: nothing if it completed
 * synchronously, otherwise an async test that completes with it.
 */
export function runAsResult(block: Block | readonly Action[]): TestResult {
  return completionResult(startBlock(block));
}
