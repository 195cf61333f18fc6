import { MAX_TICK_LAG_MS } from './constants';
import type { GameEngine } from './game';
import type { Command, GameEvent, GameState } from './types';

/**
 * Source of player commands. `poll` waits at most `timeoutMs` and resolves
 * with `null` when nothing arrived, which the loop turns into a tick.
 */
export interface TimedInputSource {
  poll(timeoutMs: number): Promise<Command | null>;
}

export interface FrameOutput {
  flush(): void;
}

export interface GameRunnerOptions {
  now?: () => number;
  /**
   * How far the loop may fall behind its tick schedule before it stops
   * trying to catch up and restarts the schedule from now.
   */
  maxTickLagMs?: number;
}

/**
 * Drives a `GameEngine` from a timed input source: one event per iteration,
 * a tick whenever the step interval has elapsed (even with keys waiting), and
 * one flush of the output after each event.
 */
export class GameRunner {
  private nextTickAt = 0;
  private readonly now: () => number;
  private readonly maxTickLagMs: number;

  constructor(
    private game: GameEngine,
    private input: TimedInputSource,
    private output: FrameOutput,
    options: GameRunnerOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.maxTickLagMs = options.maxTickLagMs ?? MAX_TICK_LAG_MS;
  }

  get state(): GameState {
    return this.game.state;
  }

  start(): void {
    this.game.start();
    this.output.flush();
    this.resetTiming();
  }

  resetTiming(): void {
    this.nextTickAt = this.now() + this.game.pollIntervalMs;
  }

  async nextEvent(): Promise<GameEvent> {
    const wait = this.nextTickAt - this.now();
    if (wait > 0) {
      const command = await this.input.poll(wait);
      if (command !== null) return { type: 'command', command };
    }
    this.scheduleNextTick();
    return { type: 'tick' };
  }

  /** Handles one event. Resolves false once the player quits. */
  async step(): Promise<boolean> {
    const event = await this.nextEvent();
    if (event.type === 'command' && event.command === 'quit') return false;

    this.game.handle(event);
    if (event.type === 'command' && event.command === 'start') {
      this.resetTiming();
    }
    this.output.flush();
    return true;
  }

  async run(): Promise<void> {
    let running = true;
    while (running) running = await this.step();
  }

  private scheduleNextTick(): void {
    const now = this.now();
    if (now - this.nextTickAt > this.maxTickLagMs) this.nextTickAt = now;
    this.nextTickAt += this.game.pollIntervalMs;
  }
}
