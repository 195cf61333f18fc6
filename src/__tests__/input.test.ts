import { EventEmitter } from 'node:events';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { GameEngine } from '../core/game';
import { GameRunner } from '../core/runner';
import { commandFromByte } from '../input/keymap';
import { StdinInputSource } from '../input/stdinInputSource';
import { RenderDiffer } from '../render/renderDiffer';
import {
  CountingOutput,
  FakeClock,
  FixedGenerator,
  ScreenSink,
} from './fakes';

const byte = (ch: string) => ch.charCodeAt(0);

class FakeStdin extends EventEmitter {
  readonly rawModes: boolean[] = [];
  flowing = false;

  constructor(readonly isTTY: boolean) {
    super();
  }

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  resume(): this {
    this.flowing = true;
    return this;
  }

  pause(): this {
    this.flowing = false;
    return this;
  }
}

describe('commandFromByte', () => {
  it('maps the bound keys', () => {
    expect(commandFromByte(byte('j'))).toBe('left');
    expect(commandFromByte(byte('l'))).toBe('right');
    expect(commandFromByte(byte('k'))).toBe('rotateCCW');
    expect(commandFromByte(byte('i'))).toBe('rotateCW');
    expect(commandFromByte(byte(' '))).toBe('drop');
    expect(commandFromByte(byte('r'))).toBe('redraw');
    expect(commandFromByte(byte('s'))).toBe('start');
    expect(commandFromByte(byte('q'))).toBe('quit');
    expect(commandFromByte(0x03)).toBe('quit');
  });

  it('treats anything else as no command', () => {
    expect(commandFromByte(byte('J'))).toBe('none');
    expect(commandFromByte(byte('x'))).toBe('none');
    expect(commandFromByte(0x1b)).toBe('none');
  });
});

describe('StdinInputSource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('puts a terminal into raw mode while open', () => {
    const stdin = new FakeStdin(true);
    const source = new StdinInputSource(stdin);

    source.open();
    expect(stdin.rawModes).toEqual([true]);
    expect(stdin.flowing).toBe(true);
    expect(stdin.listenerCount('data')).toBe(1);
    expect(stdin.listenerCount('end')).toBe(1);

    source.close();
    expect(stdin.rawModes).toEqual([true, false]);
    expect(stdin.flowing).toBe(false);
    expect(stdin.listenerCount('data')).toBe(0);
    expect(stdin.listenerCount('end')).toBe(0);
    expect(stdin.listenerCount('error')).toBe(0);
  });

  it('leaves a pipe in its normal mode', () => {
    const stdin = new FakeStdin(false);
    const source = new StdinInputSource(stdin);
    source.open();
    source.close();
    expect(stdin.rawModes).toEqual([]);
  });

  it('hands out queued bytes in arrival order', async () => {
    const stdin = new FakeStdin(true);
    const source = new StdinInputSource(stdin);
    source.open();

    stdin.emit('data', Buffer.from('jl'));

    await expect(source.poll(1000)).resolves.toBe('left');
    await expect(source.poll(1000)).resolves.toBe('right');
    source.close();
  });

  it('resolves a waiting poll as soon as a key arrives', async () => {
    vi.useFakeTimers();
    const stdin = new FakeStdin(true);
    const source = new StdinInputSource(stdin);
    source.open();

    const pending = source.poll(1000);
    stdin.emit('data', 'i');

    await expect(pending).resolves.toBe('rotateCW');
    expect(vi.getTimerCount()).toBe(0);
    source.close();
  });

  it('resolves null when the timeout passes first', async () => {
    vi.useFakeTimers();
    const stdin = new FakeStdin(true);
    const source = new StdinInputSource(stdin);
    source.open();

    const pending = source.poll(500);
    vi.advanceTimersByTime(499);
    stdin.emit('data', Buffer.alloc(0));
    vi.advanceTimersByTime(1);

    await expect(pending).resolves.toBeNull();
    source.close();
  });

  it('releases a waiting poll on close', async () => {
    vi.useFakeTimers();
    const stdin = new FakeStdin(true);
    const source = new StdinInputSource(stdin);
    source.open();

    const pending = source.poll(1000);
    source.close();

    await expect(pending).resolves.toBeNull();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('answers quit after the keys left when the stream ends', async () => {
    const stdin = new FakeStdin(false);
    const source = new StdinInputSource(stdin);
    source.open();

    stdin.emit('data', 'j');
    stdin.emit('end');

    await expect(source.poll(1000)).resolves.toBe('left');
    await expect(source.poll(1000)).resolves.toBe('quit');
    await expect(source.poll(1000)).resolves.toBe('quit');
    source.close();
  });

  it('releases a waiting poll with quit when the stream ends', async () => {
    vi.useFakeTimers();
    const stdin = new FakeStdin(false);
    const source = new StdinInputSource(stdin);
    source.open();

    const pending = source.poll(1000);
    stdin.emit('end');

    await expect(pending).resolves.toBe('quit');
    expect(vi.getTimerCount()).toBe(0);
    source.close();
  });

  it('rejects polls once the stream fails', async () => {
    vi.useFakeTimers();
    const stdin = new FakeStdin(true);
    const source = new StdinInputSource(stdin);
    source.open();

    const pending = source.poll(1000);
    stdin.emit('error', new Error('read failed'));

    await expect(pending).rejects.toThrow('read failed');
    await expect(source.poll(1000)).rejects.toThrow('read failed');
    source.close();
  });

  it('lets the game loop finish when piped input runs out', async () => {
    const stdin = new FakeStdin(false);
    const source = new StdinInputSource(stdin);
    const sink = new ScreenSink();
    const game = new GameEngine({
      seed: 1,
      renderer: new RenderDiffer(sink, {
        rows: 24,
        cols: 10,
        glyphWidth: 2,
        lineClear: 'scroll',
      }),
      generatorFactory: () => new FixedGenerator(['O']),
    });
    const clock = new FakeClock();
    const runner = new GameRunner(game, source, new CountingOutput(), {
      now: clock.now,
    });
    source.open();
    runner.start();

    stdin.emit('data', 'j');
    stdin.emit('end');
    await runner.run();

    expect(game.active).toEqual({ k: 'O', r: 0, x: 3, y: 0 });
    source.close();
  });
});
