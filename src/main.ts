#!/usr/bin/env node
import { CliError, parseCli, USAGE } from './app/cli';
import { HIDDEN_ROWS } from './core/constants';
import { GameEngine } from './core/game';
import { clockSeed } from './core/rng';
import { GameRunner } from './core/runner';
import {
  DEFAULT_SETTINGS,
  mergeSettings,
  type Settings,
} from './core/settings';
import { StdinInputSource } from './input/stdinInputSource';
import { RenderDiffer } from './render/renderDiffer';
import {
  Vt100Sink,
  Vt52Sink,
  type BufferedSink,
  type OutputStream,
} from './render/terminalSink';

function createSink(settings: Settings, out: OutputStream): BufferedSink {
  const screenRows = settings.board.rows - HIDDEN_ROWS + 1;
  return settings.display.protocol === 'vt52'
    ? new Vt52Sink(out)
    : new Vt100Sink(out, { color: settings.display.color, screenRows });
}

async function play(settings: Settings): Promise<void> {
  const sink = createSink(settings, process.stdout);
  const renderer = new RenderDiffer(sink, {
    rows: settings.board.rows,
    cols: settings.board.cols,
    glyphWidth: settings.display.doubleWidth ? 2 : 1,
    lineClear: settings.display.lineClear,
  });
  const game = new GameEngine({
    seed: settings.random.seed ?? clockSeed(),
    rows: settings.board.rows,
    cols: settings.board.cols,
    rules: settings.rules,
    renderer,
  });

  if (!process.stdin.isTTY) {
    console.warn('[Input] stdin is not a terminal; keys arrive line-buffered.');
  }
  const input = new StdinInputSource(process.stdin);
  const runner = new GameRunner(game, input, sink);

  input.open();
  sink.enter();
  try {
    runner.start();
    await runner.run();
  } finally {
    sink.leave();
    sink.flush();
    input.close();
  }
}

async function boot(argv: string[]): Promise<number> {
  const cli = parseCli(argv);
  if (cli.help) {
    console.log(USAGE);
    return 0;
  }
  await play(mergeSettings(DEFAULT_SETTINGS, cli.patch));
  return 0;
}

boot(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((e: unknown) => {
    if (e instanceof CliError) {
      console.error(`termblocks: ${e.message}\n\n${USAGE}`);
    } else {
      console.error('[Fatal]', e);
    }
    process.exit(1);
  });
