#!/usr/bin/env node

/**
 * arith-calc CLI
 *
 * Interactive prompt on a terminal, line-by-line evaluation of piped stdin,
 * or one-shot evaluation of expressions given as arguments.
 *
 * Usage:
 *   arith-calc
 *   arith-calc < expressions.txt
 *   arith-calc "2 + 6 * 6" "(2 + 6) * 6"
 *   arith-calc --help
 */

import { hrtime } from 'node:process';
import rsexport from 'random-seed';
import tkexport from 'terminal-kit';

import {
  type CalcConfig,
  ConfigError,
  FAREWELL,
  frameLines,
  GREETING,
  helpText,
  parseArgs,
  prettyPrint,
  randExpression,
  respond,
  runOneShot,
  runSession,
  selectMode,
  type SessionSink,
  truncateLine,
  USAGE,
  VERSION
} from '../lib/index.js';

const { create } = rsexport;
const { terminal } = tkexport;

const GENERATED_SIZE = 4;

function printGreen(msg: string): void {
  terminal('\n');
  terminal.green(msg);
}
function printCyan(msg: string): void {
  terminal('\n');
  terminal.cyan(msg);
}
function printYellow(msg: string): void {
  terminal('\n');
  terminal.yellow(msg);
}
function printRed(msg: string): void {
  terminal('\n');
  terminal.red(msg);
}

const terminalSink: SessionSink = (text, kind) => {
  switch (kind) {
    case 'info':
      printCyan(text);
      break;
    case 'result':
      printGreen(text);
      break;
    case 'error':
      printRed(text);
      break;
  }
};

const plainSink: SessionSink = (text) => {
  process.stdout.write(`${text}\n`);
};

function quit(code: number): never {
  terminal.grabInput(false);
  terminal('\n');
  process.exit(code);
}

function processCommand(input: string, config: CalcConfig): void {
  if (input === '') return;

  if (input.startsWith(':')) {
    const cmd = input.slice(1).trim().toLowerCase();
    if (cmd === 'help') {
      printCyan(helpText(VERSION));
      printCyan(':g or :generate evaluates a random expression');
    } else if (cmd === 'g' || cmd === 'generate') {
      generate(config);
    } else if (cmd === 'quit') {
      printCyan(FAREWELL);
      quit(0);
    } else {
      printYellow('unknown command: ' + input);
    }
    return;
  }

  if (respond(input, terminalSink, config) === null) {
    printCyan(FAREWELL);
    quit(0);
  }
}

function generate(config: CalcConfig): void {
  const rs = create(hrtime.bigint().toString());
  const line = prettyPrint(randExpression(rs, GENERATED_SIZE));
  printCyan('generated: ' + line);
  respond(line, terminalSink, config);
}

function repl(config: CalcConfig, history: string[]): void {
  terminal('\n> ');

  terminal.inputField(
    {
      history,
      autoCompleteHint: false,
      autoCompleteMenu: false
    },
    (error: unknown, input?: string) => {
      if (error) {
        printRed('error: ' + String(error));
        quit(1);
      }

      const trimmedInput = truncateLine(input ?? '', config).trim();
      if (trimmedInput) {
        history.push(trimmedInput);
      }

      processCommand(trimmedInput, config);
      repl(config, history);
    }
  );
}

function startInteractive(config: CalcConfig): void {
  terminal.grabInput({ mouse: 'button' });
  terminal.on('key', (name: string) => {
    if (name === 'CTRL_C') {
      printCyan(FAREWELL);
      quit(0);
    }
  });

  terminal.bold.cyan(GREETING);
  printCyan(USAGE);
  printCyan("type :help for more, :quit or 'exit' to leave.");
  repl(config, []);
}

async function startStream(config: CalcConfig): Promise<void> {
  await runSession(frameLines(process.stdin, config), plainSink, config);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    console.log(helpText(VERSION));
    return;
  }
  if (options.version) {
    console.log(`arith-calc v${VERSION}`);
    return;
  }

  switch (selectMode(options, process.stdin.isTTY === true)) {
    case 'oneshot':
      process.exitCode = runOneShot(
        options.expressions,
        (text) => process.stdout.write(`${text}\n`),
        (text) => console.error(text),
        options.config
      );
      break;
    case 'interactive':
      startInteractive(options.config);
      break;
    case 'stream':
      await startStream(options.config);
      break;
  }
}

main().catch((e: unknown) => {
  if (e instanceof ConfigError) {
    console.error(e.message);
    console.error('Use --help for usage information.');
  } else {
    console.error(e);
  }
  process.exit(1);
});
