import { parseArgs, flagString } from './args';
import { runInTerminal } from './terminal';
import { readRomFile } from '../rom/loader';
import { Emulator } from '../emulator/core';
import { Scheduler } from '../emulator/scheduler';
import { Chip8Error } from '../emulator/errors';
import { readConfigFromEnv, parseRate, type RuntimeConfig } from '../emulator/config';
import { createDebug, isDebugEnabled, type Logger } from '../emulator/log';
import { disassemble } from '../cpu/disasm';
import { writePng } from '../display/png';
import { frameHash } from '../display/render';
import { SCREEN_WIDTH, SCREEN_HEIGHT } from '../display/framebuffer';
import { hexRaw } from '../utils/format';

export const VERSION = 'v0.1.0';

const VALUE_FLAGS = ['refresh', 'out', 'cycles', 'scale', 'trace'] as const;

type Command = 'version' | 'help' | 'run' | 'screenshot' | 'disasm';

// Flags each command accepts; anything else is rejected
const COMMAND_FLAGS: Record<Command, readonly string[]> = {
  version: [],
  help: [],
  run: ['refresh', 'trace'],
  screenshot: ['out', 'cycles', 'scale', 'trace'],
  disasm: [],
};

function isCommand(name: string): name is Command {
  return Object.prototype.hasOwnProperty.call(COMMAND_FLAGS, name);
}

const USAGE = [
  'Usage: chip8 <command> [options]',
  '',
  'Commands:',
  '  run <path/to/rom> [--refresh <Hz>] [--trace <N>]   run a ROM in the terminal',
  '  screenshot <path/to/rom> --out=<file.png> [--cycles=N] [--scale=S]',
  '  disasm <path/to/rom>                               list the ROM as instructions',
  '  version                                            print the version',
].join('\n');

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  env: Record<string, string | undefined>;
  logger: Logger;
}

export const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  logger: { log: console.error, warn: console.warn, error: console.error },
};

/**
 * Entry point for every command.
 * @returns process exit code
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const args = parseArgs(argv, VALUE_FLAGS);
  const [command, ...rest] = args.positional;
  const debug = createDebug('cli', io.logger, isDebugEnabled(io.env));

  if (command === undefined || !isCommand(command)) {
    io.err(command ? `Unknown command: ${command}` : 'Missing command');
    io.err(USAGE);
    return 1;
  }
  const unknownFlag = Object.keys(args.flags).find((f) => !COMMAND_FLAGS[command].includes(f));
  if (unknownFlag !== undefined) {
    io.err(`Unknown flag: --${unknownFlag}`);
    return 1;
  }

  if (command === 'version') {
    if (rest.length !== 0) {
      io.err('The version command does not take any arguments');
      return 1;
    }
    io.out(VERSION);
    return 0;
  }
  if (command === 'help') {
    io.out(USAGE);
    return 0;
  }

  if (rest.length !== 1) {
    io.err(`The ${command} command takes one argument: a path/to/rom`);
    return 1;
  }

  let rom: Uint8Array;
  try {
    rom = readRomFile(rest[0]);
  } catch (e) {
    if (!(e instanceof Chip8Error)) throw e;
    io.err(`error creating a new chip-8 VM: ${e.message}`);
    return 1;
  }
  debug(`loaded ${rest[0]} (${rom.length} bytes)`);

  if (command === 'disasm') {
    for (const line of disassemble(rom)) io.out(`${hexRaw(line.address, 4)}  ${hexRaw(line.word, 4)}  ${line.text}`);
    return 0;
  }

  const config = resolveConfig(args, io);
  if (!config) return 1;
  debug(`cpu ${config.cpuHz} Hz, timers ${config.timerHz} Hz, on error: ${config.onCpuError}`);
  const emu = Emulator.fromRom(rom);

  if (command === 'screenshot') return screenshot(emu, args, config, io);
  return runInTerminal(emu, { config, logger: io.logger });
}

// Environment first, then command-line overrides
function resolveConfig(args: ReturnType<typeof parseArgs>, io: CliIO): RuntimeConfig | undefined {
  const config = readConfigFromEnv(io.env);
  const refresh = args.flags.refresh;
  if (refresh !== undefined) {
    const hz = typeof refresh === 'string' ? parseRate(refresh) : undefined;
    if (hz === undefined) {
      io.err(`Invalid --refresh value: ${String(refresh)}`);
      return undefined;
    }
    config.cpuHz = hz;
  }
  const trace = flagString(args, 'trace');
  if (trace !== undefined) {
    const n = Number(trace);
    if (!Number.isInteger(n) || n < 0) {
      io.err(`Invalid --trace value: ${trace}`);
      return undefined;
    }
    config.traceEveryInstr = n;
  }
  return config;
}

// Headless: run a fixed number of instructions, then save the screen as PNG.
// Emulated time runs at 1000 instructions per second so `cycles` maps to whole milliseconds.
function screenshot(emu: Emulator, args: ReturnType<typeof parseArgs>, config: RuntimeConfig, io: CliIO): number {
  const outPath = flagString(args, 'out');
  if (!outPath) {
    io.err('screenshot requires --out=<file.png>');
    return 1;
  }
  const cycles = Number(flagString(args, 'cycles') ?? '600');
  const scale = Number(flagString(args, 'scale') ?? '8');
  if (!Number.isInteger(cycles) || cycles < 0 || !Number.isInteger(scale) || scale < 1) {
    io.err('--cycles must be a non-negative integer and --scale a positive integer');
    return 1;
  }

  const sched = new Scheduler(emu, {
    cpuHz: 1000,
    timerHz: config.timerHz,
    onCpuError: config.onCpuError,
    traceEveryInstr: config.traceEveryInstr,
    logger: io.logger,
  });
  const executed = sched.advance(cycles);
  writePng(emu.display, outPath, { scale });
  io.out(`[screenshot] Wrote ${outPath} (${SCREEN_WIDTH * scale}x${SCREEN_HEIGHT * scale}) after ${executed} cycles frame=${frameHash(emu.display)}`);
  return sched.halted ? 1 : 0;
}
