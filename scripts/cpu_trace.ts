#!/usr/bin/env tsx
/*
CPU trace generator: runs a ROM and emits a JSONL instruction-by-instruction trace with the
pre-instruction CPU state. Timers tick between instructions at CHIP8_CPU_HZ / CHIP8_TIMER_HZ,
the same way the scheduler runs a ROM.

Usage:
  tsx scripts/cpu_trace.ts --rom=path/to.ch8 --maxSteps=NNN [--out=trace.jsonl]

Each JSON line contains:
  { step, PC, OP, ASM, I, SP, V, DT, ST }
*/
import fs from 'fs';
import { parseArgs, flagString } from '../src/cli/args';
import { readRomFile } from '../src/rom/loader';
import { Emulator } from '../src/emulator/core';
import { readConfigFromEnv } from '../src/emulator/config';
import { consoleLogger } from '../src/emulator/log';
import { Chip8Error } from '../src/emulator/errors';
import { traceRom } from '../src/tools/trace';

function main(): number {
  const args = parseArgs(process.argv.slice(2));
  const romPath = flagString(args, 'rom');
  if (!romPath) {
    console.error('Error: --rom=path/to.ch8 is required');
    return 2;
  }
  const maxStepsRaw = flagString(args, 'maxSteps') ?? '1000';
  const maxSteps = Number(maxStepsRaw);
  if (!Number.isInteger(maxSteps) || maxSteps < 0) {
    console.error(`Error: --maxSteps must be a non-negative integer, got ${maxStepsRaw}`);
    return 2;
  }
  const outPath = flagString(args, 'out');

  let emu: Emulator;
  try {
    emu = Emulator.fromRom(readRomFile(romPath));
  } catch (e) {
    if (!(e instanceof Chip8Error)) throw e;
    console.error(`[trace] ${e.message}`);
    return 1;
  }

  const { records, halted } = traceRom(emu, { maxSteps, config: readConfigFromEnv(), logger: consoleLogger });
  const text = records.map((r) => JSON.stringify(r)).join('\n') + '\n';
  if (outPath) {
    fs.writeFileSync(outPath, text);
    console.log(`Wrote ${records.length} steps to ${outPath}`);
  } else {
    process.stdout.write(text);
  }
  return halted ? 1 : 0;
}

process.exitCode = main();
