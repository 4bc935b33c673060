import type { Emulator } from '../emulator/core';
import { Scheduler } from '../emulator/scheduler';
import { DEFAULT_CONFIG, type RuntimeConfig } from '../emulator/config';
import { silentLogger, type Logger } from '../emulator/log';
import { decodeInstruction } from '../cpu/decoder';
import { formatInstruction } from '../cpu/disasm';
import { MEMORY_MAP } from '../memory/memoryMap';

// Pre-instruction state for one traced step
export interface TraceRecord {
  step: number;
  PC: number;
  OP: number;
  ASM: string;
  I: number;
  SP: number;
  V: number[];
  DT: number;
  ST: number;
}

export interface TraceOptions {
  maxSteps: number;
  config?: Partial<RuntimeConfig>;
  logger?: Logger;
}

export interface TraceResult {
  records: TraceRecord[];
  halted: boolean;
}

/**
 * Run up to maxSteps instructions, timers interleaved at the configured rates as the
 * real-time scheduler would, and capture the state before each one.
 */
export function traceRom(emu: Emulator, opts: TraceOptions): TraceResult {
  const config = { ...DEFAULT_CONFIG, ...opts.config };
  const sched = new Scheduler(emu, {
    cpuHz: config.cpuHz,
    timerHz: config.timerHz,
    onCpuError: config.onCpuError,
    logger: opts.logger ?? silentLogger,
  });
  const records: TraceRecord[] = [];

  for (let step = 0; step < opts.maxSteps && sched.seekNextInstruction(); step++) {
    const s = emu.cpu.state;
    if (s.PC < MEMORY_MAP.END) {
      const op = emu.memory.read16(s.PC);
      records.push({
        step,
        PC: s.PC,
        OP: op,
        ASM: formatInstruction(decodeInstruction(op)),
        I: s.I,
        SP: s.SP,
        V: Array.from(s.V),
        DT: emu.delayTimer,
        ST: emu.soundTimer,
      });
    }
    sched.stepCycle();
  }
  return { records, halted: sched.halted };
}
