import type { Emulator } from './core';
import { Chip8Error } from './errors';
import { DEFAULT_CONFIG, type CpuErrorMode } from './config';
import { consoleLogger, type Logger } from './log';
import { formatInstruction } from '../cpu/disasm';
import { hexRaw } from '../utils/format';

export interface SchedulerOptions {
  cpuHz?: number;
  timerHz?: number;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
  logger?: Logger;
  signal?: AbortSignal; // aborting stops the loops at the next boundary
  onCycle?: (ev: CycleEvent) => void;
}

export interface CycleEvent {
  redraw: boolean; // false means "nothing to present, re-poll input"
  error?: Chip8Error;
}

// Longest wall-clock gap a single real-time tick will catch up on
const MAX_CATCHUP_MS = 250;

// Drives the VM with split cadences: instructions at cpuHz and timers at timerHz,
// interleaved in time order. Deterministic through stepCycle/advance; start() adds a
// Node timer that feeds advance() from wall-clock time.
export class Scheduler {
  readonly cpuHz: number;
  readonly timerHz: number;
  private onCpuError: CpuErrorMode;
  private traceEveryInstr: number;
  private logger: Logger;
  private onCycle?: (ev: CycleEvent) => void;
  public lastCpuError: Chip8Error | undefined;
  private haltedFlag = false;
  private stopRequested = false;
  private execCount = 0;
  private cpuAcc = 0; // ms * cpuHz owed
  private timerAcc = 0; // ms * timerHz owed
  private interval: ReturnType<typeof setInterval> | undefined;
  private lastWallTime = 0;
  private stopped: Promise<void> = Promise.resolve();
  private resolveStopped: () => void = () => {};
  private detachSignal: () => void = () => {};

  constructor(private readonly emu: Emulator, opts: SchedulerOptions = {}) {
    this.cpuHz = opts.cpuHz ?? DEFAULT_CONFIG.cpuHz;
    this.timerHz = opts.timerHz ?? DEFAULT_CONFIG.timerHz;
    if (!(this.cpuHz > 0) || !(this.timerHz > 0)) throw new RangeError(`Rates must be positive (cpuHz=${this.cpuHz}, timerHz=${this.timerHz})`);
    this.onCpuError = opts.onCpuError ?? DEFAULT_CONFIG.onCpuError;
    this.traceEveryInstr = Math.max(0, opts.traceEveryInstr ?? 0) | 0;
    this.logger = opts.logger ?? consoleLogger;
    this.onCycle = opts.onCycle;
    const signal = opts.signal;
    if (signal) {
      if (signal.aborted) {
        this.stopRequested = true;
      } else {
        const onAbort = (): void => this.stop('aborted');
        signal.addEventListener('abort', onAbort, { once: true });
        this.detachSignal = () => signal.removeEventListener('abort', onAbort);
      }
    }
  }

  get halted(): boolean { return this.haltedFlag; }
  get running(): boolean { return this.interval !== undefined; }
  get instructionsExecuted(): number { return this.execCount; }

  // Execute exactly one instruction, applying the error policy.
  stepCycle(): CycleEvent {
    let ev: CycleEvent;
    try {
      const res = this.emu.stepInstruction();
      this.execCount++;
      if (this.traceEveryInstr > 0 && this.execCount % this.traceEveryInstr === 0) {
        const s = this.emu.cpu.state;
        this.logger.log(`[TRACE] PC=${hexRaw(res.address, 4)} OP=${hexRaw(res.opcode, 4)} ${formatInstruction(res.instruction).padEnd(16)} I=${hexRaw(s.I, 4)} SP=${s.SP} VF=${hexRaw(s.V[0xf], 2)}`);
      }
      ev = { redraw: res.redraw };
    } catch (e) {
      if (!(e instanceof Chip8Error) || this.onCpuError === 'throw') throw e;
      this.execCount++;
      this.lastCpuError = e;
      if (e.fatal) {
        this.logger.error(`[scheduler] ${e.message}; halting`);
        this.halt();
      } else if (this.onCpuError === 'record') {
        this.logger.warn(`[scheduler] ${e.message}`);
      }
      ev = { redraw: false, error: e };
    }
    this.onCycle?.(ev);
    return ev;
  }

  tickTimers(): void {
    this.emu.tickTimers();
  }

  /**
   * Account for `ms` of emulated time, running every instruction and timer tick that
   * falls due, in time order (ties go to the CPU). Stops early on halt or stop().
   * @returns number of instructions executed
   */
  advance(ms: number): number {
    if (this.haltedFlag || this.stopRequested || !(ms > 0)) return 0;
    this.cpuAcc += ms * this.cpuHz;
    this.timerAcc += ms * this.timerHz;
    let cycles = 0;
    while (!this.haltedFlag && !this.stopRequested) {
      const cpuDue = this.cpuAcc >= 1000;
      const timerDue = this.timerAcc >= 1000;
      if (!cpuDue && !timerDue) break;
      // Whichever fell due longer ago goes first
      if (cpuDue && (!timerDue || (this.cpuAcc - 1000) * this.timerHz >= (this.timerAcc - 1000) * this.cpuHz)) {
        this.cpuAcc -= 1000;
        this.stepCycle();
        cycles++;
      } else {
        this.timerAcc -= 1000;
        this.tickTimers();
      }
    }
    return cycles;
  }

  /**
   * Move emulated time forward to the next instruction slot, ticking the timers that
   * fall due before it. The caller then runs that instruction with stepCycle().
   * @returns false once halted or stopped
   */
  seekNextInstruction(): boolean {
    if (this.haltedFlag || this.stopRequested) return false;
    const owed = Math.max(0, 1000 - this.cpuAcc);
    this.cpuAcc += owed;
    this.timerAcc += (owed * this.timerHz) / this.cpuHz;
    while (this.timerAcc > 1000) {
      this.timerAcc -= 1000;
      this.tickTimers();
    }
    this.cpuAcc -= 1000;
    return true;
  }

  start(): void {
    if (this.interval || this.haltedFlag || this.stopRequested) return;
    this.stopped = new Promise<void>((resolve) => { this.resolveStopped = resolve; });
    this.lastWallTime = Date.now();
    const period = Math.max(1, Math.floor(1000 / Math.max(this.cpuHz, this.timerHz)));
    this.interval = setInterval(() => {
      const now = Date.now();
      const elapsed = Math.min(MAX_CATCHUP_MS, now - this.lastWallTime);
      this.lastWallTime = now;
      try {
        this.advance(elapsed);
      } catch (e) {
        // An error here has no caller to reach; end the run instead
        if (e instanceof Chip8Error) this.lastCpuError = e;
        this.logger.error(`[scheduler] ${e instanceof Error ? e.message : String(e)}; halting`);
        this.halt();
        return;
      }
      if (this.haltedFlag || this.stopRequested) this.cancelTimer();
    }, period);
    this.logger.log(`[scheduler] running at ${this.cpuHz} Hz (timers ${this.timerHz} Hz)`);
  }

  // Cooperative shutdown: no instruction is interrupted, the loop ends at its next boundary
  stop(reason = 'stop requested'): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.logger.log(`[scheduler] ${reason} - gracefully shutting down...`);
    this.detachSignal();
    this.cancelTimer();
  }

  // Resolves once a started loop has stopped or halted
  whenStopped(): Promise<void> {
    return this.stopped;
  }

  private halt(): void {
    this.haltedFlag = true;
    this.detachSignal();
    this.cancelTimer();
  }

  private cancelTimer(): void {
    if (this.interval === undefined) return;
    clearInterval(this.interval);
    this.interval = undefined;
    this.resolveStopped();
  }
}
