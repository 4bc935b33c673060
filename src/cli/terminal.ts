import type { Emulator } from '../emulator/core';
import type { FrameView } from '../display/framebuffer';
import type { Keypad } from '../input/keypad';
import type { Mailbox, AudioSignal } from '../audio/mailbox';
import { Scheduler } from '../emulator/scheduler';
import type { RuntimeConfig } from '../emulator/config';
import type { Logger } from '../emulator/log';
import { renderText } from '../display/render';
import { keyForChar } from '../input/layout';

// The parts of stdin/stdout the terminal front end uses
export interface TextOutput {
  write(text: string): unknown;
}

export interface KeyInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

const ESC = '\u001b';
const CTRL_C = '\u0003';

// Text renderer: two block characters per cell so the 64x32 screen keeps its aspect ratio
export class TerminalDisplay {
  constructor(private readonly out: TextOutput) {}

  begin(): void {
    this.out.write(`${ESC}[?25l${ESC}[2J`);
  }

  draw(fb: FrameView): void {
    this.out.write(`${ESC}[H` + renderText(fb, '██', '  ') + '\n');
  }

  end(): void {
    this.out.write(`${ESC}[?25h\n`);
  }
}

export interface TerminalKeypadOptions {
  releaseMs?: number;
  onQuit?: () => void;
}

// Terminals only report key presses (and auto-repeat), never releases, so a key stays
// down until no repeat has arrived for releaseMs.
export class TerminalKeypad {
  private readonly releaseMs: number;
  private readonly onQuit?: () => void;
  private releaseTimers = new Map<number, ReturnType<typeof setTimeout>>();
  private input: KeyInput | undefined;
  private readonly listener = (chunk: Buffer | string): void => this.handleData(chunk.toString());

  constructor(private readonly keypad: Keypad, opts: TerminalKeypadOptions = {}) {
    this.releaseMs = opts.releaseMs ?? 200;
    this.onQuit = opts.onQuit;
  }

  handleData(chunk: string): void {
    if (chunk === CTRL_C || chunk === ESC) {
      this.onQuit?.();
      return;
    }
    for (const ch of chunk) {
      const key = keyForChar(ch);
      if (key === undefined) continue;
      this.keypad.setKey(key, true);
      const prev = this.releaseTimers.get(key);
      if (prev) clearTimeout(prev);
      this.releaseTimers.set(key, setTimeout(() => {
        this.releaseTimers.delete(key);
        this.keypad.setKey(key, false);
      }, this.releaseMs));
    }
  }

  attach(input: KeyInput): void {
    this.input = input;
    if (input.isTTY) input.setRawMode?.(true);
    input.on('data', this.listener);
    input.resume();
  }

  detach(): void {
    for (const t of this.releaseTimers.values()) clearTimeout(t);
    this.releaseTimers.clear();
    if (!this.input) return;
    this.input.off('data', this.listener);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
    this.input = undefined;
  }
}

// Audio collaborator: one terminal bell per expired sound timer
export class BellAudio {
  constructor(private readonly mailbox: Mailbox<AudioSignal>, private readonly out: TextOutput) {}

  poll(): boolean {
    if (this.mailbox.take() === undefined) return false;
    this.out.write('\u0007');
    return true;
  }
}

export interface TerminalSessionOptions {
  config: RuntimeConfig;
  logger: Logger;
  input?: KeyInput;
  output?: TextOutput;
}

// Runs the VM in real time against the terminal until quit or a fatal error.
// Resolves to the process exit code.
export async function runInTerminal(emu: Emulator, opts: TerminalSessionOptions): Promise<number> {
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;
  let dirty = true;
  const sched = new Scheduler(emu, {
    cpuHz: opts.config.cpuHz,
    timerHz: opts.config.timerHz,
    onCpuError: opts.config.onCpuError,
    traceEveryInstr: opts.config.traceEveryInstr,
    logger: opts.logger,
    onCycle: (ev) => { if (ev.redraw) dirty = true; },
  });
  const display = new TerminalDisplay(output);
  const keys = new TerminalKeypad(emu.keypad, { onQuit: () => sched.stop('exit signal detected') });
  const bell = new BellAudio(emu.audio, output);
  const onSigint = (): void => sched.stop('SIGINT received');

  display.begin();
  keys.attach(input);
  process.once('SIGINT', onSigint);
  const frame = setInterval(() => {
    if (dirty) {
      dirty = false;
      display.draw(emu.display);
    }
    bell.poll();
  }, Math.floor(1000 / 60));

  try {
    sched.start();
    await sched.whenStopped();
  } finally {
    clearInterval(frame);
    process.off('SIGINT', onSigint);
    keys.detach();
    display.end();
  }
  return sched.halted ? 1 : 0;
}
