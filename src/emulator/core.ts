import type { IEmulator, RandomByteSource } from './types';
import { Memory } from '../memory/memory';
import { Chip8CPU, type StepResult } from '../cpu/cpu';
import { Framebuffer, type FrameView } from '../display/framebuffer';
import { Keypad, type KeypadState } from '../input/keypad';
import { Timers, type TimerView } from '../timers/timers';
import { Mailbox, type AudioSignal } from '../audio/mailbox';
import { hexRaw } from '../utils/format';

export interface EmulatorOptions {
  random?: RandomByteSource;
}

export const defaultRandom: RandomByteSource = () => Math.floor(Math.random() * 256) & 0xff;

// The whole VM as one owned aggregate. Collaborators read the framebuffer and timers,
// write the keypad and drain the audio mailbox; only the CPU mutates the rest.
export class Emulator implements IEmulator {
  readonly memory = new Memory();
  readonly keypad = new Keypad();
  readonly audio = new Mailbox<AudioSignal>();
  readonly cpu: Chip8CPU;
  private readonly framebuffer = new Framebuffer();
  private readonly timerState = new Timers(this.audio);
  private readonly rom: Uint8Array;
  private drawFlag = false;

  constructor(rom: Uint8Array, opts: EmulatorOptions = {}) {
    this.rom = rom.slice();
    this.cpu = new Chip8CPU({
      memory: this.memory,
      display: this.framebuffer,
      keypad: this.keypad,
      timers: this.timerState,
      random: opts.random ?? defaultRandom,
    });
    this.memory.loadRom(this.rom);
  }

  // Throws RomTooLargeError when the image does not fit above 0x200
  static fromRom(rom: Uint8Array, opts: EmulatorOptions = {}): Emulator {
    return new Emulator(rom, opts);
  }

  reset(): void {
    this.memory.reset();
    this.memory.loadRom(this.rom);
    this.cpu.reset();
    this.framebuffer.clear();
    this.keypad.releaseAll();
    this.timerState.reset();
    this.audio.clear();
    this.drawFlag = false;
  }

  /**
   * One fetch/decode/execute. The redraw flag is cleared first, so when the
   * instruction throws it stays false.
   */
  stepInstruction(): StepResult {
    this.drawFlag = false;
    const result = this.cpu.stepInstruction();
    this.drawFlag = result.redraw;
    return result;
  }

  tickTimers(): void {
    this.timerState.tick();
  }

  setKeypadState(state: KeypadState): void {
    this.keypad.setState(state);
  }

  get display(): FrameView { return this.framebuffer; }
  get timers(): TimerView { return this.timerState; }
  get redrawNeeded(): boolean { return this.drawFlag; }
  get delayTimer(): number { return this.timerState.delay; }
  get soundTimer(): number { return this.timerState.sound; }

  debugState(): string {
    const s = this.cpu.state;
    const regs = Array.from(s.V, (v, i) => `V${i.toString(16).toUpperCase()}=${hexRaw(v, 2)}`);
    return [
      `opcode: ${hexRaw(s.opcode, 4)}`,
      `pc: ${hexRaw(s.PC, 4)}`,
      `sp: ${s.SP}`,
      `i: ${hexRaw(s.I, 4)}`,
      `dt: ${this.timerState.delay} st: ${this.timerState.sound}`,
      regs.slice(0, 8).join(' '),
      regs.slice(8).join(' '),
    ].join('\n');
  }
}
