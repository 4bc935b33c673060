import type { IMemoryBus, RandomByteSource, Word } from '../emulator/types';
import { MemoryAccessError, StackOverflowError, StackUnderflowError, UnknownOpcodeError } from '../emulator/errors';
import type { Framebuffer } from '../display/framebuffer';
import type { Keypad } from '../input/keypad';
import type { Timers } from '../timers/timers';
import { MEMORY_MAP, FONT_GLYPH_BYTES } from '../memory/memoryMap';
import { decodeInstruction } from './decoder';
import { touchesDisplay, type Instruction } from './instructions';

export const STACK_DEPTH = 16;
const VF = 0xf;

export interface CPUState {
  V: Uint8Array; // V0..VF
  I: Word; // index register
  PC: Word; // next instruction
  SP: number; // number of return addresses on the stack
  stack: Uint16Array;
  opcode: Word; // last fetched word
}

// Everything an instruction may touch besides the register file
export interface CPUPorts {
  memory: IMemoryBus;
  display: Framebuffer;
  keypad: Keypad;
  timers: Timers;
  random: RandomByteSource;
}

export interface StepResult {
  address: Word;
  opcode: Word;
  instruction: Instruction;
  redraw: boolean;
}

function initialState(): CPUState {
  return {
    V: new Uint8Array(16),
    I: 0,
    PC: MEMORY_MAP.PROGRAM_START,
    SP: 0,
    stack: new Uint16Array(STACK_DEPTH),
    opcode: 0,
  };
}

export class Chip8CPU {
  state: CPUState = initialState();

  constructor(private readonly ports: CPUPorts) {}

  reset(): void {
    this.state = initialState();
  }

  // Fetch the big-endian word at PC, decode and execute it.
  stepInstruction(): StepResult {
    const address = this.state.PC;
    const opcode = this.ports.memory.read16(address);
    this.state.opcode = opcode;
    const instruction = decodeInstruction(opcode);
    this.execute(instruction);
    return { address, opcode, instruction, redraw: touchesDisplay(instruction) };
  }

  /**
   * Execute one decoded instruction. Each handler leaves PC on the next
   * instruction itself: +2, +4 when skipping, or an absolute target.
   */
  execute(instr: Instruction): void {
    const s = this.state;
    const V = s.V;
    const { memory, display, keypad, timers } = this.ports;

    switch (instr.op) {
      case 'CLS':
        display.clear();
        this.next();
        return;
      case 'RET':
        if (s.SP === 0) throw new StackUnderflowError(s.PC);
        s.SP--;
        s.PC = (s.stack[s.SP] + 2) & 0xffff;
        return;
      case 'JP':
        s.PC = instr.nnn;
        return;
      case 'CALL':
        if (s.SP >= STACK_DEPTH) throw new StackOverflowError(s.PC, STACK_DEPTH);
        s.stack[s.SP] = s.PC;
        s.SP++;
        s.PC = instr.nnn;
        return;
      case 'SE_VX_NN':
        this.skipIf(V[instr.x] === instr.nn);
        return;
      case 'SNE_VX_NN':
        this.skipIf(V[instr.x] !== instr.nn);
        return;
      case 'SE_VX_VY':
        this.skipIf(V[instr.x] === V[instr.y]);
        return;
      case 'SNE_VX_VY':
        this.skipIf(V[instr.x] !== V[instr.y]);
        return;
      case 'LD_VX_NN':
        V[instr.x] = instr.nn;
        this.next();
        return;
      case 'ADD_VX_NN':
        V[instr.x] = (V[instr.x] + instr.nn) & 0xff;
        this.next();
        return;

      // 8XY_ ALU. The flag is written after the result so VF ends up holding the flag.
      case 'LD_VX_VY':
        V[instr.x] = V[instr.y];
        this.next();
        return;
      case 'OR':
        V[instr.x] |= V[instr.y];
        this.next();
        return;
      case 'AND':
        V[instr.x] &= V[instr.y];
        this.next();
        return;
      case 'XOR':
        V[instr.x] ^= V[instr.y];
        this.next();
        return;
      case 'ADD_VX_VY': {
        const sum = V[instr.x] + V[instr.y];
        this.setWithFlag(instr.x, sum & 0xff, sum > 0xff ? 1 : 0);
        return;
      }
      case 'SUB': {
        const a = V[instr.x];
        const b = V[instr.y];
        this.setWithFlag(instr.x, (a - b) & 0xff, b > a ? 0 : 1);
        return;
      }
      case 'SHR': {
        const src = V[instr.y];
        this.setWithFlag(instr.x, src >>> 1, src & 0x01);
        return;
      }
      case 'SUBN': {
        const a = V[instr.x];
        const b = V[instr.y];
        this.setWithFlag(instr.x, (b - a) & 0xff, a > b ? 0 : 1);
        return;
      }
      case 'SHL': {
        const src = V[instr.y];
        this.setWithFlag(instr.x, (src << 1) & 0xff, (src >>> 7) & 0x01);
        return;
      }

      case 'LD_I':
        s.I = instr.nnn;
        this.next();
        return;
      case 'JP_V0':
        s.PC = (instr.nnn + V[0]) & 0xffff;
        return;
      case 'RND':
        V[instr.x] = this.ports.random() & instr.nn & 0xff;
        this.next();
        return;
      case 'DRW': {
        const rows = new Uint8Array(instr.n);
        for (let r = 0; r < instr.n; r++) rows[r] = memory.read8(s.I + r);
        const collision = display.drawSprite(V[instr.x], V[instr.y], rows);
        V[VF] = collision ? 1 : 0;
        this.next();
        return;
      }
      case 'SKP':
        this.skipIf(keypad.isDown(V[instr.x] & 0xf));
        return;
      case 'SKNP':
        this.skipIf(!keypad.isDown(V[instr.x] & 0xf));
        return;

      case 'LD_VX_DT':
        V[instr.x] = timers.delay;
        this.next();
        return;
      case 'LD_VX_K': {
        // Re-executed every cycle until a key is down
        const key = keypad.firstDown();
        if (key === undefined) return;
        V[instr.x] = key;
        this.next();
        return;
      }
      case 'LD_DT_VX':
        timers.setDelay(V[instr.x]);
        this.next();
        return;
      case 'LD_ST_VX':
        timers.setSound(V[instr.x]);
        this.next();
        return;
      case 'ADD_I_VX':
        s.I = (s.I + V[instr.x]) & 0xffff;
        this.next();
        return;
      case 'LD_F_VX':
        s.I = MEMORY_MAP.FONT_START + (V[instr.x] & 0xf) * FONT_GLYPH_BYTES;
        this.next();
        return;
      case 'LD_B_VX': {
        this.checkSpan(s.I, 3);
        const val = V[instr.x];
        memory.write8(s.I, Math.floor(val / 100));
        memory.write8(s.I + 1, Math.floor(val / 10) % 10);
        memory.write8(s.I + 2, val % 10);
        this.next();
        return;
      }
      case 'LD_MEM_VX':
        this.checkSpan(s.I, instr.x + 1);
        for (let r = 0; r <= instr.x; r++) memory.write8(s.I + r, V[r]);
        this.next();
        return;
      case 'LD_VX_MEM':
        this.checkSpan(s.I, instr.x + 1);
        for (let r = 0; r <= instr.x; r++) V[r] = memory.read8(s.I + r);
        this.next();
        return;

      case 'UNKNOWN': {
        const at = s.PC;
        this.next();
        throw new UnknownOpcodeError(instr.word, at);
      }
      default: {
        const unreachable: never = instr;
        throw new Error(`Unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private next(): void {
    this.state.PC = (this.state.PC + 2) & 0xffff;
  }

  private skipIf(cond: boolean): void {
    this.state.PC = (this.state.PC + (cond ? 4 : 2)) & 0xffff;
  }

  // Bulk transfers fail before touching anything when the span leaves memory
  private checkSpan(start: number, length: number): void {
    const last = start + length - 1;
    if (last > MEMORY_MAP.END) throw new MemoryAccessError(Math.max(start, MEMORY_MAP.END + 1));
  }

  private setWithFlag(x: number, value: number, flag: number): void {
    this.state.V[x] = value;
    this.state.V[VF] = flag;
    this.next();
  }
}
