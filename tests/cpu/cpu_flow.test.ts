import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { makeEmu, steps } from '../helpers/program';
import { StackOverflowError, StackUnderflowError, UnknownOpcodeError } from '../../src/emulator/errors';
import { STACK_DEPTH } from '../../src/cpu/cpu';

describe('CPU: jumps and subroutines', () => {
  it('1NNN jumps to NNN', () => {
    const emu = makeEmu([0x1208]);
    emu.stepInstruction();
    expect(emu.cpu.state.PC).toBe(0x208);
  });

  it('BNNN jumps to NNN + V0 without a further advance', () => {
    const emu = makeEmu([0x6004, 0xb300]);
    steps(emu, 2);
    expect(emu.cpu.state.PC).toBe(0x304);
  });

  it('2NNN pushes the call address and 00EE resumes after it', () => {
    const emu = makeEmu([0x2206, 0x6a01, 0x1202, 0x00ee]);
    emu.stepInstruction();
    expect(emu.cpu.state.PC).toBe(0x206);
    expect(emu.cpu.state.SP).toBe(1);
    expect(emu.cpu.state.stack[0]).toBe(0x200);
    emu.stepInstruction();
    expect(emu.cpu.state.PC).toBe(0x202);
    expect(emu.cpu.state.SP).toBe(0);
  });

  it('Property: call then return lands on the word after the call', () => {
    const evenAddr = fc.integer({ min: 0x101, max: 0x7fe }).map((n) => n * 2);
    fc.assert(fc.property(evenAddr, evenAddr, (callAt, target) => {
      fc.pre(callAt !== target);
      const emu = makeEmu([0x1000 | callAt]);
      emu.memory.write16(callAt, 0x2000 | target);
      emu.memory.write16(target, 0x00ee);
      steps(emu, 3);
      expect(emu.cpu.state.PC).toBe(callAt + 2);
      expect(emu.cpu.state.SP).toBe(0);
    }), { numRuns: 200 });
  });

  it('the 17th nested call overflows without touching state', () => {
    const emu = makeEmu([0x2200]);
    steps(emu, STACK_DEPTH);
    expect(emu.cpu.state.SP).toBe(16);
    expect(() => emu.stepInstruction()).toThrow(StackOverflowError);
    expect(emu.cpu.state.SP).toBe(16);
    expect(emu.cpu.state.PC).toBe(0x200);
  });

  it('return with an empty stack underflows', () => {
    const emu = makeEmu([0x00ee]);
    expect(() => emu.stepInstruction()).toThrow(StackUnderflowError);
    expect(emu.cpu.state.PC).toBe(0x200);
    expect(emu.cpu.state.SP).toBe(0);
  });
});

describe('CPU: conditional skips', () => {
  it('3XNN skips when equal', () => {
    const emu = makeEmu([0x6005, 0x3005]);
    steps(emu, 2);
    expect(emu.cpu.state.PC).toBe(0x206);
  });

  it('3XNN does not skip when different', () => {
    const emu = makeEmu([0x6005, 0x3006]);
    steps(emu, 2);
    expect(emu.cpu.state.PC).toBe(0x204);
  });

  it('4XNN skips when different', () => {
    const emu = makeEmu([0x6005, 0x4006]);
    steps(emu, 2);
    expect(emu.cpu.state.PC).toBe(0x206);
  });

  it('5XY0 compares registers', () => {
    const eq = makeEmu([0x6005, 0x6105, 0x5010]);
    steps(eq, 3);
    expect(eq.cpu.state.PC).toBe(0x208);
    const ne = makeEmu([0x6005, 0x6106, 0x5010]);
    steps(ne, 3);
    expect(ne.cpu.state.PC).toBe(0x206);
  });

  it('9XY0 skips when registers differ', () => {
    const ne = makeEmu([0x6005, 0x6106, 0x9010]);
    steps(ne, 3);
    expect(ne.cpu.state.PC).toBe(0x208);
    const eq = makeEmu([0x6005, 0x6105, 0x9010]);
    steps(eq, 3);
    expect(eq.cpu.state.PC).toBe(0x206);
  });
});

describe('CPU: unknown opcodes', () => {
  for (const word of [0x0123, 0x5121, 0x8008, 0x9011, 0xe000, 0xf0ff]) {
    it(`0x${word.toString(16).padStart(4, '0')} advances PC and reports the word`, () => {
      const emu = makeEmu([word]);
      let err: unknown;
      try {
        emu.stepInstruction();
      } catch (e) {
        err = e;
      }
      expect(err).toBeInstanceOf(UnknownOpcodeError);
      expect(err instanceof UnknownOpcodeError && err.opcode).toBe(word);
      expect(err instanceof UnknownOpcodeError && err.fatal).toBe(false);
      expect(emu.cpu.state.PC).toBe(0x202);
    });
  }

  it('formats the message with the word and its address', () => {
    const emu = makeEmu([0x5121]);
    expect(() => emu.stepInstruction()).toThrow('Unknown opcode 0x5121 at 0x0200');
  });
});
