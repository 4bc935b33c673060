import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { makeEmu, steps } from '../helpers/program';

describe('CPU: DXYN sprite drawing', () => {
  it('draws the font glyph for 0 and reports no collision', () => {
    const emu = makeEmu([0xa000, 0x6000, 0x6100, 0xd015]);
    steps(emu, 4);
    const fb = emu.display;
    expect([0, 1, 2, 3, 4].map((x) => fb.getPixel(x, 0))).toEqual([1, 1, 1, 1, 0]);
    expect([0, 1, 2, 3].map((x) => fb.getPixel(x, 1))).toEqual([1, 0, 0, 1]);
    expect(fb.countLit()).toBe(14);
    expect(emu.cpu.state.V[0xf]).toBe(0);
    expect(emu.redrawNeeded).toBe(true);
  });

  it('drawing the same sprite again erases it and sets VF', () => {
    const emu = makeEmu([0xa000, 0x6000, 0x6100, 0xd015, 0xd015]);
    steps(emu, 5);
    expect(emu.display.countLit()).toBe(0);
    expect(emu.cpu.state.V[0xf]).toBe(1);
  });

  it('clips at the right edge instead of wrapping', () => {
    const emu = makeEmu([0xa000, 0x603e, 0x6100, 0xd011]);
    steps(emu, 4);
    const fb = emu.display;
    expect(fb.getPixel(62, 0)).toBe(1);
    expect(fb.getPixel(63, 0)).toBe(1);
    expect(fb.getPixel(0, 0)).toBe(0);
    expect(fb.getPixel(1, 0)).toBe(0);
    expect(fb.countLit()).toBe(2);
  });

  it('clips at the bottom edge', () => {
    const emu = makeEmu([0xa000, 0x6000, 0x611e, 0xd015]);
    steps(emu, 4);
    expect(emu.display.countLit()).toBe(6);
    expect(emu.display.getPixel(0, 0)).toBe(0);
  });

  it('00E0 clears the screen and requests a redraw', () => {
    const emu = makeEmu([0xa000, 0xd005, 0x00e0]);
    steps(emu, 2);
    expect(emu.display.countLit()).toBeGreaterThan(0);
    emu.stepInstruction();
    expect(emu.display.countLit()).toBe(0);
    expect(emu.redrawNeeded).toBe(true);
    expect(emu.cpu.state.PC).toBe(0x206);
  });

  it('Property: drawing a sprite twice restores a blank screen', () => {
    const rows = fc.uint8Array({ minLength: 1, maxLength: 15 });
    const coord = fc.integer({ min: 0, max: 63 });
    const row = fc.integer({ min: 0, max: 31 });
    fc.assert(fc.property(rows, coord, row, (sprite, x, y) => {
      const emu = makeEmu([0xa300, 0x6000 | x, 0x6100 | y, 0xd010 | sprite.length, 0xd010 | sprite.length]);
      sprite.forEach((b, i) => emu.memory.write8(0x300 + i, b));
      steps(emu, 4);
      const litAfterFirst = emu.display.countLit();
      emu.stepInstruction();
      expect(emu.display.countLit()).toBe(0);
      expect(emu.cpu.state.V[0xf]).toBe(litAfterFirst > 0 ? 1 : 0);
    }), { numRuns: 200 });
  });
});
