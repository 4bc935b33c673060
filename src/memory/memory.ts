import type { IMemoryBus, Byte, Word } from '../emulator/types';
import { MemoryAccessError, RomTooLargeError } from '../emulator/errors';
import { hexRaw } from '../utils/format';
import { MEMORY_MAP, MAX_ROM_SIZE } from './memoryMap';
import FONT_SET from './fontset.json';

export class Memory implements IMemoryBus {
  private mem = new Uint8Array(MEMORY_MAP.SIZE);

  constructor() {
    this.loadFontSet();
  }

  // Zero everything, then restore the font. The caller reloads the ROM.
  reset(): void {
    this.mem.fill(0);
    this.loadFontSet();
  }

  loadRom(rom: Uint8Array): void {
    if (rom.length > MAX_ROM_SIZE) throw new RomTooLargeError(rom.length, MAX_ROM_SIZE);
    this.mem.set(rom, MEMORY_MAP.PROGRAM_START);
  }

  read8(addr: number): Byte {
    return this.mem[this.check(addr)];
  }

  read16(addr: number): Word {
    const hi = this.read8(addr);
    const lo = this.read8(addr + 1);
    return ((hi << 8) | lo) & 0xffff;
  }

  write8(addr: number, value: Byte): void {
    this.mem[this.check(addr)] = value & 0xff;
  }

  write16(addr: number, value: Word): void {
    this.write8(addr, (value >>> 8) & 0xff);
    this.write8(addr + 1, value & 0xff);
  }

  snapshot(): Uint8Array {
    return this.mem.slice();
  }

  // 16 bytes per row: "0200: 6A 05 A1 23 ..."
  dump(start: number, length: number): string {
    const lines: string[] = [];
    for (let row = start; row < start + length; row += 16) {
      const bytes: string[] = [];
      for (let a = row; a < Math.min(row + 16, start + length); a++) bytes.push(hexRaw(this.read8(a), 2));
      lines.push(`${hexRaw(row, 4)}: ${bytes.join(' ')}`);
    }
    return lines.join('\n');
  }

  private check(addr: number): number {
    if (!Number.isInteger(addr) || addr < 0 || addr > MEMORY_MAP.END) throw new MemoryAccessError(addr);
    return addr;
  }

  private loadFontSet(): void {
    this.mem.set(FONT_SET, MEMORY_MAP.FONT_START);
  }
}
