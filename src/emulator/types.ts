export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface IMemoryBus {
  read8(addr: number): Byte;
  read16(addr: number): Word; // big-endian: high byte first
  write8(addr: number, value: Byte): void;
  write16(addr: number, value: Word): void;
}

// Supplies CXNN with random bytes; must return 0..255
export type RandomByteSource = () => Byte;

export interface IEmulator {
  reset(): void;
  stepInstruction(): void; // fetch, decode and execute exactly one instruction
  tickTimers(): void; // one 60 Hz timer tick
}
