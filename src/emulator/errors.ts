import type { Word } from './types';
import { hex } from '../utils/format';

// Base class for every condition the VM reports. Fatal errors leave the machine in a
// state it cannot continue from; the scheduler halts on them.
export class Chip8Error extends Error {
  readonly fatal: boolean;

  constructor(message: string, fatal: boolean) {
    super(message);
    this.name = new.target.name;
    this.fatal = fatal;
  }
}

export class RomTooLargeError extends Chip8Error {
  constructor(readonly size: number, readonly maxSize: number) {
    super(`ROM too large: ${size} bytes (max ${maxSize})`, true);
  }
}

export class RomLoadError extends Chip8Error {
  constructor(readonly path: string, readonly reason: unknown) {
    super(`Unable to read ROM ${path}: ${reason instanceof Error ? reason.message : String(reason)}`, true);
  }
}

export class UnknownOpcodeError extends Chip8Error {
  constructor(readonly opcode: Word, readonly address: Word) {
    super(`Unknown opcode ${hex(opcode, 4)} at ${hex(address, 4)}`, false);
  }
}

export class StackOverflowError extends Chip8Error {
  constructor(readonly address: Word, readonly depth: number) {
    super(`Stack overflow: call at ${hex(address, 4)} exceeds ${depth} nested calls`, true);
  }
}

export class StackUnderflowError extends Chip8Error {
  constructor(readonly address: Word) {
    super(`Stack underflow: return at ${hex(address, 4)} with an empty stack`, true);
  }
}

export class MemoryAccessError extends Chip8Error {
  constructor(readonly address: number) {
    super(`Memory access out of range: ${hex(address, 4)}`, true);
  }
}
