import type { Word } from '../emulator/types';
import type { Instruction } from './instructions';

export interface DecodedFields {
  family: number; // bits 12-15
  x: number; // bits 8-11
  y: number; // bits 4-7
  nn: number; // bits 0-7
  nnn: number; // bits 0-11
  n: number; // bits 0-3
}

export function decodeFields(word: Word): DecodedFields {
  const w = word & 0xffff;
  return {
    family: (w >>> 12) & 0xf,
    x: (w >>> 8) & 0xf,
    y: (w >>> 4) & 0xf,
    nn: w & 0xff,
    nnn: w & 0xfff,
    n: w & 0xf,
  };
}

/**
 * Maps an instruction word to its variant. Never throws: words outside the
 * instruction set (including the legacy 0NNN machine-code call) become UNKNOWN.
 */
export function decodeInstruction(word: Word): Instruction {
  const w = word & 0xffff;
  const { family, x, y, nn, nnn, n } = decodeFields(w);

  switch (family) {
    case 0x0:
      if (w === 0x00e0) return { op: 'CLS' };
      if (w === 0x00ee) return { op: 'RET' };
      break;
    case 0x1: return { op: 'JP', nnn };
    case 0x2: return { op: 'CALL', nnn };
    case 0x3: return { op: 'SE_VX_NN', x, nn };
    case 0x4: return { op: 'SNE_VX_NN', x, nn };
    case 0x5:
      if (n === 0) return { op: 'SE_VX_VY', x, y };
      break;
    case 0x6: return { op: 'LD_VX_NN', x, nn };
    case 0x7: return { op: 'ADD_VX_NN', x, nn };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'LD_VX_VY', x, y };
        case 0x1: return { op: 'OR', x, y };
        case 0x2: return { op: 'AND', x, y };
        case 0x3: return { op: 'XOR', x, y };
        case 0x4: return { op: 'ADD_VX_VY', x, y };
        case 0x5: return { op: 'SUB', x, y };
        case 0x6: return { op: 'SHR', x, y };
        case 0x7: return { op: 'SUBN', x, y };
        case 0xe: return { op: 'SHL', x, y };
      }
      break;
    case 0x9:
      if (n === 0) return { op: 'SNE_VX_VY', x, y };
      break;
    case 0xa: return { op: 'LD_I', nnn };
    case 0xb: return { op: 'JP_V0', nnn };
    case 0xc: return { op: 'RND', x, nn };
    case 0xd: return { op: 'DRW', x, y, n };
    case 0xe:
      if (nn === 0x9e) return { op: 'SKP', x };
      if (nn === 0xa1) return { op: 'SKNP', x };
      break;
    case 0xf:
      switch (nn) {
        case 0x07: return { op: 'LD_VX_DT', x };
        case 0x0a: return { op: 'LD_VX_K', x };
        case 0x15: return { op: 'LD_DT_VX', x };
        case 0x18: return { op: 'LD_ST_VX', x };
        case 0x1e: return { op: 'ADD_I_VX', x };
        case 0x29: return { op: 'LD_F_VX', x };
        case 0x33: return { op: 'LD_B_VX', x };
        case 0x55: return { op: 'LD_MEM_VX', x };
        case 0x65: return { op: 'LD_VX_MEM', x };
      }
      break;
  }
  return { op: 'UNKNOWN', word: w };
}
