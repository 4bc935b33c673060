import type { Word } from '../emulator/types';

// One variant per CHIP-8 instruction. Field names follow the usual nibble notation:
// x/y register indices, nn immediate byte, nnn 12-bit address, n sprite height.
export type Instruction =
  | { op: 'CLS' }
  | { op: 'RET' }
  | { op: 'JP'; nnn: number }
  | { op: 'CALL'; nnn: number }
  | { op: 'SE_VX_NN'; x: number; nn: number }
  | { op: 'SNE_VX_NN'; x: number; nn: number }
  | { op: 'SE_VX_VY'; x: number; y: number }
  | { op: 'LD_VX_NN'; x: number; nn: number }
  | { op: 'ADD_VX_NN'; x: number; nn: number }
  | { op: 'LD_VX_VY'; x: number; y: number }
  | { op: 'OR'; x: number; y: number }
  | { op: 'AND'; x: number; y: number }
  | { op: 'XOR'; x: number; y: number }
  | { op: 'ADD_VX_VY'; x: number; y: number }
  | { op: 'SUB'; x: number; y: number }
  | { op: 'SHR'; x: number; y: number }
  | { op: 'SUBN'; x: number; y: number }
  | { op: 'SHL'; x: number; y: number }
  | { op: 'SNE_VX_VY'; x: number; y: number }
  | { op: 'LD_I'; nnn: number }
  | { op: 'JP_V0'; nnn: number }
  | { op: 'RND'; x: number; nn: number }
  | { op: 'DRW'; x: number; y: number; n: number }
  | { op: 'SKP'; x: number }
  | { op: 'SKNP'; x: number }
  | { op: 'LD_VX_DT'; x: number }
  | { op: 'LD_VX_K'; x: number }
  | { op: 'LD_DT_VX'; x: number }
  | { op: 'LD_ST_VX'; x: number }
  | { op: 'ADD_I_VX'; x: number }
  | { op: 'LD_F_VX'; x: number }
  | { op: 'LD_B_VX'; x: number }
  | { op: 'LD_MEM_VX'; x: number }
  | { op: 'LD_VX_MEM'; x: number }
  | { op: 'UNKNOWN'; word: Word };

export type Opcode = Instruction['op'];

// Instructions after which the framebuffer must be presented
export function touchesDisplay(instr: Instruction): boolean {
  return instr.op === 'CLS' || instr.op === 'DRW';
}
