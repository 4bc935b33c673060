import type { Word } from '../emulator/types';
import { hex } from '../utils/format';
import { decodeInstruction } from './decoder';
import type { Instruction } from './instructions';

const v = (r: number): string => `V${r.toString(16).toUpperCase()}`;
const addr = (a: number): string => hex(a, 3);
const byte = (b: number): string => hex(b, 2);

// Conventional CHIP-8 assembler mnemonics
export function formatInstruction(instr: Instruction): string {
  switch (instr.op) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'JP': return `JP ${addr(instr.nnn)}`;
    case 'CALL': return `CALL ${addr(instr.nnn)}`;
    case 'SE_VX_NN': return `SE ${v(instr.x)}, ${byte(instr.nn)}`;
    case 'SNE_VX_NN': return `SNE ${v(instr.x)}, ${byte(instr.nn)}`;
    case 'SE_VX_VY': return `SE ${v(instr.x)}, ${v(instr.y)}`;
    case 'LD_VX_NN': return `LD ${v(instr.x)}, ${byte(instr.nn)}`;
    case 'ADD_VX_NN': return `ADD ${v(instr.x)}, ${byte(instr.nn)}`;
    case 'LD_VX_VY': return `LD ${v(instr.x)}, ${v(instr.y)}`;
    case 'OR': return `OR ${v(instr.x)}, ${v(instr.y)}`;
    case 'AND': return `AND ${v(instr.x)}, ${v(instr.y)}`;
    case 'XOR': return `XOR ${v(instr.x)}, ${v(instr.y)}`;
    case 'ADD_VX_VY': return `ADD ${v(instr.x)}, ${v(instr.y)}`;
    case 'SUB': return `SUB ${v(instr.x)}, ${v(instr.y)}`;
    case 'SHR': return `SHR ${v(instr.x)}, ${v(instr.y)}`;
    case 'SUBN': return `SUBN ${v(instr.x)}, ${v(instr.y)}`;
    case 'SHL': return `SHL ${v(instr.x)}, ${v(instr.y)}`;
    case 'SNE_VX_VY': return `SNE ${v(instr.x)}, ${v(instr.y)}`;
    case 'LD_I': return `LD I, ${addr(instr.nnn)}`;
    case 'JP_V0': return `JP V0, ${addr(instr.nnn)}`;
    case 'RND': return `RND ${v(instr.x)}, ${byte(instr.nn)}`;
    case 'DRW': return `DRW ${v(instr.x)}, ${v(instr.y)}, ${instr.n}`;
    case 'SKP': return `SKP ${v(instr.x)}`;
    case 'SKNP': return `SKNP ${v(instr.x)}`;
    case 'LD_VX_DT': return `LD ${v(instr.x)}, DT`;
    case 'LD_VX_K': return `LD ${v(instr.x)}, K`;
    case 'LD_DT_VX': return `LD DT, ${v(instr.x)}`;
    case 'LD_ST_VX': return `LD ST, ${v(instr.x)}`;
    case 'ADD_I_VX': return `ADD I, ${v(instr.x)}`;
    case 'LD_F_VX': return `LD F, ${v(instr.x)}`;
    case 'LD_B_VX': return `LD B, ${v(instr.x)}`;
    case 'LD_MEM_VX': return `LD [I], ${v(instr.x)}`;
    case 'LD_VX_MEM': return `LD ${v(instr.x)}, [I]`;
    case 'UNKNOWN': return `DW ${hex(instr.word, 4)}`;
  }
}

export interface DisasmLine {
  address: number;
  word: Word;
  text: string;
}

// Linear sweep over a ROM image. A trailing odd byte is emitted as DB.
export function disassemble(bytes: Uint8Array, origin = 0x200): DisasmLine[] {
  const out: DisasmLine[] = [];
  let i = 0;
  for (; i + 1 < bytes.length; i += 2) {
    const word = ((bytes[i] << 8) | bytes[i + 1]) & 0xffff;
    out.push({ address: origin + i, word, text: formatInstruction(decodeInstruction(word)) });
  }
  if (i < bytes.length) {
    out.push({ address: origin + i, word: bytes[i], text: `DB ${byte(bytes[i])}` });
  }
  return out;
}
