import fs from 'fs';
import { RomLoadError, RomTooLargeError } from '../emulator/errors';
import { MAX_ROM_SIZE } from '../memory/memoryMap';

// Read a ROM image from disk. Size is checked here too so the CLI can fail before
// building a VM.
export function readRomFile(path: string): Uint8Array {
  let raw: Buffer;
  try {
    raw = fs.readFileSync(path);
  } catch (e) {
    throw new RomLoadError(path, e);
  }
  if (raw.length > MAX_ROM_SIZE) throw new RomTooLargeError(raw.length, MAX_ROM_SIZE);
  return new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength);
}
