// Uppercase hex with a 0x prefix, zero-padded to `digits`
export function hex(value: number, digits: number): string {
  return '0x' + (value >>> 0).toString(16).toUpperCase().padStart(digits, '0');
}

// Bare uppercase hex, as used in trace lines and register dumps
export function hexRaw(value: number, digits: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(digits, '0');
}
