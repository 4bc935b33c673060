export const KEY_COUNT = 16;

export type KeypadState = Partial<Record<number, boolean>>;

// Hex keypad, written by the input collaborator and read by the CPU:
//  1 2 3 C
//  4 5 6 D
//  7 8 9 E
//  A 0 B F
export class Keypad {
  private keys: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);

  setKey(key: number, pressed: boolean): void {
    if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) throw new RangeError(`Invalid key index: ${key}`);
    this.keys[key] = pressed;
  }

  // Last write wins; keys absent from `state` keep their value
  setState(state: KeypadState): void {
    for (const [k, v] of Object.entries(state)) {
      if (v !== undefined) this.setKey(Number(k), v);
    }
  }

  isDown(key: number): boolean {
    return this.keys[key & 0xf];
  }

  // Lowest-indexed key currently down
  firstDown(): number | undefined {
    const idx = this.keys.indexOf(true);
    return idx >= 0 ? idx : undefined;
  }

  releaseAll(): void {
    this.keys.fill(false);
  }

  snapshot(): boolean[] {
    return this.keys.slice();
  }
}
