export type HexKey = number; // 0x0..0xF

// Host keys follow KeyboardEvent.code. Four rows of four, laid out like the original hex keypad:
//   1 2 3 C      Digit1 Digit2 Digit3 Digit4
//   4 5 6 D  <=  KeyQ   KeyW   KeyE   KeyR
//   7 8 9 E      KeyA   KeyS   KeyD   KeyF
//   A 0 B F      KeyZ   KeyX   KeyC   KeyV
export const KEY_MAP: Readonly<Record<string, HexKey>> = {
  Digit1: 0x1, Digit2: 0x2, Digit3: 0x3, Digit4: 0xC,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyR: 0xD,
  KeyA: 0x7, KeyS: 0x8, KeyD: 0x9, KeyF: 0xE,
  KeyZ: 0xA, KeyX: 0x0, KeyC: 0xB, KeyV: 0xF,
};

export function keyToHex(code: string): HexKey | null {
  return Object.prototype.hasOwnProperty.call(KEY_MAP, code) ? KEY_MAP[code] : null;
}

export class Keypad {
  private pressed: boolean[] = new Array<boolean>(16).fill(false);

  // Map a host key and record its state; unmapped keys are ignored
  update(code: string, down: boolean): void {
    const hex = keyToHex(code);
    if (hex !== null) this.pressed[hex] = down;
  }

  setKey(hex: HexKey, down: boolean): void {
    this.pressed[hex & 0xF] = down;
  }

  isPressed(hex: HexKey): boolean {
    return this.pressed[hex & 0xF];
  }

  // Lowest pressed key, or null when none is down
  firstPressed(): HexKey | null {
    const i = this.pressed.indexOf(true);
    return i >= 0 ? i : null;
  }

  snapshot(): boolean[] {
    return this.pressed.slice();
  }
}
