/**
 * Per-byte lookup tables shared by the reader and the writer.
 * Built once at module load from character-class strings.
 */

function table(chars: string, extra?: (byte: number) => boolean): Uint8Array {
  const t = new Uint8Array(256);
  for (let i = 0; i < chars.length; i++) t[chars.charCodeAt(i)] = 1;
  if (extra) {
    for (let b = 0; b < 256; b++) if (extra(b)) t[b] = 1;
  }
  return t;
}

/** Bytes that end a string fast path: control bytes, `"` and `\`. */
export const ESCAPE: Uint8Array = table('"\\', (b) => b < 0x20);

const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';
const DIGITS = '0123456789';

/** Bytes allowed inside a symbol or keyword body. */
export const SYMBOL_BODY: Uint8Array = table(LETTERS + DIGITS + '.*+!-_?$%&=<>');

/** Bytes that terminate an atom (symbol, keyword, number, reserved word). */
export const DELIMITER: Uint8Array = table(' \t\n\r,()[]{}"');

/** Hex digit value per byte, 255 for non-hex bytes. */
export const HEX: Uint8Array = (() => {
  const t = new Uint8Array(256).fill(255);
  for (let i = 0; i < 10; i++) t[0x30 + i] = i;
  for (let i = 0; i < 6; i++) {
    t[0x41 + i] = 10 + i;
    t[0x61 + i] = 10 + i;
  }
  return t;
})();

export function isDigit(b: number): boolean {
  return b >= 0x30 && b <= 0x39;
}

export function isWhitespace(b: number): boolean {
  return b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d || b === 0x2c;
}

/** True at end of input (-1) or on a delimiter byte. */
export function endsAtom(b: number): boolean {
  return b < 0 || DELIMITER[b] === 1;
}
