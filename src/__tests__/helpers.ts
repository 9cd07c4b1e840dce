import { EdnError } from '../errors.js';

/** Runs `f` and returns the EdnError it throws. */
export function errorOf(f: () => unknown): EdnError {
  try {
    f();
  } catch (err) {
    if (err instanceof EdnError) return err;
    throw err;
  }
  throw new Error('expected an EdnError');
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
