import { debugLogger, LogComponent } from './debug-logger';

/**
 * Source of names that have not been used anywhere in a search. The
 * eigenvariable rules need one per application, and the reusable quantifier
 * rules need one when a sequent has no names to instantiate with.
 */
export interface NameSupply {
  /**
   * Returns a name never handed out before by this supply and not contained
   * in `avoid`.
   */
  fresh(avoid: Iterable<string>): string;
}

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

/**
 * Maps 0, 1, 2, ... onto aa, ab, ..., az, ba, ..., zz, aaa, ... so that every
 * generated name has at least two letters and reads as a name, not a
 * variable.
 */
export function nthName(n: number): string {
  let width = 2;
  let block = ALPHABET.length ** width;
  while (n >= block) {
    n -= block;
    width++;
    block = ALPHABET.length ** width;
  }

  let out = '';
  for (let i = 0; i < width; i++) {
    out = ALPHABET.charAt(n % ALPHABET.length) + out;
    n = Math.floor(n / ALPHABET.length);
  }
  return out;
}

/**
 * Default `NameSupply` walking the `nthName` sequence. Names passed to
 * `reserve` are skipped for the lifetime of the supply.
 */
export class SequentialNameSupply implements NameSupply {
  private next = 0;
  private readonly used = new Set<string>();

  constructor(reserved: Iterable<string> = []) {
    this.reserve(reserved);
  }

  reserve(names: Iterable<string>): void {
    for (const name of names) this.used.add(name);
  }

  fresh(avoid: Iterable<string> = []): string {
    const skip = new Set(avoid);
    let name = nthName(this.next++);
    while (this.used.has(name) || skip.has(name)) {
      name = nthName(this.next++);
    }
    this.used.add(name);
    debugLogger.trace(LogComponent.NAMES, `Fresh name <${name}>`);
    return name;
  }
}
