import {
  type Proposition,
  clone,
  complexity,
  equal,
  names,
  render,
} from './proposition';

/**
 * The two sides of a sequent: what is assumed and what is to be shown.
 */
export enum Side {
  Antecedent = 'Antecedent',
  Consequent = 'Consequent',
}

/** Position of a proposition within a sequent. */
export interface Coordinates {
  side: Side;
  index: number;
}

/**
 * Represents an attempt to remove a proposition that isn't there. This is
 * a bug in the caller rather than bad input.
 */
export class SequentIndexError extends Error {
  constructor(
    public readonly side: Side,
    public readonly index: number,
    public readonly length: number
  ) {
    super(`no proposition at ${side}[${index}], side has length ${length}`);
  }
}

/**
 * A proof goal: the conjunction of the antecedent entails the disjunction of
 * the consequent. Both sides are multisets logically, but their order is
 * kept so that the proposition picked for decomposition is always the same.
 */
export class Sequent {
  public readonly antecedent: Proposition[];
  public readonly consequent: Proposition[];

  constructor(
    antecedent: readonly Proposition[] = [],
    consequent: readonly Proposition[] = []
  ) {
    this.antecedent = [...antecedent];
    this.consequent = [...consequent];
  }

  side(side: Side): Proposition[] {
    switch (side) {
      case Side.Antecedent:
        return this.antecedent;
      case Side.Consequent:
        return this.consequent;
      default: {
        const _exhaustive: never = side;
        throw new Error(_exhaustive);
      }
    }
  }

  /** Sum of the complexities of every member on both sides. */
  complexity(): number {
    let total = 0;
    for (const p of this.antecedent) total += complexity(p);
    for (const p of this.consequent) total += complexity(p);
    return total;
  }

  /** True if no member can be decomposed any further. */
  isAtomic(): boolean {
    return this.firstComplexProposition() === null;
  }

  /**
   * Returns the position of the first member with complexity > 0, scanning
   * the antecedent left to right and then the consequent left to right.
   */
  firstComplexProposition(): Coordinates | null {
    for (const side of [Side.Antecedent, Side.Consequent]) {
      const index = this.side(side).findIndex((p) => complexity(p) > 0);
      if (index !== -1) return { side, index };
    }
    return null;
  }

  at({ side, index }: Coordinates): Proposition {
    const props = this.side(side);
    if (index < 0 || index >= props.length) {
      throw new SequentIndexError(side, index, props.length);
    }
    return props[index];
  }

  /** Detaches and returns the proposition at the given position. */
  removeAt(coords: Coordinates): Proposition {
    const p = this.at(coords);
    this.side(coords.side).splice(coords.index, 1);
    return p;
  }

  /** Appends to the antecedent. */
  pushLeft(p: Proposition): void {
    this.antecedent.push(p);
  }

  /** Appends to the consequent. */
  pushRight(p: Proposition): void {
    this.consequent.push(p);
  }

  push(side: Side, p: Proposition): void {
    this.side(side).push(p);
  }

  /** Names in play across both sides, antecedent first. */
  names(): string[] {
    return [...this.antecedent, ...this.consequent].flatMap(names);
  }

  clone(): Sequent {
    return new Sequent(this.antecedent.map(clone), this.consequent.map(clone));
  }

  equals(other: Sequent): boolean {
    const sameSide = (xs: Proposition[], ys: Proposition[]) =>
      xs.length === ys.length && xs.every((x, i) => equal(x, ys[i]));
    return (
      sameSide(this.antecedent, other.antecedent) &&
      sameSide(this.consequent, other.consequent)
    );
  }

  render(): string {
    const ant = this.antecedent.map(render).join(', ');
    const con = this.consequent.map(render).join(', ');
    return `${ant} |~ ${con}`.trim();
  }
}
