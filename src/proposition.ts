import {
  PlaceholderKind,
  isVariableToken,
  replacePlaceholder,
  scanPlaceholders,
} from './placeholders';

/**
 * Types of nodes in the proposition syntax tree:
 */
export enum PropKind {
  Atom, // opaque text, possibly with <x> / <name> placeholders
  Negation, // negation of a proposition
  Conjunction, // conjunction of two propositions
  Disjunction, // disjunction of two propositions
  Conditional, // conditional from left to right
  Universal, // universal quantification of a proposition
  Existential, // existential quantification of a proposition
}

/** Atomic proposition holding its text verbatim. */
export type Atom = { kind: PropKind.Atom; text: string };

/** Negation of a proposition. */
export type Negation = { kind: PropKind.Negation; arg: Proposition };

/** Conjunction of two propositions. */
export type Conjunction = {
  kind: PropKind.Conjunction;
  left: Proposition;
  right: Proposition;
};

/** Disjunction of two propositions. */
export type Disjunction = {
  kind: PropKind.Disjunction;
  left: Proposition;
  right: Proposition;
};

/** Conditional with antecedent `left` and consequent `right`. */
export type Conditional = {
  kind: PropKind.Conditional;
  left: Proposition;
  right: Proposition;
};

/** Universal quantification binding a single-letter variable. */
export type Universal = {
  kind: PropKind.Universal;
  variable: string;
  arg: Proposition;
};

/** Existential quantification binding a single-letter variable. */
export type Existential = {
  kind: PropKind.Existential;
  variable: string;
  arg: Proposition;
};

export type Quantifier = Universal | Existential;

/**
 * Represents a first-order proposition. Trees are owned top-down and never
 * share subtrees, so every operation here either reads or rebuilds.
 */
export type Proposition =
  | Atom
  | Negation
  | Conjunction
  | Disjunction
  | Conditional
  | Universal
  | Existential;

/** Kinds that take child propositions, i.e. everything but atoms. */
export type ConnectiveKind = Exclude<PropKind, PropKind.Atom>;

/**
 * Callbacks for `transform`.
 */
export type TransformFns = {
  Atom?: (p: Atom) => Proposition;
  Negation?: (p: Negation) => Proposition;
  Conjunction?: (p: Conjunction) => Proposition;
  Disjunction?: (p: Disjunction) => Proposition;
  Conditional?: (p: Conditional) => Proposition;
  Universal?: (p: Universal) => Proposition;
  Existential?: (p: Existential) => Proposition;
};

/**
 * Helper for transforming propositions. Nodes without a callback are rebuilt
 * with transformed children, so the result never aliases the input.
 */
export function transform(p: Proposition, cbs: TransformFns): Proposition {
  switch (p.kind) {
    case PropKind.Atom:
      return cbs.Atom ? cbs.Atom(p) : { ...p };
    case PropKind.Negation: {
      if (cbs.Negation) return cbs.Negation(p);
      return { ...p, arg: transform(p.arg, cbs) };
    }
    case PropKind.Conjunction: {
      if (cbs.Conjunction) return cbs.Conjunction(p);
      return {
        ...p,
        left: transform(p.left, cbs),
        right: transform(p.right, cbs),
      };
    }
    case PropKind.Disjunction: {
      if (cbs.Disjunction) return cbs.Disjunction(p);
      return {
        ...p,
        left: transform(p.left, cbs),
        right: transform(p.right, cbs),
      };
    }
    case PropKind.Conditional: {
      if (cbs.Conditional) return cbs.Conditional(p);
      return {
        ...p,
        left: transform(p.left, cbs),
        right: transform(p.right, cbs),
      };
    }
    case PropKind.Universal: {
      if (cbs.Universal) return cbs.Universal(p);
      return { ...p, arg: transform(p.arg, cbs) };
    }
    case PropKind.Existential: {
      if (cbs.Existential) return cbs.Existential(p);
      return { ...p, arg: transform(p.arg, cbs) };
    }
    default: {
      const _exhaustive: never = p;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Represents a connective built with the wrong number of children.
 */
export class IncorrectArityError extends Error {
  constructor(
    public readonly kind: ConnectiveKind,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `${PropKind[kind]} requires ${expected} subproposition${expected === 1 ? '' : 's'}, not ${actual}`
    );
  }
}

/**
 * Represents a quantifier built without a bindable `<x>` variable.
 */
export class MissingVariableError extends Error {
  constructor(
    public readonly kind: PropKind.Universal | PropKind.Existential,
    public readonly variable: string | undefined
  ) {
    super(
      `${PropKind[kind]} requires a single lowercase letter to bind, got '${variable ?? ''}'`
    );
  }
}

export const atom = (text: string): Atom => ({ kind: PropKind.Atom, text });

export const not = (arg: Proposition): Negation => ({
  kind: PropKind.Negation,
  arg,
});

export const and = (left: Proposition, right: Proposition): Conjunction => ({
  kind: PropKind.Conjunction,
  left,
  right,
});

export const or = (left: Proposition, right: Proposition): Disjunction => ({
  kind: PropKind.Disjunction,
  left,
  right,
});

export const implies = (
  left: Proposition,
  right: Proposition
): Conditional => ({ kind: PropKind.Conditional, left, right });

export const forall = (variable: string, arg: Proposition): Universal => ({
  kind: PropKind.Universal,
  variable,
  arg,
});

export const exists = (variable: string, arg: Proposition): Existential => ({
  kind: PropKind.Existential,
  variable,
  arg,
});

/**
 * Number of child propositions a connective takes.
 */
export function arity(kind: ConnectiveKind): number {
  switch (kind) {
    case PropKind.Negation:
    case PropKind.Universal:
    case PropKind.Existential:
      return 1;
    case PropKind.Conjunction:
    case PropKind.Disjunction:
    case PropKind.Conditional:
      return 2;
    default: {
      const _exhaustive: never = kind;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Builds a connective from a list of children, checking the count against
 * the connective's arity. Quantifiers also need the variable they bind.
 */
export function fromPropositions(
  kind: ConnectiveKind,
  children: Proposition[],
  variable?: string
): Proposition {
  const expected = arity(kind);
  if (children.length !== expected) {
    throw new IncorrectArityError(kind, expected, children.length);
  }

  const [first, second] = children;
  switch (kind) {
    case PropKind.Negation:
      return not(first);
    case PropKind.Conjunction:
      return and(first, second);
    case PropKind.Disjunction:
      return or(first, second);
    case PropKind.Conditional:
      return implies(first, second);
    case PropKind.Universal:
    case PropKind.Existential: {
      if (variable == null || !isVariableToken(`<${variable}>`)) {
        throw new MissingVariableError(kind, variable);
      }
      return kind === PropKind.Universal
        ? forall(variable, first)
        : exists(variable, first);
    }
    default: {
      const _exhaustive: never = kind;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Length of the longest chain of connectives and quantifiers, so 0 for an
 * atom. This is the termination measure for decomposition.
 */
export function complexity(p: Proposition): number {
  switch (p.kind) {
    case PropKind.Atom:
      return 0;
    case PropKind.Negation:
    case PropKind.Universal:
    case PropKind.Existential:
      return 1 + complexity(p.arg);
    case PropKind.Conjunction:
    case PropKind.Disjunction:
    case PropKind.Conditional:
      return 1 + Math.max(complexity(p.left), complexity(p.right));
    default: {
      const _exhaustive: never = p;
      throw new Error(_exhaustive);
    }
  }
}

export function isFinished(p: Proposition): boolean {
  return complexity(p) === 0;
}

function collect(p: Proposition, kind: PlaceholderKind): string[] {
  const out: string[] = [];

  const visit = (q: Proposition): void => {
    switch (q.kind) {
      case PropKind.Atom:
        for (const ph of scanPlaceholders(q.text)) {
          if (ph.kind === kind) out.push(ph.value);
        }
        break;
      case PropKind.Negation:
      case PropKind.Universal:
      case PropKind.Existential:
        visit(q.arg);
        break;
      case PropKind.Conjunction:
      case PropKind.Disjunction:
      case PropKind.Conditional:
        visit(q.left);
        visit(q.right);
        break;
      default: {
        const _exhaustive: never = q;
        throw new Error(_exhaustive);
      }
    }
  };

  visit(p);
  return out;
}

/**
 * Returns every name (`<kitty>`) embedded in the atoms of a proposition, in
 * order of appearance. Duplicates are kept.
 */
export function names(p: Proposition): string[] {
  return collect(p, PlaceholderKind.Name);
}

/**
 * Returns every variable (`<x>`) embedded in the atoms of a proposition, in
 * order of appearance. Duplicates are kept.
 */
export function variables(p: Proposition): string[] {
  return collect(p, PlaceholderKind.Variable);
}

/**
 * Returns a copy of `p` with every `<variable>` in its atoms replaced by
 * `<name>`.
 *
 * NOTE: this does not stop at a nested quantifier that rebinds `variable`,
 * so in `∀<x>(P <x> & ∃<x>(Q <x>))` both occurrences get replaced.
 */
export function instantiate(
  p: Proposition,
  variable: string,
  name: string
): Proposition {
  return transform(p, {
    Atom: (a) => atom(replacePlaceholder(a.text, variable, name)),
  });
}

export function clone(p: Proposition): Proposition {
  return transform(p, {});
}

/**
 * Returns true if the given propositions are equal syntactically.
 */
export function equal(p: Proposition, q: Proposition): boolean {
  switch (p.kind) {
    case PropKind.Atom:
      if (q.kind != PropKind.Atom) return false;
      return p.text === q.text;
    case PropKind.Negation:
      if (q.kind != PropKind.Negation) return false;
      return equal(p.arg, q.arg);
    case PropKind.Conjunction:
      if (q.kind != PropKind.Conjunction) return false;
      return equal(p.left, q.left) && equal(p.right, q.right);
    case PropKind.Disjunction:
      if (q.kind != PropKind.Disjunction) return false;
      return equal(p.left, q.left) && equal(p.right, q.right);
    case PropKind.Conditional:
      if (q.kind != PropKind.Conditional) return false;
      return equal(p.left, q.left) && equal(p.right, q.right);
    case PropKind.Universal:
      if (q.kind != PropKind.Universal) return false;
      return p.variable === q.variable && equal(p.arg, q.arg);
    case PropKind.Existential:
      if (q.kind != PropKind.Existential) return false;
      return p.variable === q.variable && equal(p.arg, q.arg);
    default: {
      const _exhaustive: never = p;
      throw new Error(_exhaustive);
    }
  }
}

/**
 * Canonical rendering. Every binary node is bracketed and every negated or
 * quantified body is too, so the output parses back to an equal tree.
 * Quantifiers write their variable in placeholder form, `∀<x>(P <x>)`.
 */
export function render(p: Proposition): string {
  switch (p.kind) {
    case PropKind.Atom:
      return p.text;
    case PropKind.Negation:
      return `~(${render(p.arg)})`;
    case PropKind.Conjunction:
      return `(${render(p.left)} & ${render(p.right)})`;
    case PropKind.Disjunction:
      return `(${render(p.left)} v ${render(p.right)})`;
    case PropKind.Conditional:
      return `(${render(p.left)} > ${render(p.right)})`;
    case PropKind.Universal:
      return `∀<${p.variable}>(${render(p.arg)})`;
    case PropKind.Existential:
      return `∃<${p.variable}>(${render(p.arg)})`;
    default: {
      const _exhaustive: never = p;
      throw new Error(_exhaustive);
    }
  }
}
