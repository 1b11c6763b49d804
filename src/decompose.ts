import {
  type Proposition,
  type Quantifier,
  PropKind,
  instantiate,
  names,
  render,
} from './proposition';
import { Sequent, Side } from './sequent';
import { type NameSupply, SequentialNameSupply } from './names';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Sequent-calculus rules, named after the connective they remove and the
 * side it was removed from.
 */
export enum Rule {
  NegationLeft = 'NegationLeft',
  NegationRight = 'NegationRight',
  ConjunctionLeft = 'ConjunctionLeft',
  ConjunctionRight = 'ConjunctionRight',
  DisjunctionLeft = 'DisjunctionLeft',
  DisjunctionRight = 'DisjunctionRight',
  ConditionalLeft = 'ConditionalLeft',
  ConditionalRight = 'ConditionalRight',
  UniversalLeft = 'UniversalLeft',
  UniversalRight = 'UniversalRight',
  ExistentialLeft = 'ExistentialLeft',
  ExistentialRight = 'ExistentialRight',
}

/**
 * One way of deriving the decomposed sequent: every parent must be provable.
 */
export type Leaf = { parents: Sequent[] };

/**
 * The result of one decomposition step. The decomposed sequent is provable
 * if at least one leaf has all of its parents provable.
 */
export type Branch = {
  rule: Rule;
  side: Side;
  principal: Proposition;
  leaves: Leaf[];
};

/**
 * Applies the rule for the first complex proposition of `sequent` (see
 * `Sequent.firstComplexProposition`). Returns null if the sequent is atomic,
 * in which case only an axiom check can settle it.
 *
 * The input is not modified. `supply` provides the eigenvariables and must be
 * shared across a whole search for them to stay unique.
 */
export function decompose(
  sequent: Sequent,
  supply: NameSupply = new SequentialNameSupply(sequent.names())
): Branch | null {
  const coords = sequent.firstComplexProposition();
  if (coords === null) return null;

  const rest = sequent.clone();
  const principal = rest.removeAt(coords);
  const { side } = coords;
  const left = side === Side.Antecedent;

  const one = (parent: Sequent): Leaf[] => [{ parents: [parent] }];
  const two = (a: Sequent, b: Sequent): Leaf[] => [{ parents: [a, b] }];

  let branch: Branch;
  switch (principal.kind) {
    case PropKind.Atom:
      throw new Error(`atom '${principal.text}' selected for decomposition`);

    case PropKind.Negation: {
      rest.push(left ? Side.Consequent : Side.Antecedent, principal.arg);
      branch = {
        rule: left ? Rule.NegationLeft : Rule.NegationRight,
        side,
        principal,
        leaves: one(rest),
      };
      break;
    }

    case PropKind.Conditional: {
      if (left) {
        const first = rest.clone();
        first.pushRight(principal.left);
        rest.pushLeft(principal.right);
        branch = {
          rule: Rule.ConditionalLeft,
          side,
          principal,
          leaves: two(first, rest),
        };
      } else {
        rest.pushLeft(principal.left);
        rest.pushRight(principal.right);
        branch = {
          rule: Rule.ConditionalRight,
          side,
          principal,
          leaves: one(rest),
        };
      }
      break;
    }

    case PropKind.Conjunction: {
      if (left) {
        rest.pushLeft(principal.left);
        rest.pushLeft(principal.right);
        branch = {
          rule: Rule.ConjunctionLeft,
          side,
          principal,
          leaves: one(rest),
        };
      } else {
        const first = rest.clone();
        first.pushRight(principal.left);
        rest.pushRight(principal.right);
        branch = {
          rule: Rule.ConjunctionRight,
          side,
          principal,
          leaves: two(first, rest),
        };
      }
      break;
    }

    case PropKind.Disjunction: {
      if (left) {
        const first = rest.clone();
        first.pushLeft(principal.left);
        rest.pushLeft(principal.right);
        branch = {
          rule: Rule.DisjunctionLeft,
          side,
          principal,
          leaves: two(first, rest),
        };
      } else {
        rest.pushRight(principal.left);
        rest.pushRight(principal.right);
        branch = {
          rule: Rule.DisjunctionRight,
          side,
          principal,
          leaves: one(rest),
        };
      }
      break;
    }

    case PropKind.Universal:
      branch = left
        ? reusable(Rule.UniversalLeft, rest, side, principal, supply)
        : eigenvariable(Rule.UniversalRight, rest, side, principal, supply);
      break;

    case PropKind.Existential:
      branch = left
        ? eigenvariable(Rule.ExistentialLeft, rest, side, principal, supply)
        : reusable(Rule.ExistentialRight, rest, side, principal, supply);
      break;

    default: {
      const _exhaustive: never = principal;
      throw new Error(_exhaustive);
    }
  }

  debugLogger.debug(
    LogComponent.DECOMPOSE,
    `${branch.rule} on ${render(principal)}: ${branch.leaves.length} leaf(s), ` +
      `parents [${branch.leaves
        .map((leaf) => leaf.parents.map((s) => s.render()).join(' ; '))
        .join(' | ')}]`
  );
  return branch;
}

/**
 * Instantiates the quantifier once for every name visible in the sequent or
 * the quantified proposition. Each instance is a separate leaf, since any one
 * of them may be the one that closes the proof.
 *
 * The quantifier itself is not kept, so names introduced further up the tree
 * are never tried against it.
 */
function reusable(
  rule: Rule,
  rest: Sequent,
  side: Side,
  principal: Quantifier,
  supply: NameSupply
): Branch {
  const candidates = [...new Set([...names(principal.arg), ...rest.names()])];
  if (candidates.length === 0) {
    candidates.push(supply.fresh(rest.names()));
  }

  const leaves = candidates.map((name) => {
    const parent = rest.clone();
    parent.push(side, instantiate(principal.arg, principal.variable, name));
    return { parents: [parent] };
  });

  return { rule, side, principal, leaves };
}

/**
 * Instantiates the quantifier with a single name that appears nowhere else.
 */
function eigenvariable(
  rule: Rule,
  rest: Sequent,
  side: Side,
  principal: Quantifier,
  supply: NameSupply
): Branch {
  const name = supply.fresh([...names(principal.arg), ...rest.names()]);
  rest.push(side, instantiate(principal.arg, principal.variable, name));
  return { rule, side, principal, leaves: [{ parents: [rest] }] };
}
