import { equal } from './proposition';
import { Sequent } from './sequent';
import { decompose, Rule } from './decompose';
import { type NameSupply, SequentialNameSupply } from './names';
import { debugLogger, LogComponent, LogLevel } from './debug-logger';

export interface ProverConfig {
  /**
   * Gives up on a branch once this many rules have been applied above the
   * root. Reusable quantifier rules can otherwise make the search unbounded.
   */
  maxDepth?: number;

  /**
   * Supplies eigenvariables. Defaults to a fresh `SequentialNameSupply`
   * seeded with the names of the root sequent.
   */
  names?: NameSupply;
}

export const DEFAULT_MAX_DEPTH = 64;

/**
 * A derivation of `sequent`: either an axiom, or a rule application whose
 * premises are all derived in turn.
 */
export type Proof = {
  sequent: Sequent;
  rule: Rule | 'Axiom';
  premises: Proof[];
};

/**
 * Returns true if some proposition occurs identically on both sides, in
 * which case the sequent holds without further work.
 */
export function isAxiom(sequent: Sequent): boolean {
  return sequent.antecedent.some((p) =>
    sequent.consequent.some((q) => equal(p, q))
  );
}

/**
 * Searches for a derivation of the sequent, depth first, trying leaves in
 * order and their parents in order.
 *
 * @returns the first derivation found, or null if none exists within the
 * depth bound
 */
export function prove(sequent: Sequent, cfg?: ProverConfig): Proof | null {
  const maxDepth = cfg?.maxDepth ?? DEFAULT_MAX_DEPTH;
  const supply = cfg?.names ?? new SequentialNameSupply(sequent.names());
  let visited = 0;

  debugLogger.info(
    LogComponent.PROVER,
    `Starting proof search for ${sequent.render()} (max depth ${maxDepth})`
  );

  const search = (goal: Sequent, depth: number): Proof | null => {
    visited++;
    debugLogger.logSequent(LogComponent.PROVER, LogLevel.TRACE, 'Goal', depth, () =>
      goal.render()
    );

    if (isAxiom(goal)) {
      return { sequent: goal, rule: 'Axiom', premises: [] };
    }
    if (depth >= maxDepth) {
      debugLogger.debug(
        LogComponent.PROVER,
        `Depth bound reached at ${goal.render()}`
      );
      return null;
    }

    const branch = decompose(goal, supply);
    if (branch === null) return null;

    for (const leaf of branch.leaves) {
      const premises: Proof[] = [];
      for (const parent of leaf.parents) {
        const proof = search(parent, depth + 1);
        if (proof === null) break;
        premises.push(proof);
      }
      if (premises.length === leaf.parents.length) {
        return { sequent: goal, rule: branch.rule, premises };
      }
    }
    return null;
  };

  const proof = search(sequent, 0);
  debugLogger.info(
    LogComponent.PROVER,
    `${proof ? 'Proof found' : 'No proof found'} after visiting ${visited} sequents`
  );
  return proof;
}

/**
 * Returns true if a derivation of the sequent exists within the depth bound.
 */
export function proves(sequent: Sequent, cfg?: ProverConfig): boolean {
  return prove(sequent, cfg) !== null;
}

/**
 * Renders a derivation one sequent per line, premises indented under the
 * sequent they derive.
 */
export function renderProof(proof: Proof): string {
  const lines: string[] = [];
  const visit = (p: Proof, depth: number): void => {
    lines.push(`${'  '.repeat(depth)}${p.sequent.render()}  [${p.rule}]`);
    for (const premise of p.premises) visit(premise, depth + 1);
  };
  visit(proof, 0);
  return lines.join('\n');
}
