#!/usr/bin/env node

import { parseProposition, parseSequent } from './parse';
import { complexity, names, render, variables } from './proposition';
import { decompose } from './decompose';
import { DEFAULT_MAX_DEPTH, prove, renderProof } from './prover';

function printUsage() {
  console.log(`Usage: sequent [COMMAND] [OPTIONS] <text>

COMMANDS:
  parse                Parse a proposition and print its canonical form
  decompose            Apply one rule to a sequent and print the result
  prove                Search for a proof of a sequent
  help                 Show this help message

OPTIONS:
  -h, --help          Show help message
  --max-depth N       Depth bound for prove (default: ${DEFAULT_MAX_DEPTH})

EXAMPLES:
  sequent parse "~ (the cat is on the mat)"
  sequent decompose "|~ (A & B)"
  sequent prove "A, (A > B) |~ B"
  sequent prove "∀<x>(<x> is a cat) |~ <tom> is a cat"

SYNTAX:
  Negation:           ~ A      or  not A
  Conjunction:        A & B    or  A and B
  Disjunction:        A v B    or  A or B
  Conditional:        A > B    or  A implies B
  Universal:          ∀<x>(P)  or  forall <x> P
  Existential:        ∃<x>(P)  or  exists <x> P
  Variables:          <x>      (one lowercase letter)
  Names:              <tom>    (two or more lowercase letters)
  Sequent:            A, B |~ C, D

Binary connectives group left to right with no precedence; use brackets.
`);
}

/**
 * Pulls `--max-depth N` out of the argument list.
 */
function takeMaxDepth(args: string[]): number | undefined {
  const i = args.indexOf('--max-depth');
  if (i === -1) return undefined;

  const value = Number(args[i + 1]);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--max-depth expects a non-negative integer`);
  }
  args.splice(i, 2);
  return value;
}

function runParse(text: string) {
  const p = parseProposition(text);
  console.log(render(p));
  console.log(`complexity: ${complexity(p)}`);
  console.log(`names:      ${names(p).join(', ')}`);
  console.log(`variables:  ${variables(p).join(', ')}`);
}

function runDecompose(text: string) {
  const sequent = parseSequent(text);
  const branch = decompose(sequent);
  if (branch === null) {
    console.log(`${sequent.render()} is atomic`);
    return;
  }

  console.log(`${branch.rule} on ${render(branch.principal)}`);
  branch.leaves.forEach((leaf, i) => {
    console.log(`leaf ${i + 1}:`);
    for (const parent of leaf.parents) console.log(`  ${parent.render()}`);
  });
}

function runProve(text: string, maxDepth: number | undefined) {
  const sequent = parseSequent(text);
  const proof = prove(sequent, { maxDepth });
  if (proof === null) {
    console.log(`not proved: ${sequent.render()}`);
    process.exitCode = 2;
    return;
  }
  console.log(renderProof(proof));
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
    printUsage();
    process.exit(0);
  }

  const command = args[0];
  if (command === 'help') {
    printUsage();
    process.exit(0);
  }

  try {
    const maxDepth = takeMaxDepth(args);
    if (args.length < 2) {
      console.error('Error: Missing text argument');
      console.error('Use "sequent help" for usage information');
      process.exit(1);
    }
    const text = args[1];

    switch (command) {
      case 'parse':
        runParse(text);
        break;
      case 'decompose':
        runDecompose(text);
        break;
      case 'prove':
        runProve(text, maxDepth);
        break;
      default:
        console.warn(`Unrecognised command '${command}'.`);
        printUsage();
        process.exit(1);
    }
  } catch (error) {
    console.error(
      'Error:',
      error instanceof Error ? error.message : String(error)
    );
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}
