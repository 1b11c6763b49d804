import {
  type Proposition,
  type ConnectiveKind,
  PropKind,
  atom,
  fromPropositions,
} from './proposition';
import { isVariableToken } from './placeholders';
import { Sequent } from './sequent';
import { debugLogger, LogComponent } from './debug-logger';

/**
 * Keywords for each connective, symbol first. Binary keywords only count
 * when they stand alone as a whitespace-separated token.
 */
export const KEYWORDS: Readonly<Record<ConnectiveKind, readonly string[]>> = {
  [PropKind.Negation]: ['~', 'not'],
  [PropKind.Conjunction]: ['&', 'and'],
  [PropKind.Disjunction]: ['v', 'or'],
  [PropKind.Conditional]: ['>', 'implies'],
  [PropKind.Existential]: ['∃', 'exists'],
  [PropKind.Universal]: ['∀', 'forall'],
};

export type UnaryKind = PropKind.Negation;
export type BinaryKind =
  | PropKind.Conjunction
  | PropKind.Disjunction
  | PropKind.Conditional;
export type QuantifierKind = PropKind.Universal | PropKind.Existential;

const BINARY_KINDS: readonly BinaryKind[] = [
  PropKind.Conjunction,
  PropKind.Disjunction,
  PropKind.Conditional,
];
const QUANTIFIER_KINDS: readonly QuantifierKind[] = [
  PropKind.Existential,
  PropKind.Universal,
];

const TURNSTILE = '|~';

/**
 * Base class for failures to read a proposition. `text` is the fragment that
 * could not be interpreted.
 */
export class PropositionParseError extends Error {
  constructor(
    message: string,
    public readonly text: string
  ) {
    super(message);
  }
}

/** Nothing left to parse once outer brackets and whitespace are gone. */
export class EmptyStringError extends PropositionParseError {
  constructor(text: string) {
    super(`empty proposition in '${text}'`, text);
  }
}

/**
 * A connective is missing one of its operands, or a binder is malformed. A
 * negation or quantifier whose operand is empty, as in `~ ()`, reports the
 * whole text here rather than an `EmptyStringError` for the operand.
 */
export class MalformedStringError extends PropositionParseError {
  constructor(text: string) {
    super(`malformed proposition '${text}'`, text);
  }
}

/** A token that was handed to a builder is not a known connective. */
export class InvalidConnectiveError extends PropositionParseError {
  constructor(token: string) {
    super(`'${token}' is not a connective`, token);
  }
}

/**
 * Base class for failures to read a sequent.
 */
export class SequentParseError extends Error {
  constructor(
    message: string,
    public readonly text: string
  ) {
    super(message);
  }
}

/** The text does not contain exactly one `|~`. */
export class TurnstileCountError extends SequentParseError {
  constructor(
    text: string,
    public readonly count: number
  ) {
    super(`expected exactly one '${TURNSTILE}' in '${text}', found ${count}`, text);
  }
}

/** One of the comma-separated propositions of a sequent failed to parse. */
export class SequentPropositionError extends SequentParseError {
  constructor(
    text: string,
    public readonly reason: PropositionParseError
  ) {
    super(`could not parse '${text}': ${reason.message}`, text);
  }
}

/**
 * Removes outer pairs of brackets for as long as they are connected, i.e.
 * the opening bracket closes on the last character. `(A) & (B)` is returned
 * unchanged.
 */
export function deparenthesize(text: string): string {
  let s = text.trim();
  while (s.startsWith('(') && s.endsWith(')')) {
    let depth = 0;
    for (let i = 0; i < s.length; i++) {
      const ch = s.charAt(i);
      if (ch === '(') depth++;
      else if (ch === ')') depth--;

      if (depth <= 0 && i + 1 < s.length) return s;
    }
    s = s.slice(1, -1).trim();
  }
  return s;
}

function tokenize(text: string): string[] {
  return text.split(/\s+/).filter((t) => t.length > 0);
}

function depthDelta(token: string): number {
  let delta = 0;
  for (const ch of token) {
    if (ch === '(') delta++;
    else if (ch === ')') delta--;
  }
  return delta;
}

function lookup<K extends ConnectiveKind>(
  kinds: readonly K[],
  token: string
): K | undefined {
  return kinds.find((k) => KEYWORDS[k].includes(token));
}

const isNegationKeyword = (token: string): boolean =>
  lookup([PropKind.Negation], token) !== undefined;

/** Builds a negation from its keyword, e.g. `~` or `not`. */
export function buildUnary(token: string, child: Proposition): Proposition {
  const kind = lookup<UnaryKind>([PropKind.Negation], token);
  if (kind === undefined) throw new InvalidConnectiveError(token);
  return fromPropositions(kind, [child]);
}

/** Builds a binary connective from its keyword, e.g. `&` or `implies`. */
export function buildBinary(
  token: string,
  left: Proposition,
  right: Proposition
): Proposition {
  const kind = lookup(BINARY_KINDS, token);
  if (kind === undefined) throw new InvalidConnectiveError(token);
  return fromPropositions(kind, [left, right]);
}

/** Builds a quantifier from its keyword, e.g. `∀` or `exists`. */
export function buildQuantifier(
  token: string,
  variable: string,
  child: Proposition
): Proposition {
  const kind = lookup(QUANTIFIER_KINDS, token);
  if (kind === undefined) throw new InvalidConnectiveError(token);
  return fromPropositions(kind, [child], variable);
}

/**
 * Builds a quantifier once its bound variable and predicate are split off.
 * `variableToken` must be exactly `<x>`.
 */
function parseBinder(
  token: string,
  variableToken: string,
  body: string,
  full: string
): Proposition {
  if (!isVariableToken(variableToken)) {
    throw new MalformedStringError(full);
  }
  const predicate = deparenthesize(body);
  if (predicate.length === 0) throw new MalformedStringError(full);

  return buildQuantifier(token, variableToken.charAt(1), parseProposition(predicate));
}

/**
 * Negations and quantifiers written with their symbol glued to the operand,
 * as the canonical rendering does: `~(A)`, `∃<x>(P <x>)`.
 */
function parseGluedPrefix(text: string): Proposition | undefined {
  const head = text.charAt(0);
  const rest = text.slice(1);

  if (isNegationKeyword(head)) {
    const negatum = deparenthesize(rest);
    if (negatum.length === 0) throw new MalformedStringError(text);
    return buildUnary(head, parseProposition(negatum));
  }
  if (lookup(QUANTIFIER_KINDS, head) !== undefined) {
    const binder = rest.trimStart();
    return parseBinder(head, binder.slice(0, 3), binder.slice(3), text);
  }
  return undefined;
}

/**
 * Parses a proposition. Grouping is leftmost-first with no precedence
 * between binary connectives, so `A & B v C` reads as `A & (B v C)`.
 * Negation and quantifier keywords standing alone as the first token take
 * the whole remainder as their operand.
 */
export function parseProposition(input: string): Proposition {
  const text = deparenthesize(input);
  if (text.length === 0) throw new EmptyStringError(input);

  const tokens = tokenize(text);
  const [first] = tokens;

  if (isNegationKeyword(first)) {
    const negatum = deparenthesize(tokens.slice(1).join(' '));
    if (negatum.length === 0) throw new MalformedStringError(text);
    return buildUnary(first, parseProposition(negatum));
  }

  if (lookup(QUANTIFIER_KINDS, first) !== undefined) {
    const variableToken = tokens[1] ?? '';
    return parseBinder(first, variableToken, tokens.slice(2).join(' '), text);
  }

  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    depth += depthDelta(token);
    if (depth !== 0 || lookup(BINARY_KINDS, token) === undefined) continue;

    const left = deparenthesize(tokens.slice(0, i).join(' '));
    const right = deparenthesize(tokens.slice(i + 1).join(' '));
    if (left.length === 0 || right.length === 0) {
      throw new MalformedStringError(text);
    }
    return buildBinary(token, parseProposition(left), parseProposition(right));
  }

  const glued = parseGluedPrefix(text);
  if (glued) return glued;

  debugLogger.trace(LogComponent.PARSER, `Atom: ${text}`);
  return atom(text);
}

/**
 * Splits on commas that are not inside brackets.
 */
function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
    else if (ch === ',' && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));
  return parts;
}

function parseSide(text: string): Proposition[] {
  if (text.trim().length === 0) return [];
  return splitTopLevel(text).map((part) => {
    try {
      return parseProposition(part);
    } catch (err) {
      if (err instanceof PropositionParseError) {
        throw new SequentPropositionError(part.trim(), err);
      }
      throw err;
    }
  });
}

/**
 * Parses a sequent written as `A, B |~ C, D`. Either side may be empty.
 */
export function parseSequent(input: string): Sequent {
  const sides = input.split(TURNSTILE);
  if (sides.length !== 2) {
    throw new TurnstileCountError(input, sides.length - 1);
  }

  const [ant, con] = sides;
  const sequent = new Sequent(parseSide(ant), parseSide(con));
  debugLogger.debug(LogComponent.PARSER, `Parsed sequent ${sequent.render()}`);
  return sequent;
}
