import { expect } from 'chai';
import {
  EmptyStringError,
  InvalidConnectiveError,
  MalformedStringError,
  PropositionParseError,
  SequentPropositionError,
  TurnstileCountError,
  buildBinary,
  buildQuantifier,
  buildUnary,
  deparenthesize,
  parseProposition,
  parseSequent,
} from './parse';
import {
  PropKind,
  type Proposition,
  and,
  atom,
  complexity,
  equal,
  exists,
  forall,
  implies,
  names,
  not,
  or,
  render,
  variables,
} from './proposition';

const A = atom('A');
const B = atom('B');
const C = atom('C');

/** Returns the error thrown by `fn`, failing the test if nothing is thrown. */
function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  expect.fail('expected an error to be thrown');
}

describe('parse.ts', () => {
  describe('deparenthesize', () => {
    it('strips connected outer pairs', () => {
      expect(deparenthesize('(hello)')).to.equal('hello');
      expect(deparenthesize('((hello))')).to.equal('hello');
      expect(deparenthesize('(hello (goodbye))')).to.equal('hello (goodbye)');
      expect(deparenthesize('((hello) (goodbye))')).to.equal(
        '(hello) (goodbye)'
      );
    });

    it('leaves separate top-level groups alone', () => {
      expect(deparenthesize('(A) & (B)')).to.equal('(A) & (B)');
      expect(deparenthesize('((A) & (B))')).to.equal('(A) & (B)');
    });

    it('handles empty and whitespace-only text', () => {
      expect(deparenthesize('')).to.equal('');
      expect(deparenthesize('( ( ) )')).to.equal('');
    });

    it('is idempotent', () => {
      for (const s of ['((A & B))', '(A) v (B)', ' ( x ) ', '(~(A))', 'A']) {
        const once = deparenthesize(s);
        expect(deparenthesize(once)).to.equal(once);
      }
    });
  });

  describe('parseProposition - atoms and negation', () => {
    it('parses plain text as an atom', () => {
      const p = parseProposition('the cat is on the mat');
      expect(p).to.deep.equal(atom('the cat is on the mat'));
      expect(complexity(p)).to.equal(0);
    });

    it('parses a negation keyword followed by its operand', () => {
      const p = parseProposition('~ (the cat is on the mat)');
      expect(p).to.deep.equal(not(atom('the cat is on the mat')));
      expect(complexity(p)).to.equal(1);
      expect(parseProposition('not A')).to.deep.equal(not(A));
    });

    it('parses nested negations', () => {
      expect(parseProposition('~ (~ (the cat is on the mat))')).to.deep.equal(
        not(not(atom('the cat is on the mat')))
      );
    });

    it('lets a spaced negation keyword take everything after it', () => {
      expect(parseProposition('~ A & B')).to.deep.equal(not(and(A, B)));
    });

    it('binds a glued negation to its own group only', () => {
      expect(parseProposition('~(A) & B')).to.deep.equal(and(not(A), B));
      expect(parseProposition('~A')).to.deep.equal(not(A));
    });
  });

  describe('parseProposition - binary connectives', () => {
    it('parses each connective by symbol and by word', () => {
      expect(parseProposition('A & B')).to.deep.equal(and(A, B));
      expect(parseProposition('A and B')).to.deep.equal(and(A, B));
      expect(parseProposition('A v B')).to.deep.equal(or(A, B));
      expect(parseProposition('A or B')).to.deep.equal(or(A, B));
      expect(parseProposition('A > B')).to.deep.equal(implies(A, B));
      expect(parseProposition('A implies B')).to.deep.equal(implies(A, B));
    });

    it('keeps multi-word operands together', () => {
      expect(
        parseProposition('the cat is on the mat & the hat is on the rat')
      ).to.deep.equal(
        and(atom('the cat is on the mat'), atom('the hat is on the rat'))
      );
    });

    it('groups by the leftmost connective with no precedence', () => {
      expect(parseProposition('A & B v C')).to.deep.equal(and(A, or(B, C)));
      expect(parseProposition('A v B & C')).to.deep.equal(or(A, and(B, C)));
      expect(parseProposition('A > B > C')).to.deep.equal(
        implies(A, implies(B, C))
      );
    });

    it('skips connectives inside brackets', () => {
      expect(parseProposition('(A & B) v C')).to.deep.equal(or(and(A, B), C));
      expect(parseProposition('(A) & (B)')).to.deep.equal(and(A, B));
      expect(parseProposition('((A > B) & (B > C)) > (A > C)')).to.deep.equal(
        implies(and(implies(A, B), implies(B, C)), implies(A, C))
      );
    });
  });

  describe('parseProposition - quantifiers', () => {
    it('parses a glued existential', () => {
      const p = parseProposition('∃<a>(<a> is on the mat)');
      expect(p).to.deep.equal(exists('a', atom('<a> is on the mat')));
      if (p.kind === PropKind.Existential) {
        expect(names(p.arg)).to.deep.equal([]);
        expect(variables(p.arg)).to.deep.equal(['a']);
      }
    });

    it('parses quantifier keywords followed by a variable token', () => {
      expect(parseProposition('forall <x> <x> is a cat')).to.deep.equal(
        forall('x', atom('<x> is a cat'))
      );
      expect(parseProposition('exists <y> (<y> purrs & <y> sleeps)')).to.deep.equal(
        exists('y', and(atom('<y> purrs'), atom('<y> sleeps')))
      );
      expect(parseProposition('∀ <x> (<x> runs)')).to.deep.equal(
        forall('x', atom('<x> runs'))
      );
    });

    it('binds a glued quantifier to its own group only', () => {
      expect(parseProposition('∀<x>(P <x>) > Q')).to.deep.equal(
        implies(forall('x', atom('P <x>')), atom('Q'))
      );
    });

    it('parses nested quantifiers', () => {
      expect(parseProposition('∀<x>(∃<y>(<x> loves <y>))')).to.deep.equal(
        forall('x', exists('y', atom('<x> loves <y>')))
      );
    });
  });

  describe('parseProposition - errors', () => {
    it('rejects empty input', () => {
      const err = thrownBy(() => parseProposition('  ( ) '));
      expect(err).to.be.instanceOf(EmptyStringError);
      expect(err).to.be.instanceOf(PropositionParseError);
      expect(err).to.have.property('text', '  ( ) ');
    });

    it('rejects a binary connective with a missing side', () => {
      const err = thrownBy(() => parseProposition('(A &)'));
      expect(err).to.be.instanceOf(MalformedStringError);
      expect(err).to.have.property('text', 'A &');

      expect(() => parseProposition('v B')).to.throw(MalformedStringError);
    });

    it('rejects a negation with nothing to negate', () => {
      expect(() => parseProposition('~')).to.throw(MalformedStringError);
      expect(() => parseProposition('not ()')).to.throw(MalformedStringError);

      const err = thrownBy(() => parseProposition('~ ()'));
      expect(err).to.be.instanceOf(MalformedStringError);
      expect(err).to.have.property('text', '~ ()');
    });

    it('rejects malformed binders', () => {
      const err = thrownBy(() => parseProposition('forall <xy> P'));
      expect(err).to.be.instanceOf(MalformedStringError);
      expect(err).to.have.property('text', 'forall <xy> P');

      expect(() => parseProposition('∃ x (P)')).to.throw(MalformedStringError);
      expect(() => parseProposition('∀<x>')).to.throw(MalformedStringError);
      expect(() => parseProposition('exists <X> P')).to.throw(
        MalformedStringError
      );
    });

    it('requires a spaced binder to stand alone as its own token', () => {
      const err = thrownBy(() => parseProposition('forall <x>P <x>'));
      expect(err).to.be.instanceOf(MalformedStringError);
      expect(err).to.have.property('text', 'forall <x>P <x>');

      expect(() => parseProposition('∃ <x>foo')).to.throw(MalformedStringError);
      expect(() => parseProposition('forall <x>')).to.throw(MalformedStringError);
    });

    it('fails the whole parse when a subformula fails', () => {
      const err = thrownBy(() => parseProposition('A & (B > )'));
      expect(err).to.be.instanceOf(MalformedStringError);
      expect(err).to.have.property('text', 'B >');
    });
  });

  describe('builders', () => {
    it('build connectives from keyword tokens', () => {
      expect(buildUnary('not', A)).to.deep.equal(not(A));
      expect(buildBinary('implies', A, B)).to.deep.equal(implies(A, B));
      expect(buildQuantifier('∃', 'z', A)).to.deep.equal(exists('z', A));
    });

    it('reject unknown connective tokens', () => {
      const err = thrownBy(() => buildBinary('xor', A, B));
      expect(err).to.be.instanceOf(InvalidConnectiveError);
      expect(err).to.have.property('text', 'xor');

      expect(() => buildUnary('&', A)).to.throw(InvalidConnectiveError);
      expect(() => buildQuantifier('~', 'x', A)).to.throw(
        InvalidConnectiveError
      );
    });
  });

  describe('round trip', () => {
    const samples: Proposition[] = [
      A,
      not(A),
      not(not(and(A, B))),
      and(not(A), or(B, C)),
      implies(and(implies(A, B), implies(B, C)), implies(A, C)),
      or(not(implies(A, B)), and(not(B), not(not(C)))),
      forall('x', implies(atom('<x> is a cat'), atom('<x> purrs'))),
      and(exists('y', atom('<y> saw <tom>')), not(forall('z', atom('<z> ran')))),
    ];

    it('parses the canonical rendering back to an equal tree', () => {
      for (const p of samples) {
        const q = parseProposition(render(p));
        expect(equal(p, q), render(p)).to.be.true;
      }
    });

    it('is deterministic', () => {
      const text = '((A > B) & ~ (C)) v ∃<x>(<x> is here)';
      expect(equal(parseProposition(text), parseProposition(text))).to.be.true;
    });
  });

  describe('parseSequent', () => {
    it('parses both sides', () => {
      const s = parseSequent('A, B |~ C, D');
      expect(s.antecedent).to.deep.equal([A, B]);
      expect(s.consequent).to.deep.equal([C, atom('D')]);
    });

    it('allows either side to be empty', () => {
      const s = parseSequent('|~ A & B');
      expect(s.antecedent).to.deep.equal([]);
      expect(s.consequent).to.deep.equal([and(A, B)]);
      expect(parseSequent('A |~').consequent).to.deep.equal([]);
    });

    it('does not split on commas inside brackets', () => {
      const s = parseSequent('(A, B > C), D |~');
      expect(s.antecedent).to.deep.equal([implies(atom('A, B'), C), atom('D')]);
    });

    it('parses its own rendering', () => {
      const s = parseSequent('~ A, ∀<x>(P <x>) |~ (A & B) v C');
      expect(parseSequent(s.render()).equals(s)).to.be.true;
    });

    it('requires exactly one turnstile', () => {
      const none = thrownBy(() => parseSequent('A, B'));
      expect(none).to.be.instanceOf(TurnstileCountError);
      expect(none).to.have.property('count', 0);

      const two = thrownBy(() => parseSequent('A |~ B |~ C'));
      expect(two).to.be.instanceOf(TurnstileCountError);
      expect(two).to.have.property('count', 2);
    });

    it('reports the proposition that failed', () => {
      const err = thrownBy(() => parseSequent('A, B & |~ C'));
      expect(err).to.be.instanceOf(SequentPropositionError);
      expect(err).to.have.property('text', 'B &');
      if (err instanceof SequentPropositionError) {
        expect(err.reason).to.be.instanceOf(MalformedStringError);
      }

      expect(() => parseSequent('A, , B |~')).to.throw(SequentPropositionError);
    });
  });
});
