/**
 * Scanner for the bracketed placeholders embedded in atom text. A span
 * `<x>` holding a single lowercase letter is a variable, a span holding two
 * or more lowercase letters (`<kitty>`) is a name already in play.
 */

export enum PlaceholderKind {
  Variable,
  Name,
}

export type Placeholder = { kind: PlaceholderKind; value: string };

function isLowercase(ch: string): boolean {
  return ch >= 'a' && ch <= 'z';
}

function isLowercaseWord(s: string): boolean {
  if (s.length === 0) return false;
  for (const ch of s) {
    if (!isLowercase(ch)) return false;
  }
  return true;
}

/**
 * Returns every placeholder in the text, left to right. Spans that hold
 * anything other than lowercase letters are skipped, and the scan resumes at
 * the next `<` so that `<<ab>` still yields `ab`.
 */
export function scanPlaceholders(text: string): Placeholder[] {
  const out: Placeholder[] = [];
  let i = text.indexOf('<');
  while (i !== -1) {
    const close = text.indexOf('>', i + 1);
    if (close === -1) break;

    const inner = text.slice(i + 1, close);
    if (isLowercaseWord(inner)) {
      out.push({
        kind: inner.length === 1 ? PlaceholderKind.Variable : PlaceholderKind.Name,
        value: inner,
      });
      i = text.indexOf('<', close + 1);
    } else {
      i = text.indexOf('<', i + 1);
    }
  }
  return out;
}

/** True if the token is exactly `<x>` for a single lowercase letter x. */
export function isVariableToken(token: string): boolean {
  return (
    token.length === 3 &&
    token.startsWith('<') &&
    token.endsWith('>') &&
    isLowercase(token.charAt(1))
  );
}

/** Replaces every `<from>` in the text with `<to>`. */
export function replacePlaceholder(
  text: string,
  from: string,
  to: string
): string {
  return text.split(`<${from}>`).join(`<${to}>`);
}
