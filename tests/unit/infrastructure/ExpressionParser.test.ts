import { describe, it, expect } from 'vitest';
import { parseExpression, prettySyntax } from '../../../src/infrastructure/kernel/ExpressionParser.js';
import { MAX_NESTING_DEPTH, tokenize } from '../../../src/infrastructure/kernel/Lexer.js';

describe('Lexer', () => {
  it('should tokenize identifiers, holes, arrows and strings with columns', () => {
    const tokens = tokenize('Nat.succ ?m -> "hi" → (x);');
    expect(tokens.map((t) => [t.kind, t.text, t.column])).toEqual([
      ['ident', 'Nat.succ', 1],
      ['hole', 'm', 10],
      ['arrow', '->', 13],
      ['string', 'hi', 16],
      ['arrow', '→', 21],
      ['lparen', '(', 23],
      ['ident', 'x', 24],
      ['rparen', ')', 25],
      ['semi', ';', 26],
      ['eof', '', 27],
    ]);
  });

  it('should reject unexpected characters', () => {
    expect(() => tokenize('a + b')).toThrow("unexpected character '+' at column 3");
  });

  it('should reject an unterminated string', () => {
    expect(() => tokenize('trace "oops')).toThrow('unterminated string literal at column 7');
  });
});

describe('ExpressionParser', () => {
  it('should parse left-associative application', () => {
    const result = parseExpression('f a b');
    expect(result).toEqual({
      ok: true,
      value: {
        kind: 'app',
        fn: {
          kind: 'app',
          fn: { kind: 'ident', name: 'f', column: 1 },
          arg: { kind: 'ident', name: 'a', column: 3 },
        },
        arg: { kind: 'ident', name: 'b', column: 5 },
      },
    });
  });

  it('should parse right-associative arrows', () => {
    const result = parseExpression('A -> B -> C');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.kind).toBe('arrow');
    expect(prettySyntax(result.value)).toBe('A → B → C');
  });

  it('should keep parenthesized structure when printing', () => {
    const result = parseExpression('(A -> B) -> f (g x) ?m');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(prettySyntax(result.value)).toBe('(A → B) → f (g x) ?m');
  });

  it('should report an unclosed parenthesis', () => {
    expect(parseExpression('(A -> B')).toEqual({
      ok: false,
      error: "expected ')', found end of input at column 8",
    });
  });

  it('should report trailing tokens', () => {
    expect(parseExpression('a )')).toEqual({ ok: false, error: "unexpected ')' at column 3" });
  });

  it('should report an empty expression', () => {
    expect(parseExpression('')).toEqual({
      ok: false,
      error: 'expected term, found end of input at column 1',
    });
  });
  describe('nesting depth', () => {
    it('should accept parentheses up to the maximum depth', () => {
      const text = '('.repeat(MAX_NESTING_DEPTH - 1) + 'x' + ')'.repeat(MAX_NESTING_DEPTH - 1);
      expect(parseExpression(text)).toEqual({
        ok: true,
        value: { kind: 'ident', name: 'x', column: MAX_NESTING_DEPTH },
      });
    });

    it('should reject parentheses nested beyond the maximum depth', () => {
      const text = '('.repeat(20000) + 'x' + ')'.repeat(20000);
      expect(parseExpression(text)).toEqual({
        ok: false,
        error: 'maximum nesting depth of 256 exceeded at column 257',
      });
    });

    it('should count each arrow in a chain as one level', () => {
      expect(parseExpression('A -> '.repeat(300) + 'A')).toEqual({
        ok: false,
        error: 'maximum nesting depth of 256 exceeded at column 1281',
      });
    });

    it('should count each argument of an application chain as one level', () => {
      expect(parseExpression('f' + ' x'.repeat(300))).toEqual({
        ok: false,
        error: 'maximum nesting depth of 256 exceeded at column 513',
      });
    });
  });
});
