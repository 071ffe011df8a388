import type { Outcome } from '../../domain/ports/EnginePort.js';
import { describeToken, SyntaxFailure, tokenize, TokenStream } from './Lexer.js';
import { parseExpr, type Syntax } from './ExpressionParser.js';

export type Tactic =
  | { kind: 'exact'; term: Syntax }
  | { kind: 'apply'; term: Syntax }
  | { kind: 'intro'; names: string[] }
  | { kind: 'assumption' }
  | { kind: 'sorry' }
  | { kind: 'skip' }
  | { kind: 'fail'; message: string }
  | { kind: 'trace'; message: string }
  | { kind: 'logError'; message: string }
  | { kind: 'repeat'; body: Tactic }
  | { kind: 'try'; body: Tactic }
  | { kind: 'seq'; steps: Tactic[] };

/**
 * seq    := tactic (';' tactic)*
 * tactic := '(' seq ')'
 *         | 'exact' expr | 'apply' expr | 'intro' ident+
 *         | 'assumption' | 'sorry' | 'admit' | 'skip'
 *         | 'fail' string? | 'trace' string | 'logError' string
 *         | 'repeat' tactic | 'try' tactic
 */
function parseSeq(stream: TokenStream): Tactic {
  const steps = [parseTactic(stream)];
  while (stream.peek().kind === 'semi') {
    stream.next();
    steps.push(parseTactic(stream));
  }
  return steps.length === 1 ? steps[0] : { kind: 'seq', steps };
}

function parseTactic(stream: TokenStream): Tactic {
  return stream.nested(() => parseTacticBody(stream));
}

function parseTacticBody(stream: TokenStream): Tactic {
  const token = stream.peek();

  if (token.kind === 'lparen') {
    stream.next();
    const inner = parseSeq(stream);
    stream.expect('rparen', "')'");
    return inner;
  }

  if (token.kind !== 'ident') {
    throw new SyntaxFailure(`expected tactic, found ${describeToken(token)}`, token.column);
  }
  stream.next();

  switch (token.text) {
    case 'exact':
      return { kind: 'exact', term: parseExpr(stream) };
    case 'apply':
      return { kind: 'apply', term: parseExpr(stream) };
    case 'intro': {
      const names = [stream.expect('ident', 'identifier').text];
      while (stream.peek().kind === 'ident') names.push(stream.next().text);
      return { kind: 'intro', names };
    }
    case 'assumption':
      return { kind: 'assumption' };
    case 'sorry':
    case 'admit':
      return { kind: 'sorry' };
    case 'skip':
      return { kind: 'skip' };
    case 'fail':
      return {
        kind: 'fail',
        message: stream.peek().kind === 'string' ? stream.next().text : "tactic 'fail' failed",
      };
    case 'trace':
      return { kind: 'trace', message: stream.expect('string', 'string literal').text };
    case 'logError':
      return { kind: 'logError', message: stream.expect('string', 'string literal').text };
    case 'repeat':
      return { kind: 'repeat', body: parseTactic(stream) };
    case 'try':
      return { kind: 'try', body: parseTactic(stream) };
    default:
      throw new SyntaxFailure(`unknown tactic '${token.text}'`, token.column);
  }
}

export function parseTacticScript(text: string): Outcome<Tactic> {
  try {
    const stream = new TokenStream(tokenize(text));
    const tactic = parseSeq(stream);
    const rest = stream.peek();
    if (rest.kind !== 'eof') {
      throw new SyntaxFailure(`unexpected ${describeToken(rest)}`, rest.column);
    }
    return { ok: true, value: tactic };
  } catch (err) {
    if (err instanceof SyntaxFailure) return { ok: false, error: err.message };
    throw err;
  }
}
