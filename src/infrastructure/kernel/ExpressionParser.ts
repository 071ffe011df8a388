import type { Outcome } from '../../domain/ports/EnginePort.js';
import { describeToken, SyntaxFailure, tokenize, TokenStream } from './Lexer.js';

/** 未解析名稱的表達式語法樹 */
export type Syntax =
  | { kind: 'ident'; name: string; column: number }
  | { kind: 'hole'; name: string; column: number }
  | { kind: 'app'; fn: Syntax; arg: Syntax }
  | { kind: 'arrow'; domain: Syntax; codomain: Syntax };

/**
 * expr  := app ('→' expr)?
 * app   := atom atom*
 * atom  := ident | ?ident | '(' expr ')'
 */
export function parseExpr(stream: TokenStream): Syntax {
  return stream.nested<Syntax>(() => {
    const lhs = parseApp(stream);
    if (stream.peek().kind === 'arrow') {
      stream.next();
      return { kind: 'arrow', domain: lhs, codomain: parseExpr(stream) };
    }
    return lhs;
  });
}

/** 左結合的 application 鏈每多一個參數就深一層 */
function parseApp(stream: TokenStream): Syntax {
  let fn = parseAtom(stream);
  let levels = 0;
  try {
    while (startsAtom(stream)) {
      stream.enter();
      levels++;
      fn = { kind: 'app', fn, arg: parseAtom(stream) };
    }
  } finally {
    stream.leave(levels);
  }
  return fn;
}

function startsAtom(stream: TokenStream): boolean {
  const kind = stream.peek().kind;
  return kind === 'ident' || kind === 'hole' || kind === 'lparen';
}

function parseAtom(stream: TokenStream): Syntax {
  const token = stream.next();
  switch (token.kind) {
    case 'ident':
      return { kind: 'ident', name: token.text, column: token.column };
    case 'hole':
      return { kind: 'hole', name: token.text, column: token.column };
    case 'lparen': {
      const inner = parseExpr(stream);
      stream.expect('rparen', "')'");
      return inner;
    }
    default:
      throw new SyntaxFailure(`expected term, found ${describeToken(token)}`, token.column);
  }
}

/** 解析完整字串為表達式；多餘的 token 視為錯誤 */
export function parseExpression(text: string): Outcome<Syntax> {
  try {
    const stream = new TokenStream(tokenize(text));
    const expr = parseExpr(stream);
    const rest = stream.peek();
    if (rest.kind !== 'eof') {
      throw new SyntaxFailure(`unexpected ${describeToken(rest)}`, rest.column);
    }
    return { ok: true, value: expr };
  } catch (err) {
    if (err instanceof SyntaxFailure) return { ok: false, error: err.message };
    throw err;
  }
}

export function prettySyntax(syntax: Syntax): string {
  switch (syntax.kind) {
    case 'ident':
      return syntax.name;
    case 'hole':
      return `?${syntax.name}`;
    case 'app': {
      const arg = syntax.arg.kind === 'app' || syntax.arg.kind === 'arrow'
        ? `(${prettySyntax(syntax.arg)})`
        : prettySyntax(syntax.arg);
      const fn = syntax.fn.kind === 'arrow' ? `(${prettySyntax(syntax.fn)})` : prettySyntax(syntax.fn);
      return `${fn} ${arg}`;
    }
    case 'arrow': {
      const domain = syntax.domain.kind === 'arrow'
        ? `(${prettySyntax(syntax.domain)})`
        : prettySyntax(syntax.domain);
      return `${domain} → ${prettySyntax(syntax.codomain)}`;
    }
  }
}
