export type TokenKind =
  | 'ident'
  | 'hole'
  | 'string'
  | 'lparen'
  | 'rparen'
  | 'arrow'
  | 'semi'
  | 'eof';

export interface Token {
  kind: TokenKind;
  /** ident / hole 的名稱、string 的內容 */
  text: string;
  /** 1-based 欄位 */
  column: number;
}

/** 語法錯誤（parser 內部使用，由 parse 函式轉為 Outcome） */
export class SyntaxFailure extends Error {
  constructor(message: string, public readonly column: number) {
    super(`${message} at column ${column}`);
    this.name = 'SyntaxFailure';
  }
}

const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_.']/;

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    const column = i + 1;

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === '(') {
      tokens.push({ kind: 'lparen', text: ch, column });
      i++;
    } else if (ch === ')') {
      tokens.push({ kind: 'rparen', text: ch, column });
      i++;
    } else if (ch === ';') {
      tokens.push({ kind: 'semi', text: ch, column });
      i++;
    } else if (ch === '→') {
      tokens.push({ kind: 'arrow', text: ch, column });
      i++;
    } else if (ch === '-' && source[i + 1] === '>') {
      tokens.push({ kind: 'arrow', text: '->', column });
      i += 2;
    } else if (ch === '"') {
      const end = source.indexOf('"', i + 1);
      if (end < 0) throw new SyntaxFailure('unterminated string literal', column);
      tokens.push({ kind: 'string', text: source.slice(i + 1, end), column });
      i = end + 1;
    } else if (ch === '?') {
      const name = readIdent(source, i + 1);
      if (name.length === 0) throw new SyntaxFailure('expected metavariable name after ?', column);
      tokens.push({ kind: 'hole', text: name, column });
      i += 1 + name.length;
    } else if (IDENT_START.test(ch)) {
      const name = readIdent(source, i);
      if (name.endsWith('.')) throw new SyntaxFailure(`invalid identifier '${name}'`, column);
      tokens.push({ kind: 'ident', text: name, column });
      i += name.length;
    } else {
      throw new SyntaxFailure(`unexpected character '${ch}'`, column);
    }
  }

  tokens.push({ kind: 'eof', text: '', column: source.length + 1 });
  return tokens;
}

function readIdent(source: string, start: number): string {
  if (start >= source.length || !IDENT_START.test(source[start])) return '';
  let end = start + 1;
  while (end < source.length && IDENT_PART.test(source[end])) end++;
  return source.slice(start, end);
}

/** 語法樹的最大巢狀深度（括號、箭頭、application 與 tactic 組合子合計） */
export const MAX_NESTING_DEPTH = 256;

/** 依序讀取 token 的游標，供 expression 與 tactic parser 共用 */
export class TokenStream {
  private index = 0;
  private depth = 0;

  constructor(private readonly tokens: Token[]) {}

  /** 進入一層巢狀；超過 MAX_NESTING_DEPTH 時以目前 token 的欄位回報語法錯誤 */
  enter(): void {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw new SyntaxFailure(
        `maximum nesting depth of ${MAX_NESTING_DEPTH} exceeded`,
        this.peek().column,
      );
    }
    this.depth++;
  }

  leave(levels = 1): void {
    this.depth -= levels;
  }

  /** 在多一層巢狀中執行 parse */
  nested<T>(parse: () => T): T {
    this.enter();
    try {
      return parse();
    } finally {
      this.leave();
    }
  }

  peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length - 1) this.index++;
    return token;
  }

  expect(kind: TokenKind, what: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      throw new SyntaxFailure(`expected ${what}, found ${describeToken(token)}`, token.column);
    }
    return this.next();
  }
}

export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'string':
      return `string "${token.text}"`;
    case 'hole':
      return `'?${token.text}'`;
    default:
      return `'${token.text}'`;
  }
}
