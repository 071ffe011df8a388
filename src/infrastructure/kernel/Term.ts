/**
 * Kernel 的已 elaborate 項
 *
 * 簡單型別的項語言：sort、常數、local hypothesis（fvar）、metavariable、
 * application 與箭頭型別。型別本身也是項。
 */
export type SortLevel = 'Prop' | 'Type';

export type Term =
  | { kind: 'sort'; level: SortLevel }
  | { kind: 'const'; name: string }
  | { kind: 'fvar'; name: string }
  | { kind: 'mvar'; name: string }
  | { kind: 'app'; fn: Term; arg: Term }
  | { kind: 'arrow'; domain: Term; codomain: Term };

export const PROP: Term = { kind: 'sort', level: 'Prop' };
export const TYPE: Term = { kind: 'sort', level: 'Type' };

/** metavariable 指派 */
export type Assignment = Map<string, Term>;

export function mkArrow(domain: Term, codomain: Term): Term {
  return { kind: 'arrow', domain, codomain };
}

export function termEquals(a: Term, b: Term): boolean {
  switch (a.kind) {
    case 'sort':
      return b.kind === 'sort' && a.level === b.level;
    case 'const':
    case 'fvar':
    case 'mvar':
      return b.kind === a.kind && b.name === a.name;
    case 'app':
      return b.kind === 'app' && termEquals(a.fn, b.fn) && termEquals(a.arg, b.arg);
    case 'arrow':
      return b.kind === 'arrow' && termEquals(a.domain, b.domain) && termEquals(a.codomain, b.codomain);
  }
}

/** 將已指派的 metavariable 完整代入 */
export function instantiate(term: Term, assignment: Assignment): Term {
  switch (term.kind) {
    case 'mvar': {
      const value = assignment.get(term.name);
      return value ? instantiate(value, assignment) : term;
    }
    case 'app':
      return { kind: 'app', fn: instantiate(term.fn, assignment), arg: instantiate(term.arg, assignment) };
    case 'arrow':
      return {
        kind: 'arrow',
        domain: instantiate(term.domain, assignment),
        codomain: instantiate(term.codomain, assignment),
      };
    default:
      return term;
  }
}

export function occurs(name: string, term: Term): boolean {
  switch (term.kind) {
    case 'mvar':
      return term.name === name;
    case 'app':
      return occurs(name, term.fn) || occurs(name, term.arg);
    case 'arrow':
      return occurs(name, term.domain) || occurs(name, term.codomain);
    default:
      return false;
  }
}

/** 依出現順序收集 metavariable 名稱（去重） */
export function collectMVars(term: Term, into: string[] = []): string[] {
  switch (term.kind) {
    case 'mvar':
      if (!into.includes(term.name)) into.push(term.name);
      break;
    case 'app':
      collectMVars(term.fn, into);
      collectMVars(term.arg, into);
      break;
    case 'arrow':
      collectMVars(term.domain, into);
      collectMVars(term.codomain, into);
      break;
    default:
      break;
  }
  return into;
}

/**
 * Pretty-print
 *
 * application 左結合、箭頭右結合；參數位置的 application 與箭頭加括號，
 * 箭頭左側的箭頭加括號。
 */
export function prettyTerm(term: Term): string {
  switch (term.kind) {
    case 'sort':
      return term.level;
    case 'const':
    case 'fvar':
      return term.name;
    case 'mvar':
      return `?${term.name}`;
    case 'app': {
      const arg = term.arg.kind === 'app' || term.arg.kind === 'arrow'
        ? `(${prettyTerm(term.arg)})`
        : prettyTerm(term.arg);
      const fn = term.fn.kind === 'arrow' ? `(${prettyTerm(term.fn)})` : prettyTerm(term.fn);
      return `${fn} ${arg}`;
    }
    case 'arrow': {
      const domain = term.domain.kind === 'arrow'
        ? `(${prettyTerm(term.domain)})`
        : prettyTerm(term.domain);
      return `${domain} → ${prettyTerm(term.codomain)}`;
    }
  }
}
