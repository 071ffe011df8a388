import { instantiate, occurs, type Assignment, type Term } from './Term.js';

/** 沿指派鏈取出 head（不遞迴進入子項） */
function whnfMVar(term: Term, assignment: Assignment): Term {
  let current = term;
  while (current.kind === 'mvar') {
    const value = assignment.get(current.name);
    if (!value) break;
    current = value;
  }
  return current;
}

function assign(name: string, value: Term, assignment: Assignment): boolean {
  if (occurs(name, instantiate(value, assignment))) return false;
  assignment.set(name, value);
  return true;
}

/**
 * 一階 unification，兩側皆可含 metavariable，帶 occurs check
 *
 * 成功時 assignment 已擴充；失敗時 assignment 可能含部分指派，呼叫端應丟棄。
 */
export function unifyTerms(lhs: Term, rhs: Term, assignment: Assignment): boolean {
  const a = whnfMVar(lhs, assignment);
  const b = whnfMVar(rhs, assignment);

  if (a.kind === 'mvar' && b.kind === 'mvar' && a.name === b.name) return true;
  if (a.kind === 'mvar') return assign(a.name, b, assignment);
  if (b.kind === 'mvar') return assign(b.name, a, assignment);

  switch (a.kind) {
    case 'sort':
      return b.kind === 'sort' && a.level === b.level;
    case 'const':
    case 'fvar':
      return b.kind === a.kind && b.name === a.name;
    case 'app':
      return b.kind === 'app'
        && unifyTerms(a.fn, b.fn, assignment)
        && unifyTerms(a.arg, b.arg, assignment);
    case 'arrow':
      return b.kind === 'arrow'
        && unifyTerms(a.domain, b.domain, assignment)
        && unifyTerms(a.codomain, b.codomain, assignment);
  }
}
