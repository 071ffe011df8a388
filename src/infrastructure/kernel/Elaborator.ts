import type { StepBudget } from '../../domain/value-objects/StepBudget.js';
import type { Environment } from './Environment.js';
import { prettySyntax, type Syntax } from './ExpressionParser.js';
import { prettyTerm, termEquals, TYPE, PROP, type Term } from './Term.js';

export interface LocalHyp {
  readonly name: string;
  readonly type: Term;
}

/**
 * - tactic：未知名稱與 metavariable 皆為錯誤
 * - pattern：未知名稱視為 rigid free name，`?m` 為可指派的 metavariable（unify 用）
 */
export type ElabMode = 'tactic' | 'pattern';

export class ElaborationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ElaborationFailure';
  }
}

export interface Elaborated {
  term: Term;
  /** pattern 模式下自由名稱與 metavariable 的型別未知 */
  type: Term | undefined;
}

export class Elaborator {
  constructor(
    private readonly env: Environment,
    private readonly context: readonly LocalHyp[],
    private readonly mode: ElabMode,
    private readonly budget?: StepBudget,
  ) {}

  elaborate(syntax: Syntax): Elaborated {
    this.budget?.consume();

    switch (syntax.kind) {
      case 'ident':
        return this.elaborateIdent(syntax.name);
      case 'hole':
        if (this.mode === 'tactic') {
          throw new ElaborationFailure(`don't know how to synthesize placeholder ?${syntax.name}`);
        }
        return { term: { kind: 'mvar', name: syntax.name }, type: undefined };
      case 'app':
        return this.elaborateApp(syntax.fn, syntax.arg);
      case 'arrow':
        return this.elaborateArrow(syntax.domain, syntax.codomain);
    }
  }

  /** elaborate 並要求結果為型別（其型別為 sort） */
  elaborateType(syntax: Syntax): Term {
    const { term, type } = this.elaborate(syntax);
    if (type && type.kind !== 'sort') {
      throw new ElaborationFailure(
        `type expected: ${prettySyntax(syntax)} has type ${prettyTerm(type)}`,
      );
    }
    return term;
  }

  private elaborateIdent(name: string): Elaborated {
    for (let i = this.context.length - 1; i >= 0; i--) {
      const hyp = this.context[i];
      if (hyp.name === name) return { term: { kind: 'fvar', name }, type: hyp.type };
    }

    if (name === 'Prop') return { term: PROP, type: TYPE };
    if (name === 'Type') return { term: TYPE, type: TYPE };

    const candidates = this.env.resolveGlobalName(name);
    const exact = candidates.find((c) => c.fields.length === 0);
    if (exact) {
      return { term: { kind: 'const', name: exact.name }, type: this.env.typeOf(exact.name) };
    }
    if (candidates.length > 0) {
      const [first] = candidates;
      throw new ElaborationFailure(
        `invalid field notation: '${first.fields.join('.')}' on '${first.name}' is not supported`,
      );
    }

    if (this.mode === 'tactic') {
      throw new ElaborationFailure(`unknown identifier '${name}'`);
    }
    return { term: { kind: 'fvar', name }, type: undefined };
  }

  private elaborateApp(fnSyntax: Syntax, argSyntax: Syntax): Elaborated {
    const fn = this.elaborate(fnSyntax);
    const arg = this.elaborate(argSyntax);
    const term: Term = { kind: 'app', fn: fn.term, arg: arg.term };

    if (!fn.type) return { term, type: undefined };
    if (fn.type.kind !== 'arrow') {
      throw new ElaborationFailure(
        `function expected: ${prettySyntax(fnSyntax)} has type ${prettyTerm(fn.type)}`,
      );
    }
    if (arg.type && !termEquals(arg.type, fn.type.domain)) {
      throw new ElaborationFailure(
        `application type mismatch: ${prettySyntax(argSyntax)} has type ${prettyTerm(arg.type)} `
          + `but is expected to have type ${prettyTerm(fn.type.domain)}`,
      );
    }
    return { term, type: fn.type.codomain };
  }

  private elaborateArrow(domainSyntax: Syntax, codomainSyntax: Syntax): Elaborated {
    const domain = this.elaborateType(domainSyntax);
    const codomain = this.elaborate(codomainSyntax);
    if (codomain.type && codomain.type.kind !== 'sort') {
      throw new ElaborationFailure(
        `type expected: ${prettySyntax(codomainSyntax)} has type ${prettyTerm(codomain.type)}`,
      );
    }
    return {
      term: { kind: 'arrow', domain, codomain: codomain.term },
      type: codomain.type,
    };
  }
}
