import type { Diagnostic, SourcePosition } from '../../domain/ports/EnginePort.js';
import type { StepBudget } from '../../domain/value-objects/StepBudget.js';
import type { Environment } from './Environment.js';
import { ElaborationFailure, Elaborator, type Elaborated, type LocalHyp } from './Elaborator.js';
import { prettySyntax, type Syntax } from './ExpressionParser.js';
import type { Tactic } from './TacticParser.js';
import { prettyTerm, termEquals, type Term } from './Term.js';

export interface Goal {
  readonly name: string;
  readonly context: readonly LocalHyp[];
  readonly target: Term;
}

/**
 * 引擎的可變 context
 *
 * goals 與 diagnostics 陣列可被替換；Goal 物件本身視為不可變，因此淺拷貝即可回滾。
 */
export interface KernelState {
  goals: Goal[];
  diagnostics: Diagnostic[];
}

/** tactic 執行失敗（可被 try / repeat 攔截；預算耗盡不屬於此類） */
export class TacticFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TacticFailure';
  }
}

export interface TacticContext {
  env: Environment;
  budget: StepBudget;
  position: SourcePosition | null;
}

export const SORRY_WARNING = "declaration uses 'sorry'";

export function cloneState(state: KernelState): KernelState {
  return { goals: [...state.goals], diagnostics: [...state.diagnostics] };
}

function restoreState(state: KernelState, saved: KernelState): void {
  state.goals = saved.goals;
  state.diagnostics = saved.diagnostics;
}

function mainGoal(state: KernelState): Goal {
  const [goal] = state.goals;
  if (!goal) throw new TacticFailure('no goals to be proved');
  return goal;
}

function elaborateIn(goal: Goal, syntax: Syntax, ctx: TacticContext): Elaborated & { type: Term } {
  try {
    const result = new Elaborator(ctx.env, goal.context, 'tactic', ctx.budget).elaborate(syntax);
    if (!result.type) {
      throw new TacticFailure(`failed to infer the type of ${prettySyntax(syntax)}`);
    }
    return { term: result.term, type: result.type };
  } catch (err) {
    if (err instanceof ElaborationFailure) throw new TacticFailure(err.message);
    throw err;
  }
}

function pushDiagnostic(
  state: KernelState,
  severity: Diagnostic['severity'],
  message: string,
  ctx: TacticContext,
): void {
  state.diagnostics = [...state.diagnostics, { severity, message, position: ctx.position }];
}

/** 執行一個 tactic；每次呼叫消耗 1 個步驟預算 */
export function runTactic(tactic: Tactic, state: KernelState, ctx: TacticContext): void {
  ctx.budget.consume();

  switch (tactic.kind) {
    case 'seq':
      for (const step of tactic.steps) runTactic(step, state, ctx);
      return;

    case 'skip':
      return;

    case 'fail':
      throw new TacticFailure(tactic.message);

    case 'trace':
      pushDiagnostic(state, 'info', tactic.message, ctx);
      return;

    case 'logError':
      pushDiagnostic(state, 'error', tactic.message, ctx);
      return;

    case 'sorry': {
      mainGoal(state);
      state.goals = state.goals.slice(1);
      pushDiagnostic(state, 'warning', SORRY_WARNING, ctx);
      return;
    }

    case 'exact': {
      const goal = mainGoal(state);
      const { type } = elaborateIn(goal, tactic.term, ctx);
      if (!termEquals(type, goal.target)) {
        throw new TacticFailure(
          `type mismatch: ${prettySyntax(tactic.term)} has type ${prettyTerm(type)} `
            + `but is expected to have type ${prettyTerm(goal.target)}`,
        );
      }
      state.goals = state.goals.slice(1);
      return;
    }

    case 'intro': {
      let goal = mainGoal(state);
      for (const name of tactic.names) {
        if (goal.target.kind !== 'arrow') {
          throw new TacticFailure(`no additional binders to introduce for '${name}'`);
        }
        goal = {
          name: goal.name,
          context: [...goal.context, { name, type: goal.target.domain }],
          target: goal.target.codomain,
        };
      }
      state.goals = [goal, ...state.goals.slice(1)];
      return;
    }

    case 'apply': {
      const goal = mainGoal(state);
      const { type } = elaborateIn(goal, tactic.term, ctx);
      const premises: Term[] = [];
      let conclusion: Term = type;
      for (;;) {
        if (termEquals(conclusion, goal.target)) break;
        if (conclusion.kind !== 'arrow') {
          throw new TacticFailure(
            `apply failed: could not unify the conclusion of ${prettySyntax(tactic.term)} `
              + `with the goal ${prettyTerm(goal.target)}`,
          );
        }
        premises.push(conclusion.domain);
        conclusion = conclusion.codomain;
      }
      const subgoals: Goal[] = premises.map((target, i) => ({
        name: `${goal.name}_${i + 1}`,
        context: goal.context,
        target,
      }));
      state.goals = [...subgoals, ...state.goals.slice(1)];
      return;
    }

    case 'assumption': {
      const goal = mainGoal(state);
      const found = [...goal.context].reverse().find((h) => termEquals(h.type, goal.target));
      if (!found) {
        throw new TacticFailure(`no hypothesis matches the goal ${prettyTerm(goal.target)}`);
      }
      state.goals = state.goals.slice(1);
      return;
    }

    case 'try': {
      const saved = cloneState(state);
      try {
        runTactic(tactic.body, state, ctx);
      } catch (err) {
        if (!(err instanceof TacticFailure)) throw err;
        restoreState(state, saved);
      }
      return;
    }

    case 'repeat': {
      for (;;) {
        const saved = cloneState(state);
        try {
          runTactic(tactic.body, state, ctx);
        } catch (err) {
          if (!(err instanceof TacticFailure)) throw err;
          restoreState(state, saved);
          return;
        }
      }
    }
  }
}
