import type {
  Diagnostic,
  EnginePort,
  GoalSpec,
  GoalView,
  NameCandidate,
  Outcome,
  SourcePosition,
  SpecFailure,
  Unifier,
} from '../../domain/ports/EnginePort.js';
import { EngineFaultError } from '../../domain/errors/DomainErrors.js';
import { BudgetExhaustedError, StepBudget } from '../../domain/value-objects/StepBudget.js';
import { Logger } from '../../shared/Logger.js';
import { ElaborationFailure, Elaborator } from './Elaborator.js';
import { parseExpression, type Syntax } from './ExpressionParser.js';
import { buildGoals, type Prelude } from './PreludeLoader.js';
import { parseTacticScript, type Tactic } from './TacticParser.js';
import {
  cloneState,
  runTactic,
  SORRY_WARNING,
  TacticFailure,
  type Goal,
  type KernelState,
} from './TacticRunner.js';
import { collectMVars, instantiate, prettyTerm, type Assignment, type Term } from './Term.js';
import { unifyTerms } from './Unification.js';

/** 凍結後的 KernelState；只有本引擎擷取的 snapshot 可被 restore */
export type KernelSnapshot = Readonly<{
  goals: readonly Goal[];
  diagnostics: readonly Diagnostic[];
}>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function elaborateBoth(elaborator: Elaborator, lhs: Syntax, rhs: Syntax): Outcome<[Term, Term]> {
  try {
    return { ok: true, value: [elaborator.elaborate(lhs).term, elaborator.elaborate(rhs).term] };
  } catch (err) {
    if (err instanceof ElaborationFailure) return { ok: false, error: err.message };
    throw err;
  }
}

export function renderGoal(goal: Goal): GoalView {
  const hypotheses = goal.context.map((h) => ({ name: h.name, type: prettyTerm(h.type) }));
  const target = prettyTerm(goal.target);
  const pretty = [...hypotheses.map((h) => `${h.name} : ${h.type}`), `⊢ ${target}`].join('\n');
  return { name: goal.name, hypotheses, target, pretty };
}

/**
 * 內建證明引擎
 *
 * 設計意圖：以單一可變 context（state）模擬外部證明引擎。
 * restore 只複製頂層陣列，Goal 與 Term 為凍結物件，在 snapshot 之間共享。
 */
export class KernelEngine implements EnginePort<KernelSnapshot, Tactic, Syntax> {
  private state: KernelState;
  private readonly issued = new WeakSet<KernelSnapshot>();

  constructor(
    private readonly prelude: Prelude,
    private readonly logger: Logger = new Logger('KernelEngine'),
  ) {
    this.state = { goals: [...prelude.goals], diagnostics: [] };
  }

  restore(snapshot: KernelSnapshot): void {
    if (!this.issued.has(snapshot)) {
      throw new EngineFaultError('Attempted to restore a snapshot not issued by this engine');
    }
    this.state = { goals: [...snapshot.goals], diagnostics: [...snapshot.diagnostics] };
  }

  captureSnapshot(): KernelSnapshot {
    const snapshot: KernelSnapshot = deepFreeze(cloneState(this.state));
    this.issued.add(snapshot);
    return snapshot;
  }

  currentGoals(): GoalView[] {
    return this.state.goals.map(renderGoal);
  }

  accumulatedDiagnostics(): Diagnostic[] {
    return this.state.diagnostics.map((d) => ({ ...d }));
  }

  currentSourcePosition(): SourcePosition | null {
    return this.prelude.position ? { ...this.prelude.position } : null;
  }

  parseStepSyntax(text: string): Outcome<Tactic> {
    return parseTacticScript(text);
  }

  executeStep(step: Tactic, budget: number): Outcome<void, string[]> {
    const stepBudget = new StepBudget(budget);
    try {
      runTactic(step, this.state, {
        env: this.prelude.environment,
        budget: stepBudget,
        position: this.prelude.position,
      });
      this.logger.debug('Step executed', { budget, used: stepBudget.used });
      return { ok: true, value: undefined };
    } catch (err) {
      if (err instanceof TacticFailure || err instanceof BudgetExhaustedError) {
        this.logger.debug('Step failed', { budget, used: stepBudget.used, error: err.message });
        return { ok: false, error: [err.message] };
      }
      throw err;
    }
  }

  admitAllOpenGoals(): void {
    const admitted = this.state.goals.length;
    const warnings: Diagnostic[] = this.state.goals.map(() => ({
      severity: 'warning',
      message: SORRY_WARNING,
      position: this.prelude.position,
    }));
    this.state = { goals: [], diagnostics: [...this.state.diagnostics, ...warnings] };
    this.logger.debug('Admitted open goals', { admitted });
  }

  buildContextFromSpec(goals: GoalSpec[]): Outcome<KernelSnapshot, SpecFailure> {
    const built = buildGoals(this.prelude.environment, goals);
    if (!built.ok) return built;
    this.state = { goals: built.value, diagnostics: [] };
    return { ok: true, value: this.captureSnapshot() };
  }

  resolveGlobalName(name: string): NameCandidate[] {
    return this.prelude.environment.resolveGlobalName(name);
  }

  parseExpression(text: string): Outcome<Syntax> {
    return parseExpression(text);
  }

  /** 在主目標的 hypotheses 下以 pattern 模式 elaborate 兩側後 unify */
  unifyExpressions(lhs: Syntax, rhs: Syntax): Outcome<Unifier | null> {
    const context = this.state.goals[0]?.context ?? [];
    const elaborator = new Elaborator(this.prelude.environment, context, 'pattern');

    const elaborated = elaborateBoth(elaborator, lhs, rhs);
    if (!elaborated.ok) return elaborated;
    const [left, right] = elaborated.value;

    const assignment: Assignment = new Map();
    if (!unifyTerms(left, right, assignment)) {
      return { ok: true, value: null };
    }

    // fromEntries 讓 `__proto__` 之類的名稱也成為自有屬性
    const unifier: Unifier = Object.fromEntries(
      collectMVars(right, collectMVars(left)).map((name): [string, string | null] => {
        const solution = instantiate({ kind: 'mvar', name }, assignment);
        return [name, solution.kind === 'mvar' && solution.name === name ? null : prettyTerm(solution)];
      }),
    );
    return { ok: true, value: unifier };
  }
}
