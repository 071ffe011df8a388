import type { ProofSession } from '../domain/entities/ProofSession.js';
import { ROOT_NODE_ID, type NodeId, type NodePathEntry } from '../domain/entities/ProofNode.js';
import type {
  Diagnostic,
  EnginePort,
  GoalSpec,
  GoalView,
  NameCandidate,
  SourcePosition,
  Unifier,
} from '../domain/ports/EnginePort.js';
import {
  ElaborationError,
  ExpressionParseError,
  InvalidParamsError,
  StepExecutionError,
  StepParseError,
} from '../domain/errors/DomainErrors.js';
import type { SessionOperations } from './SessionOperations.js';

export interface BudgetPolicy {
  /** applyStep 未指定 budget 時使用 */
  defaultBudget: number;
  /** 可接受的最大 budget */
  maxBudget: number;
}

/**
 * Session 用例：在單一可變引擎 context 上模擬可分支的證明樹
 *
 * - 每個讀寫目標狀態的操作都先 restore 指定節點的 snapshot
 * - applyStep 為原子操作：任何失敗都還原到步驟前的 snapshot，不附加節點
 * - newState / giveUp 附加 step 為空字串的管理性節點
 * - commit 不附加節點，只停止 session
 */
export class SessionUseCase<TSnapshot, TStep, TExpr> implements SessionOperations {
  constructor(
    private readonly engine: EnginePort<TSnapshot, TStep, TExpr>,
    private readonly session: ProofSession<TSnapshot>,
    private readonly budget: BudgetPolicy,
  ) {}

  applyStep(sid: NodeId, step: string, budget?: number): NodeId {
    const limit = this.resolveBudget(budget);
    const node = this.session.lookup(sid);
    this.engine.restore(node.snapshot);

    const parsed = this.engine.parseStepSyntax(step);
    if (!parsed.ok) {
      throw new StepParseError(parsed.error);
    }

    const diagnosticsBefore = this.engine.accumulatedDiagnostics().length;
    const outcome = this.engine.executeStep(parsed.value, limit);
    if (!outcome.ok) {
      this.engine.restore(node.snapshot);
      throw new StepExecutionError(outcome.error);
    }

    // 引擎未拋出但累積了錯誤診斷：步驟作廢
    const newErrors = this.engine
      .accumulatedDiagnostics()
      .slice(diagnosticsBefore)
      .filter((d) => d.severity === 'error');
    if (newErrors.length > 0) {
      this.engine.restore(node.snapshot);
      throw new StepExecutionError(newErrors.map((d) => d.message));
    }

    return this.session.append({
      snapshot: this.engine.captureSnapshot(),
      parent: sid,
      step,
    });
  }

  queryState(sid: NodeId): GoalView[] {
    this.restoreAt(sid);
    return this.engine.currentGoals();
  }

  queryMessages(sid: NodeId): Diagnostic[] {
    this.restoreAt(sid);
    return this.engine.accumulatedDiagnostics();
  }

  resolveName(sid: NodeId, name: string): NameCandidate[] {
    this.restoreAt(sid);
    return this.engine.resolveGlobalName(name);
  }

  unify(sid: NodeId, lhs: string, rhs: string): Unifier | null {
    this.restoreAt(sid);

    const left = this.engine.parseExpression(lhs);
    if (!left.ok) throw new ExpressionParseError(left.error);
    const right = this.engine.parseExpression(rhs);
    if (!right.ok) throw new ExpressionParseError(right.error);

    const result = this.engine.unifyExpressions(left.value, right.value);
    if (!result.ok) throw new ElaborationError(result.error);
    return result.value;
  }

  newState(goals: GoalSpec[]): NodeId {
    const built = this.engine.buildContextFromSpec(goals);
    if (!built.ok) {
      throw built.error.stage === 'parse'
        ? new ExpressionParseError(built.error.message)
        : new ElaborationError(built.error.message);
    }
    return this.session.append({ snapshot: built.value, parent: ROOT_NODE_ID, step: '' });
  }

  giveUp(sid: NodeId): NodeId {
    this.restoreAt(sid);
    this.engine.admitAllOpenGoals();
    return this.session.append({
      snapshot: this.engine.captureSnapshot(),
      parent: sid,
      step: '',
    });
  }

  commit(sid: NodeId): void {
    this.restoreAt(sid);
    this.session.stop();
  }

  position(): SourcePosition | null {
    return this.engine.currentSourcePosition();
  }

  queryHistory(sid: NodeId): NodePathEntry[] {
    return this.session.path(sid);
  }

  private restoreAt(sid: NodeId): void {
    this.engine.restore(this.session.lookup(sid).snapshot);
  }

  private resolveBudget(requested: number | undefined): number {
    const limit = requested ?? this.budget.defaultBudget;
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidParamsError(`budget must be a positive integer, got ${limit}`);
    }
    if (limit > this.budget.maxBudget) {
      throw new InvalidParamsError(
        `budget ${limit} exceeds the configured maximum of ${this.budget.maxBudget}`,
      );
    }
    return limit;
  }
}
