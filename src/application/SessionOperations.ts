import type { NodeId, NodePathEntry } from '../domain/entities/ProofNode.js';
import type {
  Diagnostic,
  GoalSpec,
  GoalView,
  NameCandidate,
  SourcePosition,
  Unifier,
} from '../domain/ports/EnginePort.js';

/**
 * 每個具體 session 必須提供的能力集合
 *
 * Operation registry 的 handler 只依賴此介面。
 */
export interface SessionOperations {
  applyStep(sid: NodeId, step: string, budget?: number): NodeId;
  queryState(sid: NodeId): GoalView[];
  queryMessages(sid: NodeId): Diagnostic[];
  resolveName(sid: NodeId, name: string): NameCandidate[];
  unify(sid: NodeId, lhs: string, rhs: string): Unifier | null;
  newState(goals: GoalSpec[]): NodeId;
  giveUp(sid: NodeId): NodeId;
  commit(sid: NodeId): void;
  position(): SourcePosition | null;
  queryHistory(sid: NodeId): NodePathEntry[];
}
