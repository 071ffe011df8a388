import { ProofSession } from '../domain/entities/ProofSession.js';
import type { EnginePort } from '../domain/ports/EnginePort.js';
import { SessionUseCase, type BudgetPolicy } from '../application/SessionUseCase.js';
import type { SessionOperations } from '../application/SessionOperations.js';
import { Logger } from '../shared/Logger.js';
import { Dispatcher, type LineWriter } from './Dispatcher.js';
import { OperationRegistry } from './OperationRegistry.js';
import { registerApplyStepOperation } from './operations/ApplyStepOperation.js';
import { registerQueryStateOperation } from './operations/QueryStateOperation.js';
import { registerQueryMessagesOperation } from './operations/QueryMessagesOperation.js';
import { registerResolveNameOperation } from './operations/ResolveNameOperation.js';
import { registerUnifyOperation } from './operations/UnifyOperation.js';
import { registerNewStateOperation } from './operations/NewStateOperation.js';
import { registerGiveUpOperation } from './operations/GiveUpOperation.js';
import { registerCommitOperation } from './operations/CommitOperation.js';
import { registerPositionOperation } from './operations/PositionOperation.js';
import { registerQueryHistoryOperation } from './operations/QueryHistoryOperation.js';

/**
 * Protocol Server Factory
 *
 * 設計意圖：在引擎掛上時建立 session（root 節點擷取 ambient 起始狀態），
 * 註冊所有 operation，並組裝 dispatcher。
 */

export interface ProtocolDependencies<TSnapshot, TStep, TExpr> {
  engine: EnginePort<TSnapshot, TStep, TExpr>;
  writer: LineWriter;
  budget: BudgetPolicy;
  logger?: Logger;
}

export interface ProtocolServer<TSnapshot> {
  session: ProofSession<TSnapshot>;
  operations: SessionOperations;
  registry: OperationRegistry;
  dispatcher: Dispatcher;
}

export function createOperationRegistry(operations: SessionOperations): OperationRegistry {
  const registry = new OperationRegistry();

  // === 證明步驟 ===
  registerApplyStepOperation(registry, operations);
  registerNewStateOperation(registry, operations);
  registerGiveUpOperation(registry, operations);
  registerCommitOperation(registry, operations);

  // === 查詢（不修改證明樹） ===
  registerQueryStateOperation(registry, operations);
  registerQueryMessagesOperation(registry, operations);
  registerQueryHistoryOperation(registry, operations);
  registerResolveNameOperation(registry, operations);
  registerUnifyOperation(registry, operations);
  registerPositionOperation(registry, operations);

  return registry;
}

export function createProtocolServer<TSnapshot, TStep, TExpr>(
  deps: ProtocolDependencies<TSnapshot, TStep, TExpr>,
): ProtocolServer<TSnapshot> {
  const logger = deps.logger ?? new Logger('ProtocolServer');
  const session = new ProofSession(deps.engine.captureSnapshot());
  const operations = new SessionUseCase(deps.engine, session, deps.budget);
  const registry = createOperationRegistry(operations);
  const dispatcher = new Dispatcher(registry, deps.writer, logger.child('Dispatcher'));

  logger.debug('Protocol server ready', {
    methods: registry.list().map((op) => op.method),
    defaultBudget: deps.budget.defaultBudget,
  });

  return { session, operations, registry, dispatcher };
}
