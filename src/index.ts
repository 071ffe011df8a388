export { ProofSession, type SessionStatus } from './domain/entities/ProofSession.js';
export { ROOT_NODE_ID, type NodeId, type NodePathEntry, type ProofNode } from './domain/entities/ProofNode.js';
export * from './domain/errors/DomainErrors.js';
export type * from './domain/ports/EnginePort.js';
export { StepBudget, BudgetExhaustedError } from './domain/value-objects/StepBudget.js';
export { SessionUseCase, type BudgetPolicy } from './application/SessionUseCase.js';
export type { SessionOperations } from './application/SessionOperations.js';
export { Dispatcher, type LineWriter } from './protocol/Dispatcher.js';
export { OperationRegistry, type OperationDescriptor } from './protocol/OperationRegistry.js';
export {
  createOperationRegistry,
  createProtocolServer,
  type ProtocolDependencies,
  type ProtocolServer,
} from './protocol/ProtocolServer.js';
export { encodeResponse, decodeResponse, type WireRequest, type WireResponse } from './protocol/wire.js';
export {
  createStreamWriter,
  exitCodeFor,
  ExitCode,
  runSessionLoop,
  type LoopOutcome,
  type LoopResult,
  type StreamLineWriter,
} from './protocol/transports/SessionLoop.js';
export { KernelEngine, type KernelSnapshot } from './infrastructure/kernel/KernelEngine.js';
export { loadPrelude, buildPrelude, PreludeError, type Prelude } from './infrastructure/kernel/PreludeLoader.js';
export { loadConfig, type ProoflineConfig, type PartialConfig } from './config/ConfigLoader.js';
export { Logger, type LogLevel } from './shared/Logger.js';
