import type { LogLevel } from '../shared/Logger.js';

/** 引擎設定 */
export interface EngineConfig {
  /** prelude JSON 路徑（相對於 repo root）；未設定時使用隨套件附帶的核心 prelude */
  preludePath?: string;
  /** applyStep 未指定 budget 時的步驟預算 */
  defaultBudget: number;
  /** 單次 applyStep 可接受的最大步驟預算 */
  maxBudget: number;
}

/** 日誌設定 */
export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface ProoflineConfig {
  version: number;
  engine: EngineConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof ProoflineConfig]?: ProoflineConfig[K] extends object
    ? Partial<ProoflineConfig[K]>
    : ProoflineConfig[K];
};
