import fs from 'node:fs';
import path from 'node:path';
import { isLogLevel } from '../shared/Logger.js';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { ProoflineConfig, PartialConfig } from './types.js';

export type { ProoflineConfig, PartialConfig } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 深層合併：partial 覆蓋 base，undefined 不覆蓋 */
function deepMerge(base: Record<string, unknown>, partial: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, val] of Object.entries(partial)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** 環境變數覆蓋：PROOFLINE_LOG_LEVEL → log.level、PROOFLINE_PRELUDE → engine.preludePath */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  const env: Record<string, unknown> = {};
  const level = process.env.PROOFLINE_LOG_LEVEL;
  const prelude = process.env.PROOFLINE_PRELUDE;
  if (level) env.log = { level };
  if (prelude) env.engine = { preludePath: prelude };
  return deepMerge(config, env);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/** 驗證合併後的設定並收斂為 ProoflineConfig */
function validate(raw: Record<string, unknown>): ProoflineConfig {
  const engine = isPlainObject(raw.engine) ? raw.engine : {};
  const log = isPlainObject(raw.log) ? raw.log : {};

  const { defaultBudget, maxBudget, preludePath } = engine;
  if (!isPositiveInteger(defaultBudget)) {
    throw new Error('engine.defaultBudget must be a positive integer');
  }
  if (!isPositiveInteger(maxBudget)) {
    throw new Error('engine.maxBudget must be a positive integer');
  }
  if (maxBudget < defaultBudget) {
    throw new Error('engine.maxBudget must be greater than or equal to engine.defaultBudget');
  }
  if (preludePath !== undefined && typeof preludePath !== 'string') {
    throw new Error('engine.preludePath must be a string');
  }

  const level = log.level;
  if (typeof level !== 'string' || !isLogLevel(level)) {
    throw new Error('log.level must be one of debug, info, warn, error');
  }

  return {
    version: typeof raw.version === 'number' ? raw.version : DEFAULT_CONFIG.version,
    engine: preludePath === undefined
      ? { defaultBudget, maxBudget }
      : { preludePath, defaultBudget, maxBudget },
    log: { level },
  };
}

/**
 * 載入設定：讀取 .proofline.json（若存在）並合併到預設值上
 * @param repoRoot - repo 根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  repoRoot: string,
  overrides?: PartialConfig,
): ProoflineConfig {
  let fileConfig: Record<string, unknown> = {};

  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (!isPlainObject(parsed)) {
      throw new Error(`${CONFIG_FILE_NAME} must contain a JSON object`);
    }
    fileConfig = parsed;
  }

  // 合併順序：defaults < file config < overrides < 環境變數
  let merged = deepMerge({ ...DEFAULT_CONFIG }, fileConfig);
  if (overrides) {
    merged = deepMerge(merged, { ...overrides });
  }
  merged = applyEnvOverrides(merged);

  return validate(merged);
}

/** 將設定中的 prelude 路徑解析為絕對路徑；未設定則回傳 undefined */
export function resolvePreludePath(config: ProoflineConfig, repoRoot: string): string | undefined {
  const { preludePath } = config.engine;
  return preludePath === undefined ? undefined : path.resolve(repoRoot, preludePath);
}
