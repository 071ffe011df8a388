import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { GoalSpec, SourcePosition, SpecFailure, Outcome } from '../../domain/ports/EnginePort.js';
import { Environment } from './Environment.js';
import { ElaborationFailure, Elaborator } from './Elaborator.js';
import { parseExpression } from './ExpressionParser.js';
import type { Goal } from './TacticRunner.js';

/** 隨套件附帶的核心 prelude */
export const BUNDLED_PRELUDE_PATH = fileURLToPath(
  new URL('../../../prelude/core.json', import.meta.url),
);

const IDENT = /^[A-Za-z_][A-Za-z0-9_'.]*$/;

const GoalSpecSchema = z.object({
  name: z.string().regex(IDENT, 'goal name must be an identifier'),
  type: z.string().min(1),
});

const PreludeSchema = z.object({
  declarations: z.array(z.object({
    name: z.string().regex(IDENT, 'declaration name must be an identifier'),
    type: z.string().min(1),
  })),
  open: z.array(z.string()).optional().default([]),
  goals: z.array(GoalSpecSchema).optional().default([]),
  position: z.object({
    line: z.number().int().positive(),
    column: z.number().int().nonnegative(),
  }).optional(),
});

/** 引擎的 ambient 起始狀態 */
export interface Prelude {
  environment: Environment;
  goals: Goal[];
  position: SourcePosition | null;
}

export class PreludeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PreludeError';
  }
}

/**
 * 由 GoalSpec 建立無 hypothesis 的目標
 *
 * 型別文字解析失敗為 parse 階段，elaboration 失敗（含非型別）為 elaboration 階段。
 */
export function buildGoals(env: Environment, specs: readonly GoalSpec[]): Outcome<Goal[], SpecFailure> {
  const goals: Goal[] = [];
  for (const spec of specs) {
    const parsed = parseExpression(spec.type);
    if (!parsed.ok) {
      return { ok: false, error: { stage: 'parse', message: `${spec.name}: ${parsed.error}` } };
    }
    try {
      const target = new Elaborator(env, [], 'tactic').elaborateType(parsed.value);
      goals.push({ name: spec.name, context: [], target });
    } catch (err) {
      if (err instanceof ElaborationFailure) {
        return { ok: false, error: { stage: 'elaboration', message: `${spec.name}: ${err.message}` } };
      }
      throw err;
    }
  }
  return { ok: true, value: goals };
}

/** 驗證並建構 prelude；宣告依序 elaborate，後者可引用前者 */
export function buildPrelude(document: unknown): Prelude {
  const result = PreludeSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new PreludeError(`Invalid prelude: ${issues.join('; ')}`);
  }
  const doc = result.data;

  const environment = new Environment(doc.open);
  for (const decl of doc.declarations) {
    const parsed = parseExpression(decl.type);
    if (!parsed.ok) {
      throw new PreludeError(`Declaration '${decl.name}': ${parsed.error}`);
    }
    try {
      const type = new Elaborator(environment, [], 'tactic').elaborateType(parsed.value);
      environment.declare(decl.name, type);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PreludeError(`Declaration '${decl.name}': ${message}`, { cause: err });
    }
  }

  const goals = buildGoals(environment, doc.goals);
  if (!goals.ok) {
    throw new PreludeError(`Initial goal ${goals.error.message}`);
  }

  return {
    environment,
    goals: goals.value,
    position: doc.position ?? null,
  };
}

export function loadPrelude(filePath: string = BUNDLED_PRELUDE_PATH): Prelude {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new PreludeError(`Cannot read prelude at ${filePath}`, { cause: err });
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new PreludeError(`Prelude at ${filePath} is not valid JSON`, { cause: err });
  }
  return buildPrelude(document);
}
