/** 引擎回傳的成功或失敗結果；只有狀態毀損才會以例外拋出 */
export type Outcome<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** newState 的單一目標規格 */
export interface GoalSpec {
  name: string;
  /** 目標型別的原始文字 */
  type: string;
}

export interface HypothesisView {
  name: string;
  type: string;
}

/** 已 pretty-print 的開放目標 */
export interface GoalView {
  name: string;
  hypotheses: HypothesisView[];
  target: string;
  /** `name : type` 各行，最後一行 `⊢ target` */
  pretty: string;
}

export interface SourcePosition {
  line: number;
  column: number;
}

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  position: SourcePosition | null;
}

/** 名稱解析候選：宣告名稱與其後未被宣告吸收的欄位 */
export interface NameCandidate {
  name: string;
  fields: string[];
}

/** metavariable 名稱（不含 `?`）→ 解的文字，未指派則為 null */
export type Unifier = Record<string, string | null>;

/** buildContextFromSpec 失敗時的階段 */
export interface SpecFailure {
  stage: 'parse' | 'elaboration';
  message: string;
}

/**
 * 證明引擎能力介面
 *
 * 引擎只有一個可變的「目前」context；restore 是改變它的唯一合法方式。
 * TSnapshot 一旦擷取即不可變。
 */
export interface EnginePort<TSnapshot, TStep, TExpr> {
  restore(snapshot: TSnapshot): void;
  captureSnapshot(): TSnapshot;

  currentGoals(): GoalView[];
  accumulatedDiagnostics(): Diagnostic[];
  currentSourcePosition(): SourcePosition | null;

  parseStepSyntax(text: string): Outcome<TStep>;
  /** 在步驟預算內執行；失敗時附帶訊息清單，目前 context 可能已部分修改 */
  executeStep(step: TStep, budget: number): Outcome<void, string[]>;
  admitAllOpenGoals(): void;

  /** 以使用者提供的目標建立全新 context（無 local hypotheses），並設為目前 context */
  buildContextFromSpec(goals: GoalSpec[]): Outcome<TSnapshot, SpecFailure>;

  resolveGlobalName(name: string): NameCandidate[];
  parseExpression(text: string): Outcome<TExpr>;
  /** elaboration 失敗為 error；無 unifier 時 value 為 null */
  unifyExpressions(lhs: TExpr, rhs: TExpr): Outcome<Unifier | null>;
}
