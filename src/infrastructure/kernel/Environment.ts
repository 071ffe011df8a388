import type { NameCandidate } from '../../domain/ports/EnginePort.js';
import type { Term } from './Term.js';

/**
 * 全域宣告環境
 *
 * 保存常數名稱與型別，以及名稱解析時額外搜尋的 open namespaces。
 */
export class Environment {
  private readonly constants = new Map<string, Term>();

  constructor(private readonly openNamespaces: readonly string[] = []) {}

  get size(): number {
    return this.constants.size;
  }

  get namespaces(): readonly string[] {
    return this.openNamespaces;
  }

  has(name: string): boolean {
    return this.constants.has(name);
  }

  typeOf(name: string): Term | undefined {
    return this.constants.get(name);
  }

  declare(name: string, type: Term): void {
    if (this.constants.has(name)) {
      throw new Error(`'${name}' has already been declared`);
    }
    this.constants.set(name, type);
  }

  /**
   * 解析可能帶欄位的名稱
   *
   * `a.b.c` 依序嘗試宣告名稱 `a.b.c`、`a.b`、`a`（較長者優先），
   * 每個長度先比對原名，再比對各 open namespace 下的全名；剩餘部分為 fields。
   */
  resolveGlobalName(name: string): NameCandidate[] {
    const parts = name.split('.');
    if (parts.some((p) => p.length === 0)) return [];

    const candidates: NameCandidate[] = [];
    const seen = new Set<string>();

    for (let k = parts.length; k >= 1; k--) {
      const decl = parts.slice(0, k).join('.');
      const fields = parts.slice(k);
      const fullNames = [decl, ...this.openNamespaces.map((ns) => `${ns}.${decl}`)];
      for (const full of fullNames) {
        const key = `${full}|${fields.join('.')}`;
        if (this.constants.has(full) && !seen.has(key)) {
          seen.add(key);
          candidates.push({ name: full, fields });
        }
      }
    }
    return candidates;
  }
}
