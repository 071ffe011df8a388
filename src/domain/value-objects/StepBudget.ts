/**
 * 步驟預算
 *
 * 設計意圖：限制單次 applyStep 中引擎可執行的內部步驟數。
 * 這是協作式上限：引擎在每個步驟前呼叫 consume()，超出時拋出 BudgetExhaustedError，
 * 並非牆鐘時間的搶占。
 */
export class BudgetExhaustedError extends Error {
  constructor(public readonly limit: number) {
    super(`maximum step budget of ${limit} exceeded`);
    this.name = 'BudgetExhaustedError';
  }
}

export class StepBudget {
  private consumed = 0;

  constructor(public readonly limit: number) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError('budget must be a positive integer');
    }
  }

  get used(): number {
    return this.consumed;
  }

  get remaining(): number {
    return this.limit - this.consumed;
  }

  /** 消耗 n 個步驟；超出上限時拋出 BudgetExhaustedError */
  consume(n = 1): void {
    this.consumed += n;
    if (this.consumed > this.limit) {
      throw new BudgetExhaustedError(this.limit);
    }
  }
}
