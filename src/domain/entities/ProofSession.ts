import { InvalidParamsError } from '../errors/DomainErrors.js';
import { ROOT_NODE_ID, type NodeId, type NodePathEntry, type ProofNode } from './ProofNode.js';

/** Loop 只需要讀取的 session 狀態 */
export interface SessionStatus {
  readonly size: number;
  isRunning(): boolean;
}

/**
 * Session 狀態機
 *
 * 設計意圖：nodes 為 arena，NodeId 為索引，snapshot 為 arena 的 payload。
 * 所有演進都是附加：既有節點不會被修改或移除。running 僅能由 true 轉為 false 一次。
 */
export class ProofSession<TSnapshot> implements SessionStatus {
  private readonly nodes: ProofNode<TSnapshot>[] = [];
  private running = true;

  constructor(rootSnapshot: TSnapshot) {
    this.nodes.push(Object.freeze({ snapshot: rootSnapshot, parent: ROOT_NODE_ID, step: '' }));
  }

  get size(): number {
    return this.nodes.length;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** 附加節點並回傳新 id（等於附加前的節點數） */
  append(node: ProofNode<TSnapshot>): NodeId {
    const id = this.nodes.length;
    if (!Number.isInteger(node.parent) || node.parent < 0 || node.parent >= id) {
      throw new InvalidParamsError(`Invalid parent node id: ${node.parent}`);
    }
    this.nodes.push(Object.freeze({ snapshot: node.snapshot, parent: node.parent, step: node.step }));
    return id;
  }

  lookup(id: NodeId): ProofNode<TSnapshot> {
    if (!Number.isInteger(id) || id < 0 || id >= this.nodes.length) {
      throw new InvalidParamsError(
        `Invalid node id ${id}: session has ${this.nodes.length} node(s)`,
      );
    }
    return this.nodes[id];
  }

  /** 從 root 到 id 的祖先路徑 */
  path(id: NodeId): NodePathEntry[] {
    const entries: NodePathEntry[] = [];
    let current = id;
    for (;;) {
      const node = this.lookup(current);
      entries.push({ sid: current, parent: node.parent, step: node.step });
      if (current === ROOT_NODE_ID) break;
      current = node.parent;
    }
    return entries.reverse();
  }

  stop(): void {
    if (!this.running) {
      throw new Error('Session already stopped');
    }
    this.running = false;
  }
}
