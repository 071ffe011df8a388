/** Node 在 session 陣列中的索引，從 0 起算且不重複使用 */
export type NodeId = number;

export const ROOT_NODE_ID: NodeId = 0;

/**
 * 證明樹中的一個 checkpoint
 *
 * step 為產生此節點的步驟文字；root 與管理性轉換（newState、giveUp）為空字串。
 */
export interface ProofNode<TSnapshot> {
  readonly snapshot: TSnapshot;
  readonly parent: NodeId;
  readonly step: string;
}

/** queryHistory 回傳的路徑項目（不含 snapshot） */
export interface NodePathEntry {
  sid: NodeId;
  parent: NodeId;
  step: string;
}
