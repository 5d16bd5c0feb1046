import type { ForbiddenRootPolicy } from '../value-objects/ForbiddenRootPolicy.js';

/**
 * Boundary Context 實體
 *
 * 一次掃描 session 建立一次，建立後即凍結。
 * root 已確認存在、是目錄、且不在任何 forbidden root 之下。
 * 多個驗證可同時共用（唯讀）。
 */
export interface BoundaryContext {
  /** 正規化後的 project root（已解析 symlink） */
  readonly root: string;
  readonly forbiddenRoots: ForbiddenRootPolicy;
}

export function createBoundaryContext(
  root: string,
  forbiddenRoots: ForbiddenRootPolicy,
): BoundaryContext {
  return Object.freeze({ root, forbiddenRoots });
}
