import type { BoundaryError } from '../errors/DomainErrors.js';

/**
 * 單一路徑的驗證結果：成功時是 root 之內的正規化路徑，
 * 失敗時帶著 kind 為 InvalidRoot / BoundaryViolation / Inaccessible 的錯誤。
 */
export type PathResolution =
  | { ok: true; path: string }
  | { ok: false; error: BoundaryError };

export function resolved(path: string): PathResolution {
  return { ok: true, path };
}

export function rejected(error: BoundaryError): PathResolution {
  return { ok: false, error };
}

/** strict 呼叫端使用：失敗即拋出 */
export function unwrap(resolution: PathResolution): string {
  if (!resolution.ok) throw resolution.error;
  return resolution.path;
}
