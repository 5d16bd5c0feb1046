/**
 * Forbidden root 比對策略
 *
 * segment：以路徑區段為單位比對，`/etc` 命中 `/etc` 與 `/etc/ssl`，不命中 `/etcetera`
 * prefix：原始字串前綴比對，用於命名一整族目錄（`/tmp/systemd-private-*`）
 */
export type ForbiddenRootMatch = 'segment' | 'prefix';

export interface ForbiddenRootEntry {
  path: string;
  match: ForbiddenRootMatch;
}

export const DEFAULT_FORBIDDEN_ROOTS: readonly ForbiddenRootEntry[] = Object.freeze([
  { path: '/etc', match: 'segment' },
  { path: '/sys', match: 'segment' },
  { path: '/proc', match: 'segment' },
  { path: '/root', match: 'segment' },
  { path: '/boot', match: 'segment' },
  { path: '/dev', match: 'segment' },
  { path: '/run', match: 'segment' },
  { path: '/var/run', match: 'segment' },
  { path: '/tmp/systemd-private', match: 'prefix' },
  { path: 'C:\\Windows', match: 'segment' },
  { path: 'C:\\Windows\\System32', match: 'segment' },
  { path: 'C:\\Program Files', match: 'segment' },
]);

const WINDOWS_DRIVE = /^[A-Za-z]:\\/;

export class ForbiddenRootPolicy {
  private constructor(public readonly entries: readonly ForbiddenRootEntry[]) {}

  static defaults(): ForbiddenRootPolicy {
    return new ForbiddenRootPolicy(DEFAULT_FORBIDDEN_ROOTS);
  }

  /**
   * 從設定檔的字串清單建立；結尾為 `*` 的項目採 prefix 比對
   * @param paths - 例如 `["/etc", "/srv/secret*"]`
   */
  static fromPaths(paths: readonly string[]): ForbiddenRootPolicy {
    const entries = paths.map((p): ForbiddenRootEntry => (
      p.endsWith('*')
        ? { path: p.slice(0, -1), match: 'prefix' }
        : { path: p, match: 'segment' }
    ));
    return new ForbiddenRootPolicy(Object.freeze(entries));
  }

  /** 回傳第一個命中的 forbidden root，未命中則 undefined */
  find(candidate: string): ForbiddenRootEntry | undefined {
    return this.entries.find((entry) => ForbiddenRootPolicy.covers(entry, candidate));
  }

  matches(candidate: string): boolean {
    return this.find(candidate) !== undefined;
  }

  describe(): string[] {
    return this.entries.map((e) => (e.match === 'prefix' ? `${e.path}*` : e.path));
  }

  private static covers(entry: ForbiddenRootEntry, candidate: string): boolean {
    // Windows 路徑不分大小寫
    const windows = WINDOWS_DRIVE.test(entry.path);
    const root = windows ? entry.path.toLowerCase() : entry.path;
    const target = windows ? candidate.toLowerCase() : candidate;

    if (entry.match === 'prefix') return target.startsWith(root);

    const sep = windows ? '\\' : '/';
    if (target === root) return true;
    const base = root.endsWith(sep) ? root : root + sep;
    return target.startsWith(base);
  }
}
