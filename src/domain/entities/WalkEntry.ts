/** BoundedTreeWalker 每一步產生的單位：目錄 + 已驗證的子目錄名稱 + 已驗證的檔名 */
export interface WalkEntry {
  /** 正規化後的目錄路徑，保證在 root 之內 */
  directory: string;
  subdirectories: string[];
  /** 父目錄列出的名稱（symlink 時為 link 名稱） */
  files: string[];
  /** 與 files 一一對應的正規化路徑（symlink 時為其最終目標），讀取時只能用這個 */
  filePaths: string[];
}
