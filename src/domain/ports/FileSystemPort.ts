export interface FileStat {
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
  size: number;
  mtimeMs: number;
}

/**
 * 同步檔案系統介面
 *
 * 設計意圖：邊界驗證與走訪都只透過此介面存取檔案系統，
 * 測試可注入失敗（權限不足、走訪中被刪除）而不依賴執行者的權限。
 */
export interface FileSystemPort {
  /** 不追蹤 symlink 的 stat */
  lstat(filePath: string): FileStat;
  /** 追蹤 symlink 的 stat */
  stat(filePath: string): FileStat;
  /** 解析整條 symlink 鏈，回傳正規化絕對路徑 */
  realpath(filePath: string): string;
  /** 列出目錄內的名稱（不含 . 與 ..） */
  readdir(dirPath: string): string[];
  readFile(filePath: string): string;
  exists(filePath: string): boolean;
}
