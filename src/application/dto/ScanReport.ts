/** 專案統計 */
export interface ProjectStats {
  /** 走訪到的檔案總數（含被略過的敏感檔案） */
  totalFiles: number;
  totalSizeBytes: number;
  totalLines: number;
  /** 副檔名 → 檔案數，無副檔名記為 `.no_extension` */
  filesByExtension: Record<string, number>;
  hasTests: boolean;
  isGitRepo: boolean;
  /** 實際讀取 metadata 的檔案數（受 maxFiles 限制） */
  filesAnalyzed: number;
}

/** 掃描結果 */
export interface ScanReport {
  projectPath: string;
  timestamp: string;
  stats: ProjectStats;
  /** 依檔案數排序的語言清單 */
  languages: string[];
  primaryLanguage?: string;
  /** 以 project root 為基準的相對路徑 */
  sensitiveFilesSkipped: string[];
  inaccessiblePaths: string[];
  warnings: string[];
  /** 因 maxFiles 提前停止 */
  stoppedEarly: boolean;
}

/** 給使用者看的摘要行 */
export function summarizeReport(report: ScanReport): string[] {
  return [
    `${report.sensitiveFilesSkipped.length} sensitive files skipped`,
    `${report.inaccessiblePaths.length} paths inaccessible`,
  ];
}
