import type { SensitiveMatch } from '../../infrastructure/security/SensitiveContentClassifier.js';

export interface AuditReport {
  root: string;
  recursive: boolean;
  matches: SensitiveMatch[];
  /** 依原因分組的人類可讀報告 */
  report: string;
}
