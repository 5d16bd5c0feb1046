import path from 'node:path';
import type { FileSystemPort } from '../domain/ports/FileSystemPort.js';
import { ForbiddenRootPolicy } from '../domain/value-objects/ForbiddenRootPolicy.js';
import { validateProjectRoot } from '../infrastructure/security/PathBoundaryValidator.js';
import type { SensitiveContentClassifier } from '../infrastructure/security/SensitiveContentClassifier.js';
import type { AuditReport } from './dto/AuditReport.js';

/**
 * 敏感檔案稽核用例：列出 project 內所有敏感項目，不讀取任何內容
 */
export class AuditSensitiveUseCase {
  constructor(
    private readonly classifier: SensitiveContentClassifier,
    private readonly deps: { fs?: FileSystemPort; forbiddenRoots?: ForbiddenRootPolicy } = {},
  ) {}

  /**
   * @throws InvalidRootError
   */
  audit(projectRoot: string, recursive: boolean = true): AuditReport {
    const root = validateProjectRoot(projectRoot, this.deps);
    const matches = this.classifier.scanDirectory(root, recursive);

    const files = matches
      .filter((m) => m.type === 'file')
      .map((m) => path.relative(root, m.path));

    return {
      root,
      recursive,
      matches,
      report: this.classifier.createSkipReport(files),
    };
  }
}
