import fs from 'node:fs';
import type { FileSystemPort, FileStat } from '../../domain/ports/FileSystemPort.js';

export class NodeFileSystemAdapter implements FileSystemPort {
  lstat(filePath: string): FileStat {
    return fs.lstatSync(filePath);
  }

  stat(filePath: string): FileStat {
    return fs.statSync(filePath);
  }

  realpath(filePath: string): string {
    return fs.realpathSync.native(filePath);
  }

  readdir(dirPath: string): string[] {
    return fs.readdirSync(dirPath);
  }

  readFile(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }
}
