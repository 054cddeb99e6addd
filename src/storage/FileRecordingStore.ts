/**
 * Recording storage backed by a directory of text files
 * 基于文本文件目录的录制存储
 */

import * as fs from 'fs';
import * as path from 'path';
import { StorageError } from '../core/Errors';
import type { RecordingStorage } from '../core/Host';
import { RECORDING_FILE_EXTENSION } from '../control/SaveNaming';

const SAFE_NAME = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/;

export class FileRecordingStore implements RecordingStorage {
  private ensured = false;

  constructor(private readonly dir: string) {}

  getDir(): string {
    return this.dir;
  }

  /**
   * Absolute path for a recording name; rejects names that could leave the directory
   * 录制名对应的绝对路径，拒绝可能跳出目录的名称
   */
  filePathFor(name: string): string {
    if (!SAFE_NAME.test(name) || name.includes('..')) {
      throw new StorageError(name, 'Invalid recording name');
    }
    return path.join(path.resolve(this.dir), name);
  }

  write(name: string, text: string): void {
    const filePath = this.filePathFor(name);
    this.ensureDir();

    // atomic replace
    const tmp = filePath + '.tmp';
    try {
      fs.writeFileSync(tmp, text, 'utf8');
      fs.renameSync(tmp, filePath);
    } catch (error) {
      fs.rmSync(tmp, { force: true });
      throw error;
    }
  }

  read(name: string): string | undefined {
    const filePath = this.filePathFor(name);
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  list(): string[] {
    if (!fs.existsSync(this.dir)) return [];
    return fs.readdirSync(this.dir)
      .filter(f => f.endsWith(RECORDING_FILE_EXTENSION))
      .sort();
  }

  private ensureDir(): void {
    if (this.ensured) return;
    fs.mkdirSync(this.dir, { recursive: true });
    this.ensured = true;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
