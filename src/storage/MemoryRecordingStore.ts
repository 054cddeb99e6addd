import type { RecordingStorage } from '../core/Host';

/**
 * Recording storage kept in process memory
 * 保存在进程内存中的录制存储
 */
export class MemoryRecordingStore implements RecordingStorage {
  private readonly entries = new Map<string, string>();

  write(name: string, text: string): void {
    this.entries.set(name, text);
  }

  read(name: string): string | undefined {
    return this.entries.get(name);
  }

  list(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  clear(): void {
    this.entries.clear();
  }
}
