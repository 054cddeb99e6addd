/**
 * Save-file names: `{session}_match{n}recording{m}.cfg`
 * 存档文件名：`{session}_match{n}recording{m}.cfg`
 */

export const RECORDING_FILE_EXTENSION = '.cfg';

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Session name derived from a date, e.g. `session_20261019_071502`
 * 由日期生成的会话名
 */
export function sessionNameFromDate(date: Date): string {
  return 'session_' +
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

/**
 * Counters behind the save-file name
 * 存档文件名背后的计数器
 *
 * The session name is fixed for the lifetime of the instance. The match
 * number moves on every session restart, the recording number on every
 * successful save.
 */
export class SaveNaming {
  private matchNumber = 0;
  private recordingNumber = 0;

  constructor(readonly sessionName: string) {}

  getMatchNumber(): number {
    return this.matchNumber;
  }

  getRecordingNumber(): number {
    return this.recordingNumber;
  }

  nextMatch(): number {
    return ++this.matchNumber;
  }

  /** Name the next save will be written under 下一次保存使用的名称 */
  currentName(): string {
    return `${this.sessionName}_match${this.matchNumber}recording${this.recordingNumber}${RECORDING_FILE_EXTENSION}`;
  }

  commitSave(): void {
    this.recordingNumber++;
  }
}
