/**
 * Error types thrown by the recorder
 * 录制器抛出的错误类型
 *
 * Faults met while a tick is being applied (missing meta, failed spawn,
 * vanished entity) are reported and skipped, never thrown. Only broken
 * call contracts and unreadable saved data end up here.
 */

export type MatchReelErrorCode =
  | 'RECORDING_FORMAT'
  | 'UNSUPPORTED_VERSION'
  | 'REPLAY_CONTRACT'
  | 'STORAGE';

/**
 * Base class for all recorder errors
 * 所有录制器错误的基类
 */
export class MatchReelError extends Error {
  readonly code: MatchReelErrorCode;

  constructor(code: MatchReelErrorCode, message: string) {
    super(message);
    this.name = 'MatchReelError';
    this.code = code;
  }
}

/**
 * Saved recording text is malformed or misses a required field
 * 保存的录制文本格式错误或缺少必需字段
 */
export class RecordingFormatError extends MatchReelError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super('RECORDING_FORMAT', path ? `${message} (at ${path})` : message);
    this.name = 'RecordingFormatError';
    this.path = path;
  }
}

/**
 * Saved recording declares a format version this build cannot read
 * 保存的录制声明了当前版本无法读取的格式版本
 */
export class UnsupportedVersionError extends MatchReelError {
  readonly version: number;
  readonly supported: number;

  constructor(version: number, supported: number) {
    super('UNSUPPORTED_VERSION', `Unsupported recording format version ${version}, expected ${supported}`);
    this.name = 'UnsupportedVersionError';
    this.version = version;
    this.supported = supported;
  }
}

/**
 * A replay was driven outside its valid tick range
 * 回放在有效帧范围之外被驱动
 */
export class ReplayContractError extends MatchReelError {
  constructor(message: string) {
    super('REPLAY_CONTRACT', message);
    this.name = 'ReplayContractError';
  }
}

export class StorageError extends MatchReelError {
  readonly recordingName: string;

  constructor(recordingName: string, message: string) {
    super('STORAGE', `${message}: ${recordingName}`);
    this.name = 'StorageError';
    this.recordingName = recordingName;
  }
}
