/**
 * Recorder / replayer configuration
 * 录制器与回放器配置
 */

import { ALL_CONTROL_KEYS, type ControlKey } from './Types';
import { hasAttachedPlayer, type RecordingPredicate } from '../recording/RecordingPredicate';

export interface ReplayConfig {
  /** Distance beyond which a replayed entity is teleported back to its recorded position 超过该距离时将回放实体传送回录制位置 */
  snapThreshold: number;
  /** Name prefix for saved recordings; derived from start time when empty 保存录制的名称前缀，为空时由启动时间生成 */
  sessionName: string;
  /** Kinds that are spawned uninitialised so head/sex can be applied 需要先设置外观再初始化的类型 */
  appearanceKinds: readonly string[];
  /** Keys captured into and replayed from the input mask 录制与回放的按键 */
  controlKeys: readonly ControlKey[];
  /** Which entities get recorded 哪些实体会被录制 */
  recordingPredicate: RecordingPredicate;
}

/**
 * Default configuration
 * 默认配置
 */
export const DEFAULT_REPLAY_CONFIG: ReplayConfig = {
  snapThreshold: 4.0,
  sessionName: '',
  appearanceKinds: ['knight', 'archer', 'builder'],
  controlKeys: ALL_CONTROL_KEYS,
  recordingPredicate: hasAttachedPlayer
};

/**
 * Fill a partial configuration with defaults and validate it
 * 用默认值补全部分配置并校验
 */
export function resolveReplayConfig(partial: Partial<ReplayConfig> = {}): ReplayConfig {
  const config: ReplayConfig = { ...DEFAULT_REPLAY_CONFIG, ...partial };

  if (!Number.isFinite(config.snapThreshold) || config.snapThreshold < 0) {
    throw new RangeError(`snapThreshold must be a non-negative number, got ${config.snapThreshold}`);
  }
  if (/[^a-zA-Z0-9_-]/.test(config.sessionName)) {
    throw new RangeError(`sessionName may only contain letters, digits, '_' and '-': ${config.sessionName}`);
  }

  return config;
}
