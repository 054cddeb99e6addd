/**
 * Complete contents of a finished recording, independent of how it is stored
 * 已完成录制的完整内容，与存储方式无关
 */

import type { EntityMeta, EntityMetaData } from './EntityMeta';
import type { EntitySample, EntitySampleData } from './EntitySample';

export interface RecordingContents {
  readonly startTime: number;
  readonly endTime: number;
  readonly mapName: string;
  readonly metas: readonly EntityMeta[];
  readonly ticks: ReadonlyArray<readonly EntitySample[]>;
  readonly savePoints: ReadonlyMap<string, number>;
}

/**
 * Plain-object form used by the archive serializers
 * 归档序列化器使用的纯对象形式
 */
export interface RecordingData {
  startTime: number;
  endTime: number;
  mapName: string;
  metas: EntityMetaData[];
  ticks: EntitySampleData[][];
  savePoints: Map<string, number>;
}
