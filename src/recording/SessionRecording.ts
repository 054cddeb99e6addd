/**
 * Tick-indexed history of recorded entities
 * 按帧索引的录制实体历史
 */

import { RecordingFormatError } from '../core/Errors';
import type { HostSimulation } from '../core/Host';
import { ALL_CONTROL_KEYS, type ControlKey, type NetId } from '../core/Types';
import { decodeRecording, encodeRecording } from '../format/RecordingFormat';
import { EntityMeta } from './EntityMeta';
import { EntitySample } from './EntitySample';
import type { RecordingContents } from './RecordingContents';
import { hasAttachedPlayer, type RecordingPredicate } from './RecordingPredicate';

export interface SessionRecordingOptions {
  /** Which entities are captured 哪些实体会被捕获 */
  predicate?: RecordingPredicate;
  /** Keys folded into each sample's input mask 写入每个样本输入掩码的按键 */
  controlKeys?: readonly ControlKey[];
}

type RecordingState = 'new' | 'active' | 'ended';

/**
 * Records the selected entities of a live session, one sample set per tick
 * 录制实时会话中被选中的实体，每帧一组样本
 *
 * @example
 * ```typescript
 * const recording = new SessionRecording();
 * recording.start(host);
 * // once per simulation step
 * recording.captureTick(host);
 * recording.end(host);
 * const text = recording.serialize();
 * ```
 */
export class SessionRecording implements RecordingContents {
  private readonly _ticks: EntitySample[][] = [];
  private readonly _metas = new Map<NetId, EntityMeta>();
  private readonly _savePoints = new Map<string, number>();
  private readonly predicate: RecordingPredicate;
  private readonly controlKeys: readonly ControlKey[];

  private _startTime = 0;
  private _endTime = 0;
  private _mapName = '';
  private state: RecordingState = 'new';

  constructor(options: SessionRecordingOptions = {}) {
    this.predicate = options.predicate ?? hasAttachedPlayer;
    this.controlKeys = options.controlKeys ?? ALL_CONTROL_KEYS;
  }

  /**
   * Build an already-ended recording from decoded contents
   * 从解码后的内容构建一个已结束的录制
   */
  static fromContents(contents: RecordingContents, options: SessionRecordingOptions = {}): SessionRecording {
    const recording = new SessionRecording(options);
    recording._startTime = contents.startTime;
    recording._endTime = contents.endTime;
    recording._mapName = contents.mapName;

    for (const meta of contents.metas) {
      if (recording._metas.has(meta.netId)) {
        throw new RecordingFormatError(`Duplicate meta for netid ${meta.netId}`);
      }
      recording._metas.set(meta.netId, meta);
    }
    for (const tick of contents.ticks) {
      recording._ticks.push(tick.slice());
    }
    for (const [name, tick] of contents.savePoints) {
      recording._savePoints.set(name, tick);
    }

    recording.state = 'ended';
    return recording;
  }

  /**
   * Parse a serialized recording
   * 解析序列化的录制
   */
  static parse(text: string, options: SessionRecordingOptions = {}): SessionRecording {
    return SessionRecording.fromContents(decodeRecording(text), options);
  }

  get startTime(): number {
    return this._startTime;
  }

  get endTime(): number {
    return this._endTime;
  }

  get mapName(): string {
    return this._mapName;
  }

  get metas(): readonly EntityMeta[] {
    return this.getAllMeta();
  }

  get ticks(): ReadonlyArray<readonly EntitySample[]> {
    return this._ticks;
  }

  get savePoints(): ReadonlyMap<string, number> {
    return this._savePoints;
  }

  /**
   * Stamp the start time and map, and seed metas for entities already present
   * 记录开始时间与地图，并为已存在的实体生成元数据
   */
  start(host: HostSimulation): void {
    this._startTime = host.getTime();
    this._mapName = host.getMapName();
    this.state = 'active';

    for (const entity of host.getEntities()) {
      if (!this.predicate(entity)) continue;
      if (!this._metas.has(entity.netId)) {
        this._metas.set(entity.netId, EntityMeta.fromEntity(entity));
      }
    }
  }

  /**
   * Append one tick of samples; an empty tick is still appended
   * 追加一帧样本，即使为空也会追加
   */
  captureTick(host: HostSimulation): void {
    const tick: EntitySample[] = [];

    for (const entity of host.getEntities()) {
      if (!this.predicate(entity)) continue;

      // late joiners get their meta on first sight
      if (!this._metas.has(entity.netId)) {
        this._metas.set(entity.netId, EntityMeta.fromEntity(entity));
      }
      tick.push(EntitySample.fromEntity(entity, this.controlKeys));
    }

    this._ticks.push(tick);
  }

  end(host: HostSimulation): void {
    this._endTime = host.getTime();
    this.state = 'ended';

    const lastTick = Math.max(0, this._ticks.length - 1);
    for (const [name, tick] of this._savePoints) {
      if (tick > lastTick) this._savePoints.set(name, lastTick);
    }
  }

  isActive(): boolean {
    return this.state === 'active';
  }

  isEnded(): boolean {
    return this.state === 'ended';
  }

  getNumRecordedTicks(): number {
    return this._ticks.length;
  }

  getTick(index: number): readonly EntitySample[] | undefined {
    return this._ticks[index];
  }

  getBlobMeta(netId: NetId): EntityMeta | undefined {
    return this._metas.get(netId);
  }

  getAllMeta(): EntityMeta[] {
    return Array.from(this._metas.values());
  }

  /**
   * Kinds of every entity in this recording; replay may create any of them
   * 录制中所有实体的类型，回放可能生成其中任意一种
   */
  getRecordedKinds(): Set<string> {
    const kinds = new Set<string>();
    for (const meta of this._metas.values()) {
      kinds.add(meta.kind);
    }
    return kinds;
  }

  getMapName(): string {
    return this._mapName;
  }

  getStartTime(): number {
    return this._startTime;
  }

  getEndTime(): number {
    return this._endTime;
  }

  /**
   * Mark a tick that a partial replay can start from
   * 标记一个可供部分回放起始的帧
   *
   * While recording the mark points at the next tick to be captured; on an
   * ended recording it points at the last recorded tick.
   * 录制中标记指向下一帧；已结束的录制则指向最后一帧。
   */
  createSavePoint(name: string): number {
    const tick = this.state === 'ended'
      ? Math.max(0, this._ticks.length - 1)
      : this._ticks.length;
    this._savePoints.set(name, tick);
    return tick;
  }

  getSavePoint(name: string): number | undefined {
    return this._savePoints.get(name);
  }

  getSavePoints(): Array<{ name: string; tick: number }> {
    return Array.from(this._savePoints, ([name, tick]) => ({ name, tick }))
      .sort((a, b) => a.tick - b.tick);
  }

  /**
   * Consistency problems that replay would report; empty when none
   * 回放时会报告的一致性问题，没有时为空数组
   */
  validate(): string[] {
    const problems: string[] = [];
    this._ticks.forEach((tick, index) => {
      const seen = new Set<NetId>();
      for (const sample of tick) {
        if (!this._metas.has(sample.netId)) {
          problems.push(`tick ${index}: netid ${sample.netId} has no meta`);
        }
        if (seen.has(sample.netId)) {
          problems.push(`tick ${index}: netid ${sample.netId} sampled twice`);
        }
        seen.add(sample.netId);
      }
    });
    return problems;
  }

  serialize(): string {
    return encodeRecording(this);
  }
}
