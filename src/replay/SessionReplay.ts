/**
 * Re-simulates a finished recording by driving freshly spawned entities
 * 通过驱动新生成的实体来重新模拟已完成的录制
 */

import { DEFAULT_REPLAY_CONFIG } from '../core/Config';
import { ReplayContractError } from '../core/Errors';
import type { HostEntity, HostSimulation } from '../core/Host';
import { Logger } from '../core/Logger';
import { ALL_CONTROL_KEYS, distance, type ControlKey, type NetId, type SimId } from '../core/Types';
import type { EntitySample } from '../recording/EntitySample';
import type { SessionRecording } from '../recording/SessionRecording';
import { SpawnPolicy } from './SpawnPolicy';

export interface SessionReplayOptions {
  /** Teleport threshold for drift correction 漂移校正的传送阈值 */
  snapThreshold?: number;
  spawnPolicy?: SpawnPolicy;
  controlKeys?: readonly ControlKey[];
  /** Tick the replay starts and loops from, e.g. a save point 回放起始与循环的帧，例如存档点 */
  startTick?: number;
  logger?: Logger;
}

export const DEFAULT_SNAP_THRESHOLD = 4.0;

/**
 * Replay state machine over one recording
 * 基于单个录制的回放状态机
 *
 * Recorded netids are mapped to the sim ids of the entities spawned for them.
 * The mapping starts empty on every start(), so a looping replay spawns a
 * fresh set of entities each pass.
 * 录制的netid映射到为其生成的实体的模拟ID，每次start()都会清空映射。
 *
 * @example
 * ```typescript
 * const replay = new SessionReplay(recording, host);
 * if (replay.start()) {
 *   // once per simulation step
 *   if (replay.isFinished()) replay.start();
 *   else replay.advance();
 * }
 * ```
 */
export class SessionReplay {
  private fakeT = 0;
  private started = false;
  private readonly idMap = new Map<NetId, SimId>();
  private readonly reported = new Set<string>();
  // netids whose spawn failed this pass; not attempted again until start()
  private readonly unspawnable = new Set<NetId>();

  private readonly snapThreshold: number;
  private readonly spawnPolicy: SpawnPolicy;
  private readonly controlKeys: readonly ControlKey[];
  private readonly startTick: number;
  private readonly logger: Logger;

  constructor(
    private readonly recording: SessionRecording,
    private readonly host: HostSimulation,
    options: SessionReplayOptions = {}
  ) {
    this.snapThreshold = options.snapThreshold ?? DEFAULT_SNAP_THRESHOLD;
    this.spawnPolicy = options.spawnPolicy ?? new SpawnPolicy(DEFAULT_REPLAY_CONFIG.appearanceKinds);
    this.controlKeys = options.controlKeys ?? ALL_CONTROL_KEYS;
    this.startTick = options.startTick ?? 0;
    this.logger = options.logger ?? new Logger('SessionReplay');

    const ticks = recording.getNumRecordedTicks();
    if (!Number.isInteger(this.startTick) || this.startTick < 0 || (ticks > 0 && this.startTick >= ticks)) {
      throw new RangeError(`startTick ${this.startTick} is outside the recording (${ticks} ticks)`);
    }
  }

  /**
   * Clear the stage and apply the first tick; false when there is nothing to replay
   * 清理场景并应用第一帧，没有可回放内容时返回false
   */
  start(): boolean {
    if (this.recording.getNumRecordedTicks() === 0) {
      this.logger.error('Cannot start replay: recording has no ticks');
      return false;
    }

    const spectators = this.host.getSpectatorTeamNum();
    for (const player of this.host.getPlayers()) {
      if (player.getTeamNum() !== spectators) {
        this.host.setPlayerTeam(player, spectators);
      }
    }

    // only kinds that spawn can create, anything else is left alone
    const kinds = this.recording.getRecordedKinds();
    for (const entity of this.host.getEntities().slice()) {
      if (kinds.has(entity.getKind())) {
        this.host.destroyEntity(entity);
      }
    }

    this.fakeT = this.startTick;
    this.idMap.clear();
    this.reported.clear();
    this.unspawnable.clear();
    this.started = true;

    this.applyTick(this.fakeT);
    return true;
  }

  /**
   * Move to the next tick and apply it
   * 前进到下一帧并应用
   *
   * @throws ReplayContractError when not started or already at the last tick
   */
  advance(): void {
    if (!this.started) {
      throw new ReplayContractError('advance() called before start()');
    }
    const next = this.fakeT + 1;
    if (next >= this.recording.getNumRecordedTicks()) {
      throw new ReplayContractError(
        `advance() past the last tick (${next} of ${this.recording.getNumRecordedTicks()}); check isFinished() first`
      );
    }

    this.fakeT = next;
    this.applyTick(this.fakeT);
  }

  /**
   * True once the replay sits on or beyond the last recorded tick
   * 回放位于或超过最后一帧时为true
   */
  isFinished(): boolean {
    return this.fakeT >= this.recording.getNumRecordedTicks() - 1;
  }

  hasStarted(): boolean {
    return this.started;
  }

  getFakeTime(): number {
    return this.fakeT;
  }

  getStartTick(): number {
    return this.startTick;
  }

  getRecording(): SessionRecording {
    return this.recording;
  }

  getMappedSimId(netId: NetId): SimId | undefined {
    return this.idMap.get(netId);
  }

  getMappingCount(): number {
    return this.idMap.size;
  }

  private applyTick(index: number): void {
    const tick = this.recording.getTick(index);
    if (!tick) {
      throw new ReplayContractError(`Tick ${index} does not exist`);
    }

    for (const sample of tick) {
      const entity = this.resolveEntity(index, sample);
      if (entity) {
        this.applyControlState(entity, sample);
      }
    }
  }

  private resolveEntity(index: number, sample: EntitySample): HostEntity | null {
    const meta = this.recording.getBlobMeta(sample.netId);
    if (!meta) {
      this.reportOnce(`meta:${sample.netId}`, 'error',
        `Tick ${index}: netid ${sample.netId} has no meta, sample skipped`);
      return null;
    }

    const simId = this.idMap.get(sample.netId);
    if (simId === undefined) {
      if (this.unspawnable.has(sample.netId)) return null;

      const spawned = this.spawnPolicy.spawn(this.host, meta, sample);
      if (!spawned) {
        this.unspawnable.add(sample.netId);
        this.reportOnce(`spawn:${sample.netId}`, 'error',
          `Tick ${index}: failed to spawn ${meta.kind} for netid ${meta.netId} ` +
          `(team ${meta.teamNum}, at ${sample.position.x},${sample.position.y})`);
        return null;
      }
      this.idMap.set(sample.netId, spawned.simId);
      return spawned;
    }

    const entity = this.host.getEntityBySimId(simId);
    if (!entity) {
      this.reportOnce(`stale:${sample.netId}`, 'warn',
        `Tick ${index}: entity for netid ${sample.netId} (sim id ${simId}) is gone, not respawning`);
      return null;
    }
    return entity;
  }

  private applyControlState(entity: HostEntity, sample: EntitySample): void {
    if (distance(entity.getPosition(), sample.position) > this.snapThreshold) {
      entity.setPosition(sample.position);
    }

    entity.setAimPosition(sample.aimPosition);

    for (const key of this.controlKeys) {
      entity.setKeyPressed(key, sample.isKeyPressed(key));
    }
  }

  private reportOnce(key: string, level: 'warn' | 'error', message: string): void {
    if (this.reported.has(key)) return;
    this.reported.add(key);
    this.logger.log(message, level);
  }
}
