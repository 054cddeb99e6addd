/**
 * Top-level recorder state machine driven once per tick
 * 每帧驱动一次的录制器顶层状态机
 */

import { resolveReplayConfig, type ReplayConfig } from '../core/Config';
import type { HostSimulation, RecordingStorage } from '../core/Host';
import { Logger, LoggerMessageSink, type MessageSink } from '../core/Logger';
import { SessionRecording } from '../recording/SessionRecording';
import { SessionReplay } from '../replay/SessionReplay';
import { SpawnPolicy } from '../replay/SpawnPolicy';
import { SaveNaming, sessionNameFromDate } from './SaveNaming';

export type RecorderMode = 'idle' | 'recording' | 'replaying';

/**
 * Outcome of a transition or command, also broadcast to the operator
 * 状态转换或命令的结果，同时广播给操作员
 */
export interface TransitionResult {
  ok: boolean;
  message: string;
}

export interface ModeControllerOptions {
  host: HostSimulation;
  storage: RecordingStorage;
  config?: Partial<ReplayConfig>;
  logger?: Logger;
  messages?: MessageSink;
  /** Used for the default session name 用于生成默认会话名 */
  now?: () => Date;
}

/**
 * Owns the current recording and replay and gates what runs each tick
 * 持有当前录制与回放，并决定每帧运行的内容
 *
 * One instance per host integration; nothing here is global.
 * 每个宿主集成一个实例，不存在全局状态。
 *
 * @example
 * ```typescript
 * const controller = new ModeController({ host, storage: new FileRecordingStore('replays') });
 * controller.startRecording();
 * // host tick callback
 * controller.update();
 * ```
 */
export class ModeController {
  private mode: RecorderMode = 'idle';
  private recording: SessionRecording | null = null;
  private replay: SessionReplay | null = null;
  private autorecord = false;

  readonly config: ReplayConfig;
  readonly naming: SaveNaming;

  private readonly host: HostSimulation;
  private readonly storage: RecordingStorage;
  private readonly logger: Logger;
  private readonly messages: MessageSink;
  private readonly spawnPolicy: SpawnPolicy;

  constructor(options: ModeControllerOptions) {
    this.host = options.host;
    this.storage = options.storage;
    this.config = resolveReplayConfig(options.config);
    this.logger = options.logger ?? new Logger('MatchReel');
    this.messages = options.messages ?? new LoggerMessageSink(this.logger);
    this.spawnPolicy = new SpawnPolicy(this.config.appearanceKinds);

    const now = options.now ?? (() => new Date());
    this.naming = new SaveNaming(this.config.sessionName || sessionNameFromDate(now()));
  }

  getMode(): RecorderMode {
    return this.mode;
  }

  getRecording(): SessionRecording | null {
    return this.recording;
  }

  getReplay(): SessionReplay | null {
    return this.replay;
  }

  isAutorecording(): boolean {
    return this.autorecord;
  }

  /**
   * Send a message to the operator
   * 向操作员发送消息
   */
  notify(message: string): void {
    this.messages.broadcast(message);
  }

  /**
   * Per-tick entry point
   * 每帧入口
   */
  update(): void {
    switch (this.mode) {
      case 'idle':
        return;

      case 'recording':
        this.recording?.captureTick(this.host);
        return;

      case 'replaying': {
        const replay = this.replay;
        if (!replay) return;
        if (replay.isFinished()) {
          replay.start();
        } else {
          replay.advance();
        }
        return;
      }
    }
  }

  startRecording(): TransitionResult {
    if (this.mode === 'recording') {
      return this.refuse('Already recording');
    }
    if (this.mode === 'replaying') {
      return this.refuse('Cannot record while a replay is running');
    }

    const recording = new SessionRecording({
      predicate: this.config.recordingPredicate,
      controlKeys: this.config.controlKeys
    });
    recording.start(this.host);

    this.recording = recording;
    this.mode = 'recording';
    return this.accept(`Recording started on ${recording.getMapName()}`);
  }

  stopRecording(): TransitionResult {
    const recording = this.recording;
    if (this.mode !== 'recording' || !recording) {
      return this.refuse('Not recording');
    }

    recording.end(this.host);
    this.mode = 'idle';
    return this.accept(`Recording stopped after ${recording.getNumRecordedTicks()} ticks`);
  }

  /**
   * Persist the current recording, stopping it first when still running
   * 保存当前录制，若仍在录制则先停止
   */
  saveRecording(): TransitionResult {
    const recording = this.recording;
    if (!recording) {
      return this.refuse('No recording to save');
    }
    if (this.mode === 'recording') {
      this.stopRecording();
    }

    const name = this.naming.currentName();
    try {
      this.storage.write(name, recording.serialize());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to save ${name}: ${reason}`);
      return this.refuse(`Failed to save recording: ${reason}`);
    }

    this.naming.commitSave();
    return this.accept(`Recording saved as ${name}`);
  }

  /**
   * Load a saved recording so it can be replayed
   * 加载已保存的录制以便回放
   */
  loadRecording(name: string): TransitionResult {
    if (this.mode !== 'idle') {
      return this.refuse(`Cannot load a recording while ${this.mode}`);
    }

    let text: string | undefined;
    try {
      text = this.storage.read(name);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to read ${name}: ${reason}`);
      return this.refuse(`Failed to read ${name}: ${reason}`);
    }
    if (text === undefined) {
      return this.refuse(`No saved recording named ${name}`);
    }

    let recording: SessionRecording;
    try {
      recording = SessionRecording.parse(text, {
        predicate: this.config.recordingPredicate,
        controlKeys: this.config.controlKeys
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to parse ${name}: ${reason}`);
      return this.refuse(`Failed to load ${name}: ${reason}`);
    }

    this.recording = recording;
    return this.accept(`Loaded ${name} (${recording.getNumRecordedTicks()} ticks)`);
  }

  /**
   * Start looping the current recording, optionally from a save point
   * 开始循环回放当前录制，可从存档点开始
   */
  startReplay(savePoint?: string): TransitionResult {
    if (this.mode === 'replaying') {
      return this.refuse('Already replaying');
    }
    if (this.autorecord) {
      return this.refuse('Cannot replay while autorecord is on');
    }
    if (this.mode === 'recording') {
      return this.refuse('Stop recording before replaying');
    }
    const recording = this.recording;
    if (!recording) {
      return this.refuse('No recording to replay');
    }

    let startTick = 0;
    if (savePoint !== undefined) {
      const tick = recording.getSavePoint(savePoint);
      if (tick === undefined) {
        return this.refuse(`Unknown save point ${savePoint}`);
      }
      startTick = tick;
    }

    const replay = new SessionReplay(recording, this.host, {
      snapThreshold: this.config.snapThreshold,
      spawnPolicy: this.spawnPolicy,
      controlKeys: this.config.controlKeys,
      startTick,
      logger: this.logger.child('SessionReplay')
    });
    if (!replay.start()) {
      return this.refuse('Recording has no ticks to replay');
    }

    this.replay = replay;
    this.mode = 'replaying';
    return this.accept(
      `Replay started (${recording.getNumRecordedTicks()} ticks` +
      (savePoint !== undefined ? `, from save point ${savePoint} at tick ${startTick})` : ')')
    );
  }

  /**
   * Stop replaying and reload the recorded map for a clean slate
   * 停止回放并重新加载录制的地图
   */
  stopReplay(): TransitionResult {
    const replay = this.replay;
    if (this.mode !== 'replaying' || !replay) {
      return this.refuse('Not replaying');
    }

    this.mode = 'idle';
    this.replay = null;
    this.host.loadMap(replay.getRecording().getMapName());
    return this.accept('Replay stopped');
  }

  createSavePoint(name: string): TransitionResult {
    const recording = this.recording;
    if (this.mode !== 'recording' || !recording) {
      return this.refuse('Save points can only be created while recording');
    }
    if (name.trim() === '') {
      return this.refuse('Save point needs a name');
    }

    const tick = recording.createSavePoint(name);
    return this.accept(`Save point ${name} at tick ${tick}`);
  }

  forceAllToSpectate(): TransitionResult {
    const spectators = this.host.getSpectatorTeamNum();
    let moved = 0;
    for (const player of this.host.getPlayers()) {
      if (player.getTeamNum() !== spectators) {
        this.host.setPlayerTeam(player, spectators);
        moved++;
      }
    }
    return this.accept(`Moved ${moved} player(s) to spectators`);
  }

  setAutorecord(enabled: boolean): TransitionResult {
    if (this.autorecord === enabled) {
      return this.refuse(`Autorecord is already ${enabled ? 'on' : 'off'}`);
    }
    this.autorecord = enabled;
    return this.accept(`Autorecord ${enabled ? 'on' : 'off'}`);
  }

  /**
   * Host hook: a new match is starting
   * 宿主钩子：新比赛开始
   */
  onSessionRestart(): void {
    this.naming.nextMatch();
    if (this.autorecord) {
      this.startRecording();
    }
  }

  /**
   * Host hook: the match has ended
   * 宿主钩子：比赛结束
   */
  onGameOver(): void {
    if (this.autorecord && this.mode === 'recording') {
      this.stopRecording();
      this.saveRecording();
    }
  }

  private accept(message: string): TransitionResult {
    this.notify(message);
    return { ok: true, message };
  }

  private refuse(message: string): TransitionResult {
    this.notify(message);
    return { ok: false, message };
  }
}
