/**
 * Contracts the host simulation and storage layer must provide
 * 宿主模拟与存储层需要提供的接口
 *
 * The recorder never spawns, destroys or moves anything on its own; every
 * effect on the running game goes through these interfaces.
 * 录制器本身不会生成、销毁或移动任何实体，所有对游戏的影响都经过这些接口。
 */

import type { ControlKey, NetId, SimId, Vec2 } from './Types';

/**
 * A connected player as seen by the host
 * 宿主中的已连接玩家
 */
export interface HostPlayer {
  /** Network player id, non-zero 网络玩家ID，非零 */
  readonly id: number;
  readonly username: string;
  readonly characterName: string;
  getTeamNum(): number;
}

/**
 * A live entity in the host simulation
 * 宿主模拟中的存活实体
 */
export interface HostEntity {
  /** Simulation-assigned id 模拟分配的ID */
  readonly simId: SimId;
  /** Network id used as the recording key 用作录制键的网络ID */
  readonly netId: NetId;

  getKind(): string;
  getTeamNum(): number;
  getSexNum(): number;
  getHeadNum(): number;
  getHealth(): number;

  getPosition(): Vec2;
  setPosition(pos: Vec2): void;

  getAimPosition(): Vec2;
  setAimPosition(pos: Vec2): void;

  isKeyPressed(key: ControlKey): boolean;
  setKeyPressed(key: ControlKey, pressed: boolean): void;

  /** Player controlling this entity, null for bots, items, projectiles 控制该实体的玩家 */
  getPlayer(): HostPlayer | null;
}

/**
 * Entity created but not yet initialised, for kinds whose appearance
 * must be set before they become active
 * 已创建但尚未初始化的实体，用于需要先设置外观的类型
 */
export interface UninitializedEntity {
  setTeamNum(team: number): void;
  setPosition(pos: Vec2): void;
  setSexNum(sex: number): void;
  setHeadNum(head: number): void;
  /** Activate the entity; null when the host refused it 激活实体，宿主拒绝时返回null */
  init(): HostEntity | null;
}

/**
 * Host simulation primitives consumed by recording and replay
 * 录制和回放使用的宿主模拟原语
 */
export interface HostSimulation {
  /** All currently live entities 所有当前存活的实体 */
  getEntities(): readonly HostEntity[];
  getEntityBySimId(simId: SimId): HostEntity | null;

  createEntity(kind: string, team: number, pos: Vec2): HostEntity | null;
  createUninitializedEntity(kind: string): UninitializedEntity | null;
  destroyEntity(entity: HostEntity): void;

  getPlayers(): readonly HostPlayer[];
  setPlayerTeam(player: HostPlayer, team: number): void;
  getSpectatorTeamNum(): number;

  getMapName(): string;
  loadMap(name: string): void;

  /** Simulation clock 模拟时钟 */
  getTime(): number;
}

/**
 * Durable storage for named text blobs
 * 命名文本数据的持久化存储
 */
export interface RecordingStorage {
  write(name: string, text: string): void;
  /** Stored text, or undefined when nothing is stored under the name 未找到时返回undefined */
  read(name: string): string | undefined;
  list(): string[];
}
