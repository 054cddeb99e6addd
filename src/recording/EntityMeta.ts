/**
 * Identity and appearance of a recorded entity, captured once
 * 录制实体的身份与外观信息，仅在首次观察时捕获
 */

import type { HostEntity } from '../core/Host';
import { MAX_NET_ID, type NetId } from '../core/Types';
import type { TaggedBlock, TaggedTextWriter } from '../format/TaggedText';

export interface PlayerIdentity {
  readonly id: number;
  readonly username: string;
  readonly characterName: string;
}

export interface EntityMetaData {
  readonly netId: NetId;
  readonly kind: string;
  readonly teamNum: number;
  readonly sexNum: number;
  readonly headNum: number;
  readonly player: PlayerIdentity | null;
}

const NO_PLAYER: PlayerIdentity = Object.freeze({ id: 0, username: '', characterName: '' });

export class EntityMeta implements EntityMetaData {
  readonly netId: NetId;
  readonly kind: string;
  readonly teamNum: number;
  readonly sexNum: number;
  readonly headNum: number;
  readonly player: PlayerIdentity | null;

  constructor(data: EntityMetaData) {
    this.netId = data.netId;
    this.kind = data.kind;
    this.teamNum = data.teamNum;
    this.sexNum = data.sexNum;
    this.headNum = data.headNum;
    // a zero player id means "no player", same as absent
    this.player = data.player && data.player.id !== 0 ? Object.freeze({ ...data.player }) : null;
    Object.freeze(this);
  }

  /**
   * Snapshot a live entity; later changes to the entity are not reflected
   * 对存活实体做快照，之后实体的变化不会反映到这里
   */
  static fromEntity(entity: HostEntity): EntityMeta {
    const player = entity.getPlayer();
    return new EntityMeta({
      netId: entity.netId,
      kind: entity.getKind(),
      teamNum: entity.getTeamNum(),
      sexNum: entity.getSexNum(),
      headNum: entity.getHeadNum(),
      player: player
        ? { id: player.id, username: player.username, characterName: player.characterName }
        : null
    });
  }

  static parse(block: TaggedBlock): EntityMeta {
    const hasPlayer = block.has('playerid');
    return new EntityMeta({
      netId: block.uint('netid', MAX_NET_ID),
      kind: block.text('name'),
      teamNum: block.int('teamNum'),
      sexNum: block.int('sexNum'),
      headNum: block.int('headNum'),
      player: hasPlayer
        ? {
            id: block.uint('playerid', MAX_NET_ID),
            username: block.text('playerusername'),
            characterName: block.text('playercharname')
          }
        : null
    });
  }

  hasPlayer(): boolean {
    return this.player !== null;
  }

  /** Player identity, or an all-empty identity with id 0 玩家身份，无玩家时为id为0的空身份 */
  getPlayer(): PlayerIdentity {
    return this.player ?? NO_PLAYER;
  }

  serialize(writer: TaggedTextWriter): void {
    writer.open('blobmeta');
    writer.leaf('netid', this.netId);
    writer.leaf('name', this.kind);
    writer.leaf('teamNum', this.teamNum);
    writer.leaf('sexNum', this.sexNum);
    writer.leaf('headNum', this.headNum);
    if (this.player) {
      writer.leaf('playerid', this.player.id);
      writer.leaf('playerusername', this.player.username);
      writer.leaf('playercharname', this.player.characterName);
    }
    writer.close();
  }

  toData(): EntityMetaData {
    return {
      netId: this.netId,
      kind: this.kind,
      teamNum: this.teamNum,
      sexNum: this.sexNum,
      headNum: this.headNum,
      player: this.player ? { ...this.player } : null
    };
  }
}
