/**
 * One entity's dynamic state at a single tick
 * 单个实体在某一帧的动态状态
 */

import type { HostEntity } from '../core/Host';
import { MAX_KEY_MASK, MAX_NET_ID, type ControlKey, type KeyMask, type NetId, type Vec2 } from '../core/Types';
import type { TaggedBlock, TaggedTextWriter } from '../format/TaggedText';

export interface EntitySampleData {
  readonly netId: NetId;
  readonly position: Vec2;
  readonly aimPosition: Vec2;
  readonly keys: KeyMask;
  readonly health: number;
}

export class EntitySample implements EntitySampleData {
  readonly netId: NetId;
  readonly position: Vec2;
  readonly aimPosition: Vec2;
  readonly keys: KeyMask;
  readonly health: number;

  constructor(data: EntitySampleData) {
    this.netId = data.netId;
    this.position = Object.freeze({ x: data.position.x, y: data.position.y });
    this.aimPosition = Object.freeze({ x: data.aimPosition.x, y: data.aimPosition.y });
    this.keys = data.keys;
    this.health = data.health;
    Object.freeze(this);
  }

  /**
   * Read the entity's current state; only the given keys are folded into the mask
   * 读取实体当前状态，只有给定的按键会写入掩码
   */
  static fromEntity(entity: HostEntity, controlKeys: readonly ControlKey[]): EntitySample {
    let keys = 0;
    for (const key of controlKeys) {
      if (entity.isKeyPressed(key)) keys |= key;
    }

    return new EntitySample({
      netId: entity.netId,
      position: entity.getPosition(),
      aimPosition: entity.getAimPosition(),
      keys,
      health: entity.getHealth()
    });
  }

  static parse(block: TaggedBlock): EntitySample {
    return new EntitySample({
      netId: block.uint('netid', MAX_NET_ID),
      position: block.vec2('position'),
      aimPosition: block.vec2('aimpos'),
      keys: block.uint('keys', MAX_KEY_MASK),
      health: block.float('health')
    });
  }

  isKeyPressed(key: ControlKey): boolean {
    return (this.keys & key) !== 0;
  }

  serialize(writer: TaggedTextWriter): void {
    writer.open('blobdata');
    writer.leaf('netid', this.netId);
    writer.vec2('position', this.position);
    writer.vec2('aimpos', this.aimPosition);
    writer.leaf('keys', this.keys);
    writer.leaf('health', this.health);
    writer.close();
  }

  toData(): EntitySampleData {
    return {
      netId: this.netId,
      position: { ...this.position },
      aimPosition: { ...this.aimPosition },
      keys: this.keys,
      health: this.health
    };
  }
}
