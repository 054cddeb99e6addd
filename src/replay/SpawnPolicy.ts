/**
 * How a recorded entity is re-created during replay
 * 回放时如何重新创建录制的实体
 */

import type { HostEntity, HostSimulation } from '../core/Host';
import type { EntityMeta } from '../recording/EntityMeta';
import type { EntitySample } from '../recording/EntitySample';

/**
 * Spawn strategy for a kind
 * 某一类型的生成策略
 *
 * - `appearance`: created uninitialised so head and sex can be set, then initialised
 * - `generic`: created in one call from kind, team and position
 */
export type SpawnStrategy =
  | { readonly type: 'appearance' }
  | { readonly type: 'generic' };

const APPEARANCE: SpawnStrategy = Object.freeze({ type: 'appearance' });
const GENERIC: SpawnStrategy = Object.freeze({ type: 'generic' });

/**
 * Kind-name lookup table of spawn strategies
 * 按类型名查找生成策略的表
 */
export class SpawnPolicy {
  private readonly table = new Map<string, SpawnStrategy>();

  constructor(appearanceKinds: Iterable<string> = []) {
    for (const kind of appearanceKinds) {
      this.table.set(kind, APPEARANCE);
    }
  }

  register(kind: string, strategy: SpawnStrategy): this {
    this.table.set(kind, strategy);
    return this;
  }

  resolve(kind: string): SpawnStrategy {
    return this.table.get(kind) ?? GENERIC;
  }

  /**
   * Create a live entity for a recorded one, positioned at the sample
   * 为录制实体创建存活实体，位置取自样本
   */
  spawn(host: HostSimulation, meta: EntityMeta, sample: EntitySample): HostEntity | null {
    const strategy = this.resolve(meta.kind);

    switch (strategy.type) {
      case 'appearance': {
        const pending = host.createUninitializedEntity(meta.kind);
        if (!pending) return null;
        pending.setTeamNum(meta.teamNum);
        pending.setPosition(sample.position);
        pending.setSexNum(meta.sexNum);
        pending.setHeadNum(meta.headNum);
        return pending.init();
      }

      case 'generic':
        return host.createEntity(meta.kind, meta.teamNum, sample.position);
    }
  }
}
