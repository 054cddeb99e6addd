/**
 * Policy deciding which live entities are recorded
 * 决定哪些存活实体会被录制的策略
 */

import type { HostEntity } from '../core/Host';

export type RecordingPredicate = (entity: HostEntity) => boolean;

/**
 * Record player-controlled characters only
 * 只录制玩家控制的角色
 */
export const hasAttachedPlayer: RecordingPredicate = (entity) => entity.getPlayer() !== null;
