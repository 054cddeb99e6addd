/**
 * Tests for SessionReplay
 * SessionReplay 测试
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { SessionReplay } from '../src/replay/SessionReplay';
import { SpawnPolicy } from '../src/replay/SpawnPolicy';
import { SessionRecording } from '../src/recording/SessionRecording';
import { EntityMeta, type EntityMetaData } from '../src/recording/EntityMeta';
import { EntitySample } from '../src/recording/EntitySample';
import { ReplayContractError } from '../src/core/Errors';
import { Logger } from '../src/core/Logger';
import { ControlKey, type Vec2 } from '../src/core/Types';
import { FakeHost, MemorySink } from './helpers/FakeHost';

function meta(netId: number, overrides: Partial<EntityMetaData> = {}): EntityMeta {
  return new EntityMeta({
    netId,
    kind: 'knight',
    teamNum: 0,
    sexNum: 0,
    headNum: 0,
    player: { id: netId + 100, username: `p${netId}`, characterName: `P${netId}` },
    ...overrides
  });
}

function sample(netId: number, position: Vec2, keys = 0, aimPosition: Vec2 = { x: 0, y: 0 }): EntitySample {
  return new EntitySample({ netId, position, aimPosition, keys, health: 2 });
}

function recordingOf(metas: EntityMeta[], ticks: EntitySample[][]): SessionRecording {
  return SessionRecording.fromContents({
    startTime: 0, endTime: ticks.length, mapName: 'test_map', metas, ticks, savePoints: new Map()
  });
}

/** One knight walking along x, one tick per position */
function walk(...xs: number[]): SessionRecording {
  return recordingOf([meta(1)], xs.map(x => [sample(1, { x, y: 0 })]));
}

describe('SessionReplay', () => {
  let host: FakeHost;
  let sink: MemorySink;
  let logger: Logger;

  beforeEach(() => {
    host = new FakeHost();
    sink = new MemorySink();
    logger = new Logger('SessionReplay', sink);
  });

  describe('start', () => {
    test('should refuse an empty recording and log why', () => {
      const replay = new SessionReplay(recordingOf([], []), host, { logger });

      expect(replay.start()).toBe(false);
      expect(replay.hasStarted()).toBe(false);
      expect(sink.messages('error')).toEqual(['[SessionReplay] Cannot start replay: recording has no ticks']);
    });

    test('should move every player to the spectator team', () => {
      host.addPlayer(1, 'a', 'a', 0);
      host.addPlayer(2, 'b', 'b', 1);
      host.addPlayer(3, 'c', 'c', 200);

      new SessionReplay(walk(0), host, { logger }).start();

      expect(host.players.map(p => p.team)).toEqual([200, 200, 200]);
    });

    test('should only clear live entities of recorded kinds', () => {
      const liveKnight = host.add(1, { kind: 'knight', player: host.addPlayer(1, 'a') });
      const chicken = host.add(2, { kind: 'chicken' });

      new SessionReplay(walk(10), host, { logger }).start();

      expect(host.getEntityBySimId(liveKnight.simId)).toBeNull();
      expect(host.getEntityBySimId(chicken.simId)).toBe(chicken);
      expect(host.entities.map(e => e.kind)).toEqual(['chicken', 'knight']);
    });

    test('should apply tick 0 immediately', () => {
      const replay = new SessionReplay(walk(10, 11), host, { logger });

      expect(replay.start()).toBe(true);
      expect(replay.getFakeTime()).toBe(0);
      expect(replay.getMappingCount()).toBe(1);
      expect(host.entity(replay.getMappedSimId(1)).position).toEqual({ x: 10, y: 0 });
    });
  });

  describe('spawning', () => {
    test('should use the generic path for kinds without an appearance strategy', () => {
      const recording = recordingOf(
        [meta(4, { kind: 'chicken', teamNum: 3, player: null })],
        [[sample(4, { x: 2, y: 3 })]]
      );

      new SessionReplay(recording, host, { logger }).start();

      expect(host.spawned).toEqual([{ kind: 'chicken', path: 'generic', team: 3, position: { x: 2, y: 3 } }]);
    });

    test('should set team, position, sex and head before init for appearance kinds', () => {
      const recording = recordingOf(
        [meta(1, { teamNum: 1, sexNum: 1, headNum: 7 })],
        [[sample(1, { x: 10, y: 0 })]]
      );

      new SessionReplay(recording, host, { logger, spawnPolicy: new SpawnPolicy(['knight']) }).start();

      expect(host.spawned).toEqual([
        { kind: 'knight', path: 'appearance', team: 1, position: { x: 10, y: 0 }, sex: 1, head: 7 }
      ]);
    });

    test('should report a failed spawn once and not retry it within the pass', () => {
      host.failingKinds.add('knight');
      const replay = new SessionReplay(walk(10, 11, 12, 13, 14), host, { logger });

      replay.start();
      host.failingKinds.clear();
      for (let i = 0; i < 4; i++) replay.advance();

      expect(sink.messages('error')).toEqual([
        '[SessionReplay] Tick 0: failed to spawn knight for netid 1 (team 0, at 10,0)'
      ]);
      expect(replay.getMappingCount()).toBe(0);
      expect(host.spawned).toEqual([]);
    });

    test('should try the spawn again on the next pass', () => {
      host.failingKinds.add('knight');
      const replay = new SessionReplay(walk(10, 11), host, { logger });
      replay.start();
      replay.advance();

      host.failingKinds.clear();
      replay.start();

      expect(replay.getMappingCount()).toBe(1);
      expect(host.entity(replay.getMappedSimId(1)).position).toEqual({ x: 10, y: 0 });
    });

    test('should spawn default appearance kinds through the appearance path', () => {
      const recording = recordingOf(
        [meta(1, { sexNum: 1, headNum: 7 }), meta(2, { kind: 'chicken', player: null })],
        [[sample(1, { x: 10, y: 0 }), sample(2, { x: 3, y: 0 })]]
      );

      new SessionReplay(recording, host).start();

      expect(host.spawned).toEqual([
        { kind: 'knight', path: 'appearance', team: 0, position: { x: 10, y: 0 }, sex: 1, head: 7 },
        { kind: 'chicken', path: 'generic', team: 0, position: { x: 3, y: 0 } }
      ]);
    });

    test('should spawn late joiners when they first appear', () => {
      const recording = recordingOf(
        [meta(1), meta(2, { kind: 'archer' })],
        [[sample(1, { x: 0, y: 0 })], [sample(1, { x: 0, y: 0 }), sample(2, { x: 5, y: 5 })]]
      );
      const replay = new SessionReplay(recording, host, { logger });

      replay.start();
      expect(replay.getMappedSimId(2)).toBeUndefined();

      replay.advance();
      expect(host.entity(replay.getMappedSimId(2)).kind).toBe('archer');
    });
  });

  describe('control state', () => {
    test('should leave drift up to the threshold and teleport beyond it', () => {
      const replay = new SessionReplay(walk(0, 4, 4.5), host, { logger });
      replay.start();
      const knight = host.entity(replay.getMappedSimId(1));

      replay.advance();
      expect(knight.teleports).toEqual([]);
      expect(knight.position).toEqual({ x: 0, y: 0 });

      replay.advance();
      expect(knight.teleports).toEqual([{ x: 4.5, y: 0 }]);
    });

    test('should snap back a knight that drifted far away', () => {
      const replay = new SessionReplay(walk(10, 11, 40), host, { logger });
      replay.start();
      const knight = host.entity(replay.getMappedSimId(1));

      knight.drift({ x: 11, y: 0 });
      replay.advance();
      expect(knight.teleports).toEqual([]);

      replay.advance();
      expect(knight.teleports).toEqual([{ x: 40, y: 0 }]);
      expect(knight.position).toEqual({ x: 40, y: 0 });
    });

    test('should honour a custom threshold', () => {
      const replay = new SessionReplay(walk(0, 1), host, { logger, snapThreshold: 0.5 });
      replay.start();
      replay.advance();

      expect(host.entity(replay.getMappedSimId(1)).teleports).toEqual([{ x: 1, y: 0 }]);
    });

    test('should always apply aim and every key state', () => {
      const recording = recordingOf([meta(1)], [
        [sample(1, { x: 0, y: 0 }, ControlKey.Left | ControlKey.Action1, { x: 30, y: -4 })],
        [sample(1, { x: 0, y: 0 }, ControlKey.Up, { x: 31, y: -4 })]
      ]);
      const replay = new SessionReplay(recording, host, { logger });

      replay.start();
      const knight = host.entity(replay.getMappedSimId(1));
      expect(knight.aim).toEqual({ x: 30, y: -4 });
      expect(knight.keys).toBe(ControlKey.Left | ControlKey.Action1);

      replay.advance();
      expect(knight.aim).toEqual({ x: 31, y: -4 });
      expect(knight.keys).toBe(ControlKey.Up);
    });
  });

  describe('faults', () => {
    test('should skip samples without a meta and report once', () => {
      const recording = recordingOf([meta(1)], [
        [sample(1, { x: 0, y: 0 }), sample(9, { x: 0, y: 0 })],
        [sample(1, { x: 0, y: 0 }), sample(9, { x: 0, y: 0 })],
        [sample(1, { x: 0, y: 0 }), sample(9, { x: 0, y: 0 })]
      ]);
      const replay = new SessionReplay(recording, host, { logger });

      replay.start();
      replay.advance();
      replay.advance();

      expect(sink.messages('error')).toEqual(['[SessionReplay] Tick 0: netid 9 has no meta, sample skipped']);
      expect(replay.getMappingCount()).toBe(1);
      expect(host.spawned).toHaveLength(1);
    });

    test('should not respawn an entity that disappeared', () => {
      const replay = new SessionReplay(walk(0, 1, 2), host, { logger });
      replay.start();
      const simId = replay.getMappedSimId(1);
      host.kill(simId ?? -1);

      replay.advance();
      replay.advance();

      expect(sink.messages('warn')).toEqual([
        `[SessionReplay] Tick 1: entity for netid 1 (sim id ${String(simId)}) is gone, not respawning`
      ]);
      expect(host.spawned).toHaveLength(1);
      expect(replay.getMappedSimId(1)).toBe(simId);
    });
  });

  describe('progress', () => {
    test('should finish on the last tick', () => {
      const replay = new SessionReplay(walk(0, 1, 2), host, { logger });

      replay.start();
      expect(replay.isFinished()).toBe(false);
      replay.advance();
      expect(replay.isFinished()).toBe(false);
      replay.advance();
      expect(replay.isFinished()).toBe(true);
      expect(replay.getFakeTime()).toBe(2);
    });

    test('should throw when advancing past the end or before start', () => {
      const replay = new SessionReplay(walk(0), host, { logger });

      expect(() => replay.advance()).toThrow('advance() called before start()');
      replay.start();
      expect(replay.isFinished()).toBe(true);
      expect(() => replay.advance()).toThrow(ReplayContractError);
    });

    test('should replay empty ticks without spawning anything', () => {
      const recording = recordingOf([], [[], [], [], [], []]);
      const replay = new SessionReplay(recording, host, { logger });

      expect(replay.start()).toBe(true);
      for (let i = 0; i < 4; i++) replay.advance();

      expect(replay.getFakeTime()).toBe(4);
      expect(replay.isFinished()).toBe(true);
      expect(host.spawned).toEqual([]);
      expect(sink.lines).toEqual([]);
    });

    test('should respawn a fresh set when restarted', () => {
      const replay = new SessionReplay(walk(10, 20), host, { logger });
      replay.start();
      const first = replay.getMappedSimId(1);
      replay.advance();

      expect(replay.start()).toBe(true);

      const second = replay.getMappedSimId(1);
      expect(second).not.toBe(first);
      expect(host.getEntityBySimId(first ?? -1)).toBeNull();
      expect(host.entity(second).position).toEqual({ x: 10, y: 0 });
      expect(host.spawned).toHaveLength(2);
      expect(replay.getFakeTime()).toBe(0);
    });

    test('should start and loop from the start tick', () => {
      const replay = new SessionReplay(walk(0, 10, 20), host, { logger, startTick: 1 });

      replay.start();
      expect(replay.getFakeTime()).toBe(1);
      expect(host.entity(replay.getMappedSimId(1)).position).toEqual({ x: 10, y: 0 });

      replay.advance();
      replay.start();
      expect(replay.getFakeTime()).toBe(1);
      expect(replay.getStartTick()).toBe(1);
    });

    test.each([-1, 1.5, 3])('should reject start tick %s', (startTick) => {
      expect(() => new SessionReplay(walk(0, 1, 2), host, { logger, startTick })).toThrow(RangeError);
    });
  });
});
