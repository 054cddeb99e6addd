import superjson from 'superjson';
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import { RecordingFormatError, UnsupportedVersionError } from '../core/Errors';
import { EntityMeta, type EntityMetaData, type PlayerIdentity } from '../recording/EntityMeta';
import { EntitySample, type EntitySampleData } from '../recording/EntitySample';
import type { RecordingContents, RecordingData } from '../recording/RecordingContents';
import type { Vec2 } from '../core/Types';
import { RECORDING_FORMAT_VERSION } from './RecordingFormat';

/**
 * Archive formats
 * 归档格式
 */
export enum ArchiveFormat {
  /** superjson text 超级JSON文本 */
  JSON = 'json',
  /** superjson payload packed with MessagePack MessagePack打包的二进制 */
  Binary = 'binary'
}

export interface ArchiveResult {
  data: string | Uint8Array;
  format: ArchiveFormat;
  size: number;
  time: number;
}

interface ArchiveEnvelope {
  version: number;
  timestamp: number;
  data: RecordingData;
}

type SuperJSONPayload = Parameters<typeof superjson.deserialize>[0];

/**
 * Recording archives using Superjson and MessagePack
 * 使用Superjson和MessagePack的录制归档
 *
 * The tagged text format stays the canonical save format; archives are a
 * structured export for tooling.
 * 标签文本格式仍是标准存档格式，归档用于工具的结构化导出。
 *
 * @example
 * ```typescript
 * const archive = new RecordingArchive();
 * const result = await archive.export(recording, ArchiveFormat.Binary);
 * const restored = await archive.import(result.data);
 * ```
 */
export class RecordingArchive {
  /**
   * Export recording contents to the given format
   * 将录制内容导出为指定格式
   */
  export(contents: RecordingContents, format: ArchiveFormat = ArchiveFormat.JSON): Promise<ArchiveResult> {
    const startTime = performance.now();

    try {
      const envelope: ArchiveEnvelope = {
        version: RECORDING_FORMAT_VERSION,
        timestamp: Date.now(),
        data: toRecordingData(contents)
      };

      let data: string | Uint8Array;
      let size: number;

      switch (format) {
        case ArchiveFormat.JSON: {
          data = superjson.stringify(envelope);
          size = new TextEncoder().encode(data).length;
          break;
        }

        case ArchiveFormat.Binary: {
          const serialized = superjson.serialize(envelope);
          data = new Uint8Array(msgpackEncode(serialized));
          size = data.length;
          break;
        }

        default:
          throw new Error(`Unsupported archive format: ${String(format)}`);
      }

      return Promise.resolve({ data, format, size, time: performance.now() - startTime });
    } catch (error) {
      return Promise.reject(new Error(`Archive export failed: ${error instanceof Error ? error.message : String(error)}`));
    }
  }

  /**
   * Import an archive; strings are read as JSON, bytes as MessagePack
   * 导入归档，字符串按JSON读取，字节按MessagePack读取
   */
  import(data: string | Uint8Array): Promise<RecordingContents> {
    try {
      let envelope: unknown;

      if (typeof data === 'string') {
        envelope = superjson.parse<unknown>(data);
      } else {
        const decoded = msgpackDecode(data);
        if (!isSuperJSONPayload(decoded)) {
          throw new RecordingFormatError('Binary archive does not hold a superjson payload');
        }
        envelope = superjson.deserialize<unknown>(decoded);
      }

      return Promise.resolve(fromRecordingData(readEnvelope(envelope)));
    } catch (error) {
      return Promise.reject(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

export function toRecordingData(contents: RecordingContents): RecordingData {
  return {
    startTime: contents.startTime,
    endTime: contents.endTime,
    mapName: contents.mapName,
    metas: contents.metas.map(meta => meta.toData()),
    ticks: contents.ticks.map(tick => tick.map(sample => sample.toData())),
    savePoints: new Map(contents.savePoints)
  };
}

export function fromRecordingData(data: RecordingData): RecordingContents {
  return {
    startTime: data.startTime,
    endTime: data.endTime,
    mapName: data.mapName,
    metas: data.metas.map(meta => new EntityMeta(meta)),
    ticks: data.ticks.map(tick => tick.map(sample => new EntitySample(sample))),
    savePoints: new Map(data.savePoints)
  };
}

function isSuperJSONPayload(value: unknown): value is SuperJSONPayload {
  return isRecord(value) && 'json' in value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readEnvelope(value: unknown): RecordingData {
  if (!isRecord(value)) {
    throw new RecordingFormatError('Archive is not an object');
  }
  if (typeof value.version !== 'number') {
    throw new RecordingFormatError('Archive has no version');
  }
  if (value.version !== RECORDING_FORMAT_VERSION) {
    throw new UnsupportedVersionError(value.version, RECORDING_FORMAT_VERSION);
  }

  const data = value.data;
  if (!isRecord(data)) {
    throw new RecordingFormatError('Archive has no data', 'data');
  }
  if (!Array.isArray(data.metas) || !Array.isArray(data.ticks) || !(data.savePoints instanceof Map)) {
    throw new RecordingFormatError('Archive data is missing metas, ticks or savePoints', 'data');
  }

  const savePoints = new Map<string, number>();
  for (const [name, tick] of data.savePoints) {
    if (typeof name !== 'string' || typeof tick !== 'number') {
      throw new RecordingFormatError('Malformed save point', 'data.savePoints');
    }
    savePoints.set(name, tick);
  }

  return {
    startTime: readNumber(data.startTime, 'data.startTime'),
    endTime: readNumber(data.endTime, 'data.endTime'),
    mapName: readString(data.mapName, 'data.mapName'),
    metas: data.metas.map((meta: unknown, i: number) => readMeta(meta, `data.metas[${i}]`)),
    ticks: data.ticks.map((tick: unknown, i: number) => {
      if (!Array.isArray(tick)) {
        throw new RecordingFormatError('Tick is not an array', `data.ticks[${i}]`);
      }
      return tick.map((sample: unknown, j: number) => readSample(sample, `data.ticks[${i}][${j}]`));
    }),
    savePoints
  };
}

function readMeta(value: unknown, path: string): EntityMetaData {
  if (!isRecord(value)) {
    throw new RecordingFormatError('Meta is not an object', path);
  }
  let player: PlayerIdentity | null = null;
  if (value.player !== null) {
    if (!isRecord(value.player)) {
      throw new RecordingFormatError('Player is not an object', `${path}.player`);
    }
    player = {
      id: readNumber(value.player.id, `${path}.player.id`),
      username: readString(value.player.username, `${path}.player.username`),
      characterName: readString(value.player.characterName, `${path}.player.characterName`)
    };
  }
  return {
    netId: readNumber(value.netId, `${path}.netId`),
    kind: readString(value.kind, `${path}.kind`),
    teamNum: readNumber(value.teamNum, `${path}.teamNum`),
    sexNum: readNumber(value.sexNum, `${path}.sexNum`),
    headNum: readNumber(value.headNum, `${path}.headNum`),
    player
  };
}

function readSample(value: unknown, path: string): EntitySampleData {
  if (!isRecord(value)) {
    throw new RecordingFormatError('Sample is not an object', path);
  }
  return {
    netId: readNumber(value.netId, `${path}.netId`),
    position: readVec2(value.position, `${path}.position`),
    aimPosition: readVec2(value.aimPosition, `${path}.aimPosition`),
    keys: readNumber(value.keys, `${path}.keys`),
    health: readNumber(value.health, `${path}.health`)
  };
}

function readVec2(value: unknown, path: string): Vec2 {
  if (!isRecord(value)) {
    throw new RecordingFormatError('Vector is not an object', path);
  }
  return { x: readNumber(value.x, `${path}.x`), y: readNumber(value.y, `${path}.y`) };
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== 'number') {
    throw new RecordingFormatError('Expected a number', path);
  }
  return value;
}

function readString(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new RecordingFormatError('Expected a string', path);
  }
  return value;
}
