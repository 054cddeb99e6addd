/**
 * Versioned text format for saved recordings
 * 保存录制的版本化文本格式
 *
 * ```
 * <matchrecording>
 *   <version/> <initT/> <endT/> <mapname/>
 *   <allblobmeta> <blobmeta/>... </allblobmeta>
 *   <recording> <tick> <blobdata/>... </tick>... </recording>
 *   <savepoints> <savepoint/>... </savepoints>   (only when non-empty)
 * </matchrecording>
 * ```
 */

import { RecordingFormatError, UnsupportedVersionError } from '../core/Errors';
import { EntityMeta } from '../recording/EntityMeta';
import { EntitySample } from '../recording/EntitySample';
import type { RecordingContents } from '../recording/RecordingContents';
import type { NetId } from '../core/Types';
import { TaggedBlock, TaggedTextWriter } from './TaggedText';

/**
 * Format version written by this build and the only one it reads
 * 本版本写入的格式版本，也是唯一可读取的版本
 */
export const RECORDING_FORMAT_VERSION = 1;

export const ROOT_TAG = 'matchrecording';

/**
 * Encode recording contents as tagged text
 * 将录制内容编码为标签文本
 */
export function encodeRecording(contents: RecordingContents): string {
  const w = new TaggedTextWriter();

  w.open(ROOT_TAG);
  w.leaf('version', RECORDING_FORMAT_VERSION);
  w.leaf('initT', contents.startTime);
  w.leaf('endT', contents.endTime);
  w.leaf('mapname', contents.mapName);

  w.open('allblobmeta');
  for (const meta of contents.metas) {
    meta.serialize(w);
  }
  w.close();

  w.open('recording');
  for (const tick of contents.ticks) {
    w.open('tick');
    for (const sample of tick) {
      sample.serialize(w);
    }
    w.close();
  }
  w.close();

  if (contents.savePoints.size > 0) {
    w.open('savepoints');
    for (const [name, tick] of contents.savePoints) {
      w.open('savepoint');
      w.leaf('name', name);
      w.leaf('tick', tick);
      w.close();
    }
    w.close();
  }

  w.close();
  return w.toString();
}

/**
 * Read the declared version without decoding the rest
 * 只读取声明的版本而不解码其余部分
 */
export function readFormatVersion(root: TaggedBlock): number {
  if (root.tag !== ROOT_TAG) {
    throw new RecordingFormatError(`Expected <${ROOT_TAG}>, found <${root.tag}>`);
  }
  if (!root.has('version')) {
    throw new RecordingFormatError('Recording has no <version>', root.path);
  }
  return root.int('version');
}

/**
 * Decode tagged text into recording contents
 * 将标签文本解码为录制内容
 *
 * @throws UnsupportedVersionError when the version is not {@link RECORDING_FORMAT_VERSION}
 * @throws RecordingFormatError on malformed text, duplicate metas or out-of-range save points
 */
export function decodeRecording(text: string): RecordingContents {
  const root = TaggedBlock.parse(text);

  const version = readFormatVersion(root);
  if (version !== RECORDING_FORMAT_VERSION) {
    throw new UnsupportedVersionError(version, RECORDING_FORMAT_VERSION);
  }

  const metas: EntityMeta[] = [];
  const seen = new Set<NetId>();
  for (const block of root.child('allblobmeta').children('blobmeta')) {
    const meta = EntityMeta.parse(block);
    if (seen.has(meta.netId)) {
      throw new RecordingFormatError(`Duplicate meta for netid ${meta.netId}`, block.path);
    }
    seen.add(meta.netId);
    metas.push(meta);
  }

  const ticks = root
    .child('recording')
    .children('tick')
    .map(tick => tick.children('blobdata').map(block => EntitySample.parse(block)));

  const savePoints = new Map<string, number>();
  const lastTick = Math.max(0, ticks.length - 1);
  const savePointBlock = root.optionalChild('savepoints');
  if (savePointBlock) {
    for (const block of savePointBlock.children('savepoint')) {
      const name = block.text('name');
      const tick = block.uint('tick', lastTick);
      if (savePoints.has(name)) {
        throw new RecordingFormatError(`Duplicate save point "${name}"`, block.path);
      }
      savePoints.set(name, tick);
    }
  }

  return {
    startTime: root.uint('initT'),
    endTime: root.uint('endT'),
    mapName: root.text('mapname'),
    metas,
    ticks,
    savePoints
  };
}
