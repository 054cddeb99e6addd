/**
 * Tests for the recording inspector CLI
 * 录制检查CLI测试
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { expandInputs, summarize, RecordingInspectorCLI } from '../tools/inspect-recording';
import { SessionRecording } from '../src/recording/SessionRecording';
import { ArchiveFormat } from '../src/format/RecordingArchive';
import { FakeHost } from './helpers/FakeHost';

function sampleRecording(): SessionRecording {
  const host = new FakeHost();
  host.add(1, { player: host.addPlayer(1, 'alice') });
  host.add(2, { kind: 'archer', player: host.addPlayer(2, 'bob') });

  const recording = new SessionRecording();
  recording.start(host);
  recording.captureTick(host);
  recording.captureTick(host);
  recording.createSavePoint('end');
  recording.captureTick(host);
  host.time = 1090;
  recording.end(host);
  return recording;
}

describe('inspect-recording', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'matchreel-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should summarize a recording', () => {
    expect(summarize('/r/a.cfg', sampleRecording())).toEqual({
      filePath: '/r/a.cfg',
      mapName: 'test_map',
      ticks: 3,
      entities: 2,
      players: 2,
      duration: 90,
      savePoints: [{ name: 'end', tick: 2 }],
      problems: []
    });
  });

  test('should resolve plain paths and drop duplicates', () => {
    const a = path.join(dir, 'a.cfg');
    const b = path.join(dir, 'b.cfg');

    expect(expandInputs([b, a, b])).toEqual([a, b]);
  });

  test('should expand glob patterns', () => {
    for (const name of ['b.cfg', 'a.cfg', 'notes.txt']) {
      fs.writeFileSync(path.join(dir, name), '');
    }

    expect(expandInputs([`${dir}/*.cfg`])).toEqual([path.join(dir, 'a.cfg'), path.join(dir, 'b.cfg')]);
  });

  test('should validate good and broken recordings', async () => {
    const good = path.join(dir, 'good.cfg');
    const broken = path.join(dir, 'broken.cfg');
    fs.writeFileSync(good, sampleRecording().serialize());
    fs.writeFileSync(broken, 'not a recording');

    const cli = new RecordingInspectorCLI();

    expect(await cli.validate([good])).toBe(0);
    expect(await cli.validate([good, broken])).toBe(1);
    expect(await cli.validate([path.join(dir, '*.none')])).toBe(1);
  });

  test('should export a JSON archive', async () => {
    const input = path.join(dir, 'in.cfg');
    const output = path.join(dir, 'out', 'in.json');
    fs.writeFileSync(input, sampleRecording().serialize());

    expect(await new RecordingInspectorCLI().export(input, output, ArchiveFormat.JSON)).toBe(0);
    expect(fs.readFileSync(output, 'utf8')).toContain('"mapName":"test_map"');
  });
});
