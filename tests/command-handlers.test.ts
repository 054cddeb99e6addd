import { describe, test, expect, beforeEach } from 'vitest';
import { CommandHandlers, COMMAND_NAMES, isCommandName } from '../src/control/CommandHandlers';
import { ModeController } from '../src/control/ModeController';
import { Logger } from '../src/core/Logger';
import { MemoryRecordingStore } from '../src/storage/MemoryRecordingStore';
import { FakeHost, MemorySink } from './helpers/FakeHost';

describe('CommandHandlers', () => {
  let host: FakeHost;
  let sink: MemorySink;
  let controller: ModeController;
  let commands: CommandHandlers;

  beforeEach(() => {
    host = new FakeHost();
    sink = new MemorySink();
    host.add(1, { player: host.addPlayer(1, 'alice') });
    controller = new ModeController({
      host,
      storage: new MemoryRecordingStore(),
      config: { sessionName: 'cmd' },
      logger: new Logger('MatchReel', sink),
      messages: sink
    });
    commands = new CommandHandlers(controller);
  });

  test('should expose every command name', () => {
    expect(commands.names()).toEqual(COMMAND_NAMES);
    expect(COMMAND_NAMES).toHaveLength(10);
    expect(isCommandName('start-replay')).toBe(true);
    expect(isCommandName('start_replay')).toBe(false);
  });

  test('should refuse unknown commands', () => {
    expect(commands.run('explode')).toEqual({ ok: false, message: 'Unknown command: explode' });
    expect(sink.broadcasts).toEqual(['Unknown command: explode']);
  });

  test('should drive a full record, save and replay cycle', () => {
    expect(commands.run('start-recording').ok).toBe(true);
    controller.update();
    controller.update();
    expect(commands.run('stop-recording').message).toBe('Recording stopped after 2 ticks');
    expect(commands.run('save-current-recording').message).toBe('Recording saved as cmd_match0recording0.cfg');
    expect(commands.run('start-replay').message).toBe('Replay started (2 ticks)');
    expect(controller.getMode()).toBe('replaying');
    expect(commands.run('stop-replay').message).toBe('Replay stopped');
  });

  test('should toggle autorecord', () => {
    expect(commands.run('start-autorecord').message).toBe('Autorecord on');
    expect(commands.run('stop-autorecord').message).toBe('Autorecord off');
  });

  test('should pass the joined arguments as the save point name', () => {
    commands.run('start-recording');
    controller.update();
    expect(commands.run('create-save-point', ['big', 'fight']).message).toBe('Save point big fight at tick 1');
    controller.update();
    commands.run('stop-recording');

    expect(commands.run('start-replay', ['big', 'fight']).message)
      .toBe('Replay started (2 ticks, from save point big fight at tick 1)');
  });

  test('should require a name for load-recording and create-save-point', () => {
    expect(commands.run('load-recording')).toEqual({ ok: false, message: 'Usage: load-recording <name>' });
    expect(commands.run('create-save-point', [' '])).toEqual({ ok: false, message: 'Usage: create-save-point <name>' });
  });

  test('should load a recording by name', () => {
    expect(commands.run('load-recording', ['missing.cfg']).message).toBe('No saved recording named missing.cfg');
  });

  test('should force players to spectate', () => {
    expect(commands.run('force-all-to-spectate').message).toBe('Moved 1 player(s) to spectators');
    expect(host.players[0].team).toBe(200);
  });
});
