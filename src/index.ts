/**
 * matchreel - tick-based match recorder and replayer
 * 基于帧的比赛录制与回放
 *
 * @packageDocumentation
 */

// Core types and host contracts
export type { NetId, SimId, Vec2, KeyMask } from './core/Types';
export { ControlKey, ALL_CONTROL_KEYS, MAX_NET_ID, MAX_KEY_MASK, vec2, distance } from './core/Types';
export type {
  HostEntity,
  HostPlayer,
  HostSimulation,
  UninitializedEntity,
  RecordingStorage
} from './core/Host';

// Diagnostics and configuration
export { Logger, LoggerMessageSink, consoleSink, silentSink } from './core/Logger';
export type { LogLevel, LogSink, MessageSink } from './core/Logger';
export {
  MatchReelError,
  RecordingFormatError,
  UnsupportedVersionError,
  ReplayContractError,
  StorageError
} from './core/Errors';
export type { MatchReelErrorCode } from './core/Errors';
export { DEFAULT_REPLAY_CONFIG, resolveReplayConfig } from './core/Config';
export type { ReplayConfig } from './core/Config';

// Recording
export { EntityMeta } from './recording/EntityMeta';
export type { EntityMetaData, PlayerIdentity } from './recording/EntityMeta';
export { EntitySample } from './recording/EntitySample';
export type { EntitySampleData } from './recording/EntitySample';
export { SessionRecording } from './recording/SessionRecording';
export type { SessionRecordingOptions } from './recording/SessionRecording';
export type { RecordingContents, RecordingData } from './recording/RecordingContents';
export { hasAttachedPlayer } from './recording/RecordingPredicate';
export type { RecordingPredicate } from './recording/RecordingPredicate';

// Formats
export { TaggedTextWriter, TaggedBlock, escapeText, unescapeText } from './format/TaggedText';
export {
  RECORDING_FORMAT_VERSION,
  encodeRecording,
  decodeRecording,
  readFormatVersion
} from './format/RecordingFormat';
export { RecordingArchive, ArchiveFormat, toRecordingData, fromRecordingData } from './format/RecordingArchive';
export type { ArchiveResult } from './format/RecordingArchive';

// Replay
export { SpawnPolicy } from './replay/SpawnPolicy';
export type { SpawnStrategy } from './replay/SpawnPolicy';
export { SessionReplay, DEFAULT_SNAP_THRESHOLD } from './replay/SessionReplay';
export type { SessionReplayOptions } from './replay/SessionReplay';

// Mode control and commands
export { ModeController } from './control/ModeController';
export type { RecorderMode, TransitionResult, ModeControllerOptions } from './control/ModeController';
export { CommandHandlers, createCommandHandlers, isCommandName, COMMAND_NAMES } from './control/CommandHandlers';
export type { CommandName, CommandHandler } from './control/CommandHandlers';
export { SaveNaming, sessionNameFromDate, RECORDING_FILE_EXTENSION } from './control/SaveNaming';

// Storage
export { MemoryRecordingStore } from './storage/MemoryRecordingStore';
export { FileRecordingStore } from './storage/FileRecordingStore';
