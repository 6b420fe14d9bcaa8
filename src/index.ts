export { Profiler } from './Profiler.js';
export type { ProfilerEvent, ProfilerEvents } from './Profiler.js';
export { ProfilerScope, profile, profileAsync } from './ProfilerScope.js';
export type { ProfilerScopeOptions } from './ProfilerScope.js';
export { ProfilerSession } from './ProfilerSession.js';
export type { SessionInfo } from './ProfilerSession.js';
export { createProfileResult } from './ProfileResult.js';
export type { ProfileResult } from './ProfileResult.js';
export { steadyClock } from './Clock.js';
export type { Clock } from './Clock.js';
export { serializeProfileResult, formatMicros, TRACE_HEADER, TRACE_FOOTER } from './TraceFormat.js';
export { SessionLock } from './SessionLock.js';
export { SharedSessionState, MAX_TEXT_BYTES } from './SharedSessionState.js';
export type { SharedSessionSnapshot } from './SharedSessionState.js';
export {
  ProfilerError,
  SessionAlreadyOpenError,
  FileOpenFailureError,
  NoActiveSessionError,
  SinkWriteError,
  LockHeldError,
} from './errors.js';
export type { ProfilerErrorKind } from './errors.js';
export { Config, parseLogLevel, parseOutputPath } from './config.js';
export type { LogLevel } from './config.js';
