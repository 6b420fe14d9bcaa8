export type ProfilerErrorKind =
  | 'SessionAlreadyOpen'
  | 'FileOpenFailure'
  | 'NoActiveSession'
  | 'WriteFailure'
  | 'LockHeld';

export class ProfilerError extends Error {
  constructor(
    public readonly kind: ProfilerErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProfilerError';
  }
}

export class SessionAlreadyOpenError extends ProfilerError {
  constructor(public readonly sessionName: string) {
    super('SessionAlreadyOpen', `Profiling session already opened: ${sessionName}`);
    this.name = 'SessionAlreadyOpenError';
  }
}

export class FileOpenFailureError extends ProfilerError {
  constructor(public readonly filePath: string, cause?: unknown) {
    super('FileOpenFailure', `Could not open file: ${filePath}`, { cause });
    this.name = 'FileOpenFailureError';
  }
}

export class NoActiveSessionError extends ProfilerError {
  constructor() {
    super('NoActiveSession', 'No opened profiling session!');
    this.name = 'NoActiveSessionError';
  }
}

export class SinkWriteError extends ProfilerError {
  constructor(public readonly filePath: string, cause?: unknown) {
    super('WriteFailure', `Could not write to file: ${filePath}`, { cause });
    this.name = 'SinkWriteError';
  }
}

export class LockHeldError extends ProfilerError {
  constructor(public readonly owner: string, public readonly holder: string) {
    super('LockHeld', `${owner} cannot run while ${holder} holds the profiler lock`);
    this.name = 'LockHeldError';
  }
}
