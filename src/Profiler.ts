import { EventEmitter } from 'events';
import { threadId } from 'worker_threads';
import type { Logger } from 'winston';
import { Config } from './config.js';
import { NoActiveSessionError, SessionAlreadyOpenError } from './errors.js';
import { createModuleLogger } from './logger.js';
import { ProfileResult } from './ProfileResult.js';
import { ProfilerSession, SessionInfo } from './ProfilerSession.js';
import { MAX_TEXT_BYTES, SharedSessionSnapshot, SharedSessionState } from './SharedSessionState.js';
import { serializeProfileResult, TRACE_FOOTER, TRACE_HEADER } from './TraceFormat.js';

export interface ProfilerEvents {
  sessionBegin: [SessionInfo];
  profile: [ProfileResult];
  sessionEnd: [SessionInfo];
}

export type ProfilerEvent = keyof ProfilerEvents;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Opens, appends to and closes the process-wide trace session.
 *
 * The session itself lives in {@link SharedSessionState}: profilers on any
 * worker thread see the same session, append to the same file and serialize
 * on the same lock, so records are written whole and in call order. Workers
 * share it only when spawned after this module was loaded by their parent.
 */
export class Profiler {
  private static instance: Profiler | undefined;

  private sink: ProfilerSession | null = null;
  private readonly eventEmitter = new EventEmitter();
  private exitHook: (() => void) | null = null;

  constructor(
    private readonly logger: Logger = createModuleLogger('Profiler'),
    private readonly sharedState: SharedSessionState = SharedSessionState.processWide()
  ) {}

  /**
   * Instance for the current thread, created on first use. It ends the
   * session it opened when the thread or process exits.
   */
  public static getInstance(): Profiler {
    if (!Profiler.instance) {
      Profiler.instance = new Profiler();
      Profiler.instance.installExitHook();
    }
    return Profiler.instance;
  }

  /**
   * Listeners run after the lock is released and may call back into the
   * profiler. A listener that throws is logged; the operation that emitted
   * the event has already completed and still succeeds.
   */
  public on<E extends ProfilerEvent>(event: E, callback: (...args: ProfilerEvents[E]) => void): void {
    this.eventEmitter.on(event, callback);
  }

  public once<E extends ProfilerEvent>(event: E, callback: (...args: ProfilerEvents[E]) => void): void {
    this.eventEmitter.once(event, callback);
  }

  public off<E extends ProfilerEvent>(event: E, callback: (...args: ProfilerEvents[E]) => void): void {
    this.eventEmitter.off(event, callback);
  }

  private emit<E extends ProfilerEvent>(event: E, ...args: ProfilerEvents[E]): void {
    try {
      this.eventEmitter.emit(event, ...args);
    } catch (error) {
      this.logger.error(`A "${event}" listener failed`, { error: describeError(error) });
    }
  }

  public beginSession(name: string, filePath: string = Config.DEFAULT_OUTPUT_PATH): void {
    const info = this.sharedState.lock.withLock('beginSession', () => {
      const active = this.sharedState.read();
      if (active) {
        this.logger.warn(`Refusing to open "${name}": session "${active.name}" is still active`);
        throw new SessionAlreadyOpenError(active.name);
      }
      if (!SharedSessionState.fits(name) || !SharedSessionState.fits(filePath)) {
        throw new RangeError(`Session name and path are limited to ${MAX_TEXT_BYTES} bytes each`);
      }

      this.releaseSink();
      let sink: ProfilerSession;
      try {
        sink = ProfilerSession.create(name, filePath, this.sharedState.nextGeneration());
      } catch (error) {
        this.logger.error(`Could not open trace file for session "${name}"`, { filePath });
        throw error;
      }

      try {
        sink.write(TRACE_HEADER);
      } catch (error) {
        try {
          sink.close();
        } catch (closeError) {
          this.logger.error(`Could not close trace file after the header write failed`, {
            filePath,
            error: describeError(closeError),
          });
        }
        throw error;
      }

      this.sharedState.publish(name, filePath, threadId);
      this.sink = sink;
      return { name, filePath, recordCount: 0 };
    });

    this.logger.info(`Profiling session "${name}" started`, { filePath, threadId });
    this.emit('sessionBegin', info);
  }

  public writeProfile(result: ProfileResult): void {
    const json = serializeProfileResult(result);

    this.sharedState.lock.withLock('writeProfile', () => {
      const active = this.sharedState.read();
      if (!active) {
        this.releaseSink();
        throw new NoActiveSessionError();
      }
      this.sinkFor(active).write(json);
      this.sharedState.countRecord();
    });

    this.emit('profile', result);
  }

  /**
   * Ends the session whichever thread opened it.
   */
  public endSession(): void {
    const info = this.sharedState.lock.withLock('endSession', () => this.endSessionNoLock());
    if (!info) {
      return;
    }

    this.logger.info(`Profiling session "${info.name}" ended`, {
      filePath: info.filePath,
      recordCount: info.recordCount,
    });
    this.emit('sessionEnd', info);
  }

  private endSessionNoLock(): SessionInfo | null {
    const active = this.sharedState.read();
    if (!active) {
      this.releaseSink();
      return null;
    }

    // The session is cleared even if the footer cannot be written.
    try {
      this.sinkFor(active).write(TRACE_FOOTER);
    } finally {
      this.sharedState.clear();
      this.releaseSink();
    }
    return { name: active.name, filePath: active.filePath, recordCount: active.recordCount };
  }

  /** Reuses this thread's handle while it belongs to the active session. */
  private sinkFor(active: SharedSessionSnapshot): ProfilerSession {
    if (this.sink && this.sink.generation === active.generation) {
      return this.sink;
    }
    this.releaseSink();
    this.sink = ProfilerSession.attach(active.name, active.filePath, active.generation);
    return this.sink;
  }

  private releaseSink(): void {
    const sink = this.sink;
    this.sink = null;
    sink?.close();
  }

  public isSessionOpen(): boolean {
    return this.sharedState.isOpen();
  }

  public currentSession(): SessionInfo | null {
    const active = this.sharedState.lock.withLock('currentSession', () => this.sharedState.read());
    return active ? { name: active.name, filePath: active.filePath, recordCount: active.recordCount } : null;
  }

  public installExitHook(): void {
    if (this.exitHook) {
      return;
    }
    this.exitHook = () => {
      const active = this.sharedState.read();
      if (active && active.ownerThreadId === threadId) {
        this.endSession();
      } else {
        this.sharedState.lock.withLock('exit', () => this.releaseSink());
      }
    };
    process.once('exit', this.exitHook);
  }

  /**
   * Ends the open session, if any, and detaches from process teardown.
   */
  public shutdown(): void {
    if (this.exitHook) {
      process.off('exit', this.exitHook);
      this.exitHook = null;
    }
    this.endSession();
  }
}
