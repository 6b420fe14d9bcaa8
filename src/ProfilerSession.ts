import { closeSync, constants, openSync, writeSync } from 'fs';
import { FileOpenFailureError, SinkWriteError } from './errors.js';

export interface SessionInfo {
  name: string;
  filePath: string;
  recordCount: number;
}

const CREATE_FLAGS = constants.O_WRONLY | constants.O_CREAT | constants.O_TRUNC | constants.O_APPEND;
const ATTACH_FLAGS = constants.O_WRONLY | constants.O_APPEND;

/**
 * One thread's handle onto the open trace file. Every handle appends, so
 * writes from different threads land after each other whatever order the
 * handles were opened in. Writes are synchronous and reach the OS before
 * write() returns.
 */
export class ProfilerSession {
  private constructor(
    public readonly name: string,
    public readonly filePath: string,
    public readonly generation: number,
    private readonly fd: number
  ) {}

  /** Truncates or creates the file. */
  static create(name: string, filePath: string, generation: number): ProfilerSession {
    return new ProfilerSession(name, filePath, generation, ProfilerSession.openFile(filePath, CREATE_FLAGS));
  }

  /** Joins a file another handle already created. */
  static attach(name: string, filePath: string, generation: number): ProfilerSession {
    return new ProfilerSession(name, filePath, generation, ProfilerSession.openFile(filePath, ATTACH_FLAGS));
  }

  private static openFile(filePath: string, flags: number): number {
    try {
      return openSync(filePath, flags);
    } catch (error) {
      throw new FileOpenFailureError(filePath, error);
    }
  }

  write(chunk: string): void {
    const buffer = Buffer.from(chunk, 'utf-8');
    let offset = 0;
    try {
      while (offset < buffer.length) {
        offset += writeSync(this.fd, buffer, offset, buffer.length - offset);
      }
    } catch (error) {
      throw new SinkWriteError(this.filePath, error);
    }
  }

  close(): void {
    try {
      closeSync(this.fd);
    } catch (error) {
      throw new SinkWriteError(this.filePath, error);
    }
  }
}
