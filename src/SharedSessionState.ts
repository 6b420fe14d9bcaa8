import { getEnvironmentData, setEnvironmentData } from 'worker_threads';
import { SessionLock } from './SessionLock.js';

const ENVIRONMENT_KEY = 'scopetrace.sharedSessionState';

// Int32 slots at the start of the buffer
const LOCK = 0;
const OPEN = 1;
const OWNER = 2;
const GENERATION = 3;
const RECORDS = 4;
const NAME_LENGTH = 5;
const PATH_LENGTH = 6;
const HEADER_BYTES = 8 * Int32Array.BYTES_PER_ELEMENT;

export const MAX_TEXT_BYTES = 4096;
const NAME_OFFSET = HEADER_BYTES;
const PATH_OFFSET = NAME_OFFSET + MAX_TEXT_BYTES;
const BYTE_LENGTH = PATH_OFFSET + MAX_TEXT_BYTES;

export interface SharedSessionSnapshot {
  name: string;
  filePath: string;
  ownerThreadId: number;
  generation: number;
  recordCount: number;
}

/**
 * Session descriptor living in a SharedArrayBuffer, so every worker thread of
 * the process sees the same open session and the same lock word.
 *
 * Mutations must happen while `lock` is held.
 */
export class SharedSessionState {
  private static processWideState: SharedSessionState | undefined;

  public readonly lock: SessionLock;
  private readonly words: Int32Array;
  private readonly text: Buffer;

  constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(BYTE_LENGTH)) {
    this.words = new Int32Array(buffer, 0, HEADER_BYTES / Int32Array.BYTES_PER_ELEMENT);
    this.text = Buffer.from(buffer, NAME_OFFSET, MAX_TEXT_BYTES * 2);
    this.lock = new SessionLock(this.words, LOCK);
  }

  /**
   * State shared by this thread and every worker it spawns after this module
   * was loaded. Workers receive the buffer through their environment data.
   */
  public static processWide(): SharedSessionState {
    if (!SharedSessionState.processWideState) {
      const inherited = getEnvironmentData(ENVIRONMENT_KEY);
      if (inherited instanceof SharedArrayBuffer) {
        SharedSessionState.processWideState = new SharedSessionState(inherited);
      } else {
        const buffer = new SharedArrayBuffer(BYTE_LENGTH);
        setEnvironmentData(ENVIRONMENT_KEY, buffer);
        SharedSessionState.processWideState = new SharedSessionState(buffer);
      }
    }
    return SharedSessionState.processWideState;
  }

  public static fits(value: string): boolean {
    return Buffer.byteLength(value, 'utf-8') <= MAX_TEXT_BYTES;
  }

  public isOpen(): boolean {
    return Atomics.load(this.words, OPEN) === 1;
  }

  public nextGeneration(): number {
    return Atomics.load(this.words, GENERATION) + 1;
  }

  public read(): SharedSessionSnapshot | null {
    if (!this.isOpen()) {
      return null;
    }
    const nameLength = Atomics.load(this.words, NAME_LENGTH);
    const pathLength = Atomics.load(this.words, PATH_LENGTH);
    return {
      name: this.text.toString('utf-8', 0, nameLength),
      filePath: this.text.toString('utf-8', MAX_TEXT_BYTES, MAX_TEXT_BYTES + pathLength),
      ownerThreadId: Atomics.load(this.words, OWNER),
      generation: Atomics.load(this.words, GENERATION),
      recordCount: Atomics.load(this.words, RECORDS),
    };
  }

  /** Callers check both values with fits() first. */
  public publish(name: string, filePath: string, ownerThreadId: number): number {
    const nameLength = this.text.write(name, 0, 'utf-8');
    const pathLength = this.text.write(filePath, MAX_TEXT_BYTES, 'utf-8');
    Atomics.store(this.words, NAME_LENGTH, nameLength);
    Atomics.store(this.words, PATH_LENGTH, pathLength);
    Atomics.store(this.words, OWNER, ownerThreadId);
    Atomics.store(this.words, RECORDS, 0);
    const generation = Atomics.add(this.words, GENERATION, 1) + 1;
    Atomics.store(this.words, OPEN, 1);
    return generation;
  }

  public countRecord(): void {
    Atomics.add(this.words, RECORDS, 1);
  }

  public clear(): void {
    Atomics.store(this.words, OPEN, 0);
  }
}

// Created on load so that workers spawned afterwards inherit it.
SharedSessionState.processWide();
