export interface ProfileResult {
  readonly name: string;
  /** Microseconds since the clock's epoch. */
  readonly start: number;
  /** Whole microseconds. */
  readonly elapsed: number;
  readonly threadId: number;
}

export function createProfileResult(
  name: string,
  start: number,
  elapsed: number,
  threadId: number
): ProfileResult {
  return Object.freeze({ name, start, elapsed, threadId });
}
