import { threadId as currentThreadId } from 'worker_threads';
import { Clock, steadyClock } from './Clock.js';
import { createModuleLogger } from './logger.js';
import { Profiler } from './Profiler.js';
import { createProfileResult, ProfileResult } from './ProfileResult.js';

const logger = createModuleLogger('ProfilerScope');

export interface ProfilerScopeOptions {
  profiler?: Profiler;
  clock?: Clock;
  threadId?: number;
}

/**
 * Times one region of code. The clock is read on construction; end() emits a
 * single record to the profiler, which must have an open session.
 */
export class ProfilerScope {
  private readonly label: string;
  private readonly start: number;
  private readonly profiler: Profiler;
  private readonly clock: Clock;
  private readonly threadId: number;
  private result: ProfileResult | null = null;

  constructor(label: string, options: ProfilerScopeOptions = {}) {
    this.label = label;
    this.profiler = options.profiler ?? Profiler.getInstance();
    this.clock = options.clock ?? steadyClock;
    this.threadId = options.threadId ?? currentThreadId;
    this.start = this.clock.now();
  }

  end(): ProfileResult {
    if (this.result) {
      logger.warn(`Scope "${this.label}" was already ended`);
      return this.result;
    }

    const endTime = this.clock.now();
    const elapsed = Math.max(0, Math.trunc(endTime) - Math.trunc(this.start));
    const result = createProfileResult(this.label, this.start, elapsed, this.threadId);

    // Marked as ended before writing: a rejected write is not retried.
    this.result = result;
    this.profiler.writeProfile(result);
    return result;
  }
}

export function profile<T>(label: string, fn: () => T, options?: ProfilerScopeOptions): T {
  const scope = new ProfilerScope(label, options);
  try {
    return fn();
  } finally {
    scope.end();
  }
}

export async function profileAsync<T>(
  label: string,
  fn: () => Promise<T>,
  options?: ProfilerScopeOptions
): Promise<T> {
  const scope = new ProfilerScope(label, options);
  try {
    return await fn();
  } finally {
    scope.end();
  }
}
