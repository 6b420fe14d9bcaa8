import { ProfileResult } from './ProfileResult.js';

// The empty placeholder object lets every record start with a comma.
export const TRACE_HEADER = '{"otherData": {},"traceEvents":[{}';
export const TRACE_FOOTER = ']}';

export function formatMicros(value: number): string {
  return value.toFixed(3);
}

/**
 * Renders one complete ("ph":"X") trace event, prefixed with the comma that
 * separates it from the previous entry. The name is written as given.
 */
export function serializeProfileResult(result: ProfileResult): string {
  return ',{'
    + '"cat":"function",'
    + `"dur":${formatMicros(result.elapsed)},`
    + `"name":"${result.name}",`
    + '"ph":"X",'
    + '"pid":0,'
    + `"tid":${result.threadId},`
    + `"ts":${formatMicros(result.start)}`
    + '}';
}
