import { parentPort, threadId, workerData } from "worker_threads";
import { Profiler } from "../../src/Profiler.js";
import { ProfilerScope } from "../../src/ProfilerScope.js";
import { ProfilerError } from "../../src/errors.js";

const filePath: unknown = workerData?.filePath;
if (typeof filePath !== "string") {
  throw new Error("scope-worker needs workerData.filePath");
}

new ProfilerScope("worker-scope").end();

let conflict = "none";
try {
  Profiler.getInstance().beginSession("worker-session", filePath);
  conflict = "opened";
} catch (error) {
  conflict = error instanceof ProfilerError ? error.kind : "unexpected";
}

parentPort?.postMessage({ threadId, conflict });
