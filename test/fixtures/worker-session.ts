import { once } from "events";
import { writeFileSync } from "fs";
import { Worker } from "worker_threads";
import { Profiler } from "../../src/Profiler.js";
import { profile } from "../../src/ProfilerScope.js";

const [filePath, reportPath] = process.argv.slice(2);
if (!filePath || !reportPath) {
  throw new Error("usage: worker-session <trace file> <report file>");
}

const profiler = Profiler.getInstance();
profiler.beginSession("threads", filePath);
profile("main-before", () => undefined);

const worker = new Worker(new URL("./scope-worker.mjs", import.meta.url), {
  workerData: { filePath },
});
const [report] = await once(worker, "message");
await once(worker, "exit");

profile("main-after", () => undefined);
profiler.endSession();

writeFileSync(reportPath, JSON.stringify(report));
