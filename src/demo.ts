import { setTimeout as delay } from 'timers/promises';
import { Config } from './config.js';
import { createModuleLogger } from './logger.js';
import { Profiler } from './Profiler.js';
import { profile, profileAsync } from './ProfilerScope.js';

const logger = createModuleLogger('demo');
const profiler = Profiler.getInstance();

// Graceful shutdown on CTRL+C
process.on('SIGINT', () => {
  logger.info('Interrupted, closing trace session...');
  profiler.shutdown();
  process.exit(0);
});

const filePath = process.argv[2] ?? Config.DEFAULT_OUTPUT_PATH;
profiler.beginSession('demo', filePath);

await profileAsync('main', async () => {
  profile('load', () => {
    let checksum = 0;
    for (let i = 0; i < 100_000; i++) {
      checksum = (checksum + i * 31) % 65_521;
    }
    return checksum;
  });

  await Promise.all(
    [20, 35, 50].map((ms) => profileAsync(`task-${ms}ms`, () => delay(ms)))
  );
});

profiler.endSession();
logger.info(`Trace written to ${filePath}`);
