import { createRuntime } from './runtime.js';
import { startScheduler } from './scheduler/scheduler.js';
import { log } from './utils/log.js';

const runtime = createRuntime();
startScheduler(runtime);

async function shutdown(signal: string) {
  log(`${signal} received, closing pools`);
  await runtime.close();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
