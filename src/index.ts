import 'dotenv/config';
import { loadConfig } from './config.js';
import { toUserMessage } from './errors.js';
import { startBot, stopBot } from './slack-bot.js';

const SHUTDOWN_TIMEOUT_MS = 5000;

let stopping = false;

async function stop(signal: NodeJS.Signals): Promise<void> {
  if (stopping) return;
  stopping = true;
  console.log(`[Main] ${signal} received, stopping thread issue scanner`);

  // Bolt's receiver can hang on close
  const deadline = setTimeout(() => {
    console.error(`[Main] Still running after ${SHUTDOWN_TIMEOUT_MS} ms, exiting`);
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  deadline.unref();

  let exitCode = 0;
  try {
    await stopBot();
  } catch (error) {
    console.error('[Main] Error while stopping:', error);
    exitCode = 1;
  } finally {
    clearTimeout(deadline);
  }
  process.exit(exitCode);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => void stop(signal));
}

// loadConfig throws synchronously; keep it inside the promise chain
Promise.resolve()
  .then(() => startBot(loadConfig()))
  .catch((error: unknown) => {
    console.error(`[Main] Could not start: ${toUserMessage(error)}`);
    process.exit(1);
  });
