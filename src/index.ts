import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { createServices } from './container.js';
import { ConfigError } from './errors.js';
import { dailyAt } from './scheduler/index.js';
import { HOUSEKEEPING_INTERVAL_MS, runHousekeeping } from './services/housekeeping.service.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('CRITICAL ERROR: cannot start —');
      for (const problem of error.problems) console.error(`  • ${problem}`);
    } else {
      console.error('CRITICAL ERROR: cannot start —', error);
    }
    process.exit(1);
  }
}

const config = readConfig();
const services = createServices(config);

// Schedule state is in-memory; every start re-applies the default daily post.
services.scheduler.arm(
  config.destination,
  dailyAt(config.defaultSchedule.time, config.defaultSchedule.timezone)
);

const app = createApp({
  commands: services.commands,
  reviews: services.reviews,
  signingSecret: config.slack.signingSecret,
});

const housekeeping = setInterval(() => runHousekeeping(services.reviews), HOUSEKEEPING_INTERVAL_MS);
housekeeping.unref();

const server = app.listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port}`);
  console.log(
    `[Server] Posting to ${config.destination} daily at ${config.defaultSchedule.time} (${config.defaultSchedule.timezone})`
  );
  services.scheduler.start();
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received — shutting down gracefully`);
  clearInterval(housekeeping);

  void services.scheduler
    .stop()
    .catch(err => console.error('[Server] Scheduler did not stop cleanly:', err))
    .finally(() => {
      services.registry.clear();
      server.close(() => {
        console.log('[Server] HTTP server closed');
        process.exit(0);
      });
    });

  // Force exit if server hasn't closed within 10 seconds
  setTimeout(() => {
    console.error('[Server] Forced exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT',  () => shutdown('SIGINT'));
