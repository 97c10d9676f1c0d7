import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createApp, createServices } from './app.js';

dotenv.config();
const env = validateEnv();

const log = createLogger(env);
setLogger(log);

const server = createApp(createServices(env), env).listen(env.PORT, () => {
  log.info('Commission API listening', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    dataDir: env.DATA_DIR,
    defaultCommissionRate: env.DEFAULT_COMMISSION_RATE,
  });
});

function shutdown(signal: NodeJS.Signals): void {
  log.info(`${signal} received, closing server`);
  server.close((error) => {
    if (error) {
      log.error('Server did not close cleanly', { message: error.message });
      process.exit(1);
    }
    log.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
