/**
 * Market Structure Engine - API Server
 * Reads the environment, builds the app and listens.
 */

import 'dotenv/config';

import { createApp, VERSION } from './app.js';
import { EnvSchema } from './validation/schemas.js';
import { createLogger } from './services/logger.js';

const logger = createLogger('Server');

const env = EnvSchema.safeParse(process.env);
if (!env.success) {
  logger.error('Invalid environment', {
    issues: env.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
  });
  process.exit(1);
}

const { PORT, LOG_LEVEL } = env.data;
const app = createApp();

const server = app.listen(PORT, () => {
  logger.info(`Market Structure Engine v${VERSION}`);
  logger.info(`Server running on port ${PORT} (log level ${LOG_LEVEL})`);
});

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('Shutting down...');
  server.close(() => process.exit(0));
});
