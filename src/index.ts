/**
 * Main server entry point
 */

import { createApp } from './app';
import { getConfig } from './config';
import { getRoomRules } from './services/roomRulesLoader';
import { logger } from './utils/logger';

const config = getConfig();

// Validate ROOM_RULES_FILE at startup
const roomRules = getRoomRules();

const app = createApp();

app.listen(config.port, () => {
  logger.info(`Server started on port ${config.port}`, {
    port: config.port,
    nodeEnv: config.nodeEnv,
    corsOrigin: config.frontendOrigin,
    defaultCreditLimit: config.defaultCreditLimit,
    roomRules: roomRules.map(rule => rule.name)
  });
});

export default app;
