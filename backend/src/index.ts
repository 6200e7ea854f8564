import dotenv from 'dotenv';

// Load environment variables FIRST before any other imports
dotenv.config();

import { createApp } from './app';
import { logger } from './utils/logger';

const PORT = Number(process.env.PORT) || 8000;

const app = createApp();

const server = app.listen(PORT, () => {
  logger.info(`🚀 Backtesting server running on port ${PORT}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  server.close(() => process.exit(0));
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
