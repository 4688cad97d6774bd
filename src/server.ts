/**
 * Engine process: recovers and starts the engine, then drains the signal
 * inbox of the configured back end into it until SIGINT or SIGTERM.
 */

import { getEnvironmentConfig } from './config/env';
import { logEngineStartup, logEngineShutdown, getLogger } from './config/logger';
import { getSupabaseClient, testSupabaseConnection } from './config/supabase';
import { createEngine } from './engine';

async function startEngine(): Promise<void> {
  const env = getEnvironmentConfig();
  const logger = getLogger();

  logger.info('Starting engine initialization');

  if (env.SNAPSHOT_BACKEND === 'supabase') {
    logger.info('Initializing database connection');
    getSupabaseClient();
    const connectionTest = await testSupabaseConnection();
    if (!connectionTest) {
      throw new Error('Database connection test failed');
    }
    logger.info('Database connection established successfully');
  }

  const { engine, inbox } = createEngine({ env });

  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, `Received ${signal}, starting graceful shutdown`);
    logEngineShutdown(signal);

    try {
      await inbox.stop();
      await engine.stop();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  logEngineStartup(env.EXECUTION_MODE, env.NODE_ENV);
  const recovery = await engine.start();
  inbox.start();
  logger.info({ recovery }, 'Engine running');
}

startEngine().catch((error: unknown) => {
  const logger = getLogger();
  logger.fatal({ error }, 'Failed to start engine');
  process.exit(1);
});
