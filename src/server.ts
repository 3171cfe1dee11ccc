import 'reflect-metadata';
import http from 'http';
import os from 'os';

import { createApp } from './app';
import { loadConfig, loadEnvFiles, type AppConfig } from './config';
import { createContainer, type Container } from './container';
import logger from './lib/logger';
import { createDataSource } from './database/data-source';
import { SecurityMetrics } from './lib/metrics';
import { closeRedis, initializeRedis, type RedisClient } from './lib/redis';
import type { KeyValueStore } from './common/store/keyValueStore';
import { MemoryKeyValueStore } from './common/store/memory.store';
import { RedisKeyValueStore } from './common/store/redis.store';
import { AccessEvents, AccessRepository } from './modules/access';
import { databaseChecker, redisChecker, type HealthChecker } from './modules/health';

import type { DataSource } from 'typeorm';

const hostname = os.hostname();
const SHUTDOWN_TIMEOUT_MS = 10 * 1000;

let server: http.Server | null = null;
let dataSource: DataSource | null = null;
let container: Container | null = null;
let isShuttingDown = false;

// --- Gestion Globale des Erreurs Processus Node ---
process.on('unhandledRejection', (reason: unknown) => {
  logger.fatal({ reason }, 'Unhandled Rejection at Promise. Forcing shutdown...');
  gracefulShutdown('unhandledRejection', 1).catch(() => process.exit(1));
});

process.on('uncaughtException', (error: Error) => {
  logger.fatal(error, 'Uncaught Exception thrown. Forcing shutdown...');
  gracefulShutdown('uncaughtException', 1).catch(() => process.exit(1));
});

/**
 * The shared store is Redis whenever several instances must agree: a shared
 * rate-limit backend, single-use refresh tokens or revocation.
 */
function needsSharedStore(config: AppConfig): boolean {
  return config.RATE_LIMIT_BACKEND === 'redis' || config.JWT_REFRESH_ROTATION || config.JWT_REVOCATION;
}

async function initializeKeyValueStore(
  config: AppConfig,
): Promise<{ kvStore: KeyValueStore; redis: RedisClient | null }> {
  if (!needsSharedStore(config)) {
    logger.info('Using the in-process key-value store');
    return { kvStore: new MemoryKeyValueStore(), redis: null };
  }
  const client = await initializeRedis(config);
  return { kvStore: new RedisKeyValueStore(client, config.REDIS_KEY_PREFIX), redis: client };
}

/**
 * Gère l'arrêt propre de l'application.
 * @param signal Le signal reçu ou la raison de l'arrêt.
 */
async function gracefulShutdown(signal: NodeJS.Signals | string, exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    logger.warn(`Shutdown already in progress. Received another signal: ${signal}`);
    return;
  }
  isShuttingDown = true;
  logger.warn(`Received ${signal}. Starting graceful shutdown...`);

  const forceExit = setTimeout(() => {
    logger.fatal('Graceful shutdown timed out. Forcing exit.');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  // 1. Arrêter le serveur HTTP d'accepter de nouvelles connexions
  const httpServer = server;
  if (httpServer) {
    await new Promise<void>((resolve) => {
      httpServer.close((err?: Error) => {
        if (err) logger.error({ err }, 'Error closing HTTP server.');
        resolve();
      });
    });
    logger.info('HTTP server closed.');
  }

  // 2. Timers et abonnements du coeur de sécurité
  container?.close();

  // 3. Fermer les connexions externes
  const results = await Promise.allSettled([
    dataSource?.isInitialized ? dataSource.destroy() : Promise.resolve(),
    closeRedis(),
  ]);
  for (const result of results) {
    if (result.status === 'rejected') {
      logger.error({ err: result.reason }, 'Error closing an external connection.');
      exitCode = 1;
    }
  }

  logger.info(`Graceful shutdown finished. Exiting with code ${exitCode}.`);
  process.exit(exitCode);
}

/**
 * Fonction principale asynchrone pour démarrer le serveur.
 */
async function startServer(): Promise<void> {
  loadEnvFiles();
  // Throws ConfigError: the process must not start on an invalid environment
  const config = loadConfig();

  logger.info(`Starting Application [${config.NODE_ENV}] on ${hostname} (PID: ${process.pid})...`);

  dataSource = createDataSource(config);
  await dataSource.initialize();
  logger.info('TypeORM DataSource initialized successfully.');

  const { kvStore, redis } = await initializeKeyValueStore(config);
  const accessEvents = new AccessEvents();
  const accessRepository = new AccessRepository(dataSource, accessEvents);

  const healthCheckers: HealthChecker[] = [databaseChecker(dataSource)];
  if (redis) healthCheckers.push(redisChecker(redis));

  container = createContainer(config, {
    accessStore: accessRepository,
    kvStore,
    accessEvents,
    metrics: new SecurityMetrics({ collectDefaults: true }),
    healthCheckers,
  });
  server = http.createServer(createApp(container));

  server.on('error', (error: NodeJS.ErrnoException) => {
    logger.fatal({ err: error, code: error.code }, 'HTTP server error');
    gracefulShutdown('serverError', 1).catch(() => process.exit(1));
  });

  server.listen(config.PORT, config.HOST, () => {
    logger.info(
      {
        rateLimitBackend: config.RATE_LIMIT_BACKEND,
        rotation: config.JWT_REFRESH_ROTATION,
        revocation: config.JWT_REVOCATION,
      },
      `Server listening on http://${config.HOST}:${config.PORT}`,
    );
  });

  // Attacher les handlers de signaux pour le graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];
  signals.forEach((signal) => {
    process.on(signal, () => {
      gracefulShutdown(signal).catch(() => process.exit(1));
    });
  });
}

// --- Démarrage de l'Application ---
startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Critical error during server startup sequence. Exiting.');
  process.exit(1);
});
