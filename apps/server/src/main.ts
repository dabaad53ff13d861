import Fastify from 'fastify';
import { parseConfigFromEnv } from './config';
import { registerGameRoutes } from './http';
import { createLogger } from './logger';
import { GameService } from './service/game-service';
import { InMemoryGameStore } from './store/in-memory-game-store';

const config = parseConfigFromEnv(process.env);
const logger = createLogger(config);

const app = Fastify({ loggerInstance: logger });

const gameStore = new InMemoryGameStore({ ttlSeconds: config.gameTtlSeconds });
const gameService = new GameService(gameStore, logger, { maxGames: config.maxGames });
registerGameRoutes(app, gameService);

const start = async (): Promise<void> => {
  try {
    await app.listen({ host: config.host, port: config.port });
    logger.info({ port: config.port }, 'server listening');
  } catch (error) {
    logger.error({ error }, 'server bootstrap failed');
    process.exit(1);
  }
};

const shutdown = async (): Promise<void> => {
  await app.close();
};

process.on('SIGINT', () => {
  void shutdown().finally(() => process.exit(0));
});
process.on('SIGTERM', () => {
  void shutdown().finally(() => process.exit(0));
});

void start();
