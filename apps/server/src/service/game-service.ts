import { GameEngine, isEngineError } from '@landgrab/engine';
import {
  gameIdSchema,
  requestSchemas,
  responseSchemas,
  type ErrorCode,
  type ResponseName,
  type ResponsePayload,
} from '@landgrab/shared';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import type { GameStore } from '../store/game-store';

export interface GameServiceOptions {
  maxGames: number;
}

export interface FailureResponse {
  statusCode: number;
  body: ResponsePayload<'v1:error'>;
}

export class ServiceError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

// Never a uuid, so it cannot collide with a game's own queue.
const GAME_CREATION_QUEUE_KEY = 'game-creation';

const STATUS_BY_ERROR_CODE: Record<ErrorCode, number> = {
  GAME_NOT_FOUND: 404,
  PLAYER_NOT_FOUND: 404,
  GAME_LIMIT_REACHED: 409,
  DUPLICATE_NAME: 409,
  BOARD_NOT_CREATED: 409,
  BOARD_ALREADY_CREATED: 409,
  INVALID_BOARD: 400,
  INVALID_SPACE_INDEX: 400,
  INVALID_PLAYER: 400,
  INVALID_MOVE: 400,
  SPACE_NOT_OWNABLE: 400,
  INVALID_PAYLOAD: 400,
  INTERNAL_ERROR: 500,
};

const parsePayload = <S extends z.ZodTypeAny>(schema: S, payload: unknown, label: string): z.output<S> => {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ServiceError('INVALID_PAYLOAD', `invalid ${label} payload`, parsed.error.issues);
  }
  return parsed.data;
};

// Engine failures keep their code on the way out.
const applyToEngine = <T>(task: () => T): T => {
  try {
    return task();
  } catch (error) {
    if (isEngineError(error)) {
      throw new ServiceError(error.code, error.message, error.details);
    }
    throw error;
  }
};

const hasClientStatusCode = (error: unknown): error is { statusCode: number; message: string } =>
  typeof error === 'object' &&
  error !== null &&
  'statusCode' in error &&
  typeof error.statusCode === 'number' &&
  error.statusCode >= 400 &&
  error.statusCode < 500 &&
  'message' in error &&
  typeof error.message === 'string';

/**
 * Hosts any number of games, each behind its own mutation queue so that
 * concurrent requests against one game are applied strictly in order.
 */
export class GameService {
  private readonly gameMutationQueueByGameId = new Map<string, Promise<void>>();

  constructor(
    private readonly gameStore: GameStore,
    private readonly logger: Logger,
    private readonly options: GameServiceOptions,
  ) {}

  private async withGameMutationLock<T>(gameId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.gameMutationQueueByGameId.get(gameId) ?? Promise.resolve();
    let release: (() => void) | undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const queued = previous.then(() => current);
    this.gameMutationQueueByGameId.set(gameId, queued);

    await previous;
    try {
      return await task();
    } finally {
      release?.();
      if (this.gameMutationQueueByGameId.get(gameId) === queued) {
        this.gameMutationQueueByGameId.delete(gameId);
      }
    }
  }

  private async requireGame(gameId: string): Promise<GameEngine> {
    const engine = gameIdSchema.safeParse(gameId).success ? await this.gameStore.getGame(gameId) : null;
    if (!engine) {
      throw new ServiceError('GAME_NOT_FOUND', 'game does not exist');
    }
    return engine;
  }

  private async mutateGame<T>(gameId: string, task: (engine: GameEngine) => T): Promise<T> {
    return this.withGameMutationLock(gameId, async () => {
      const engine = await this.requireGame(gameId);
      const result = applyToEngine(() => task(engine));
      await this.gameStore.saveGame(gameId, engine);
      return result;
    });
  }

  private async readGame<T>(gameId: string, task: (engine: GameEngine) => T): Promise<T> {
    const engine = await this.requireGame(gameId);
    return applyToEngine(() => task(engine));
  }

  private validated<N extends ResponseName>(name: N, payload: ResponsePayload<N>): ResponsePayload<N> {
    const parsed = responseSchemas[name].safeParse(payload);
    if (!parsed.success) {
      this.logger.error({ responseName: name, errors: parsed.error.issues }, 'response payload schema failure');
      throw new ServiceError('INTERNAL_ERROR', 'response failed validation');
    }
    return payload;
  }

  async createGame(): Promise<ResponsePayload<'v1:game.created'>> {
    // The count and the save share one queue so concurrent creates cannot overshoot the cap.
    const { gameId, engine } = await this.withGameMutationLock(GAME_CREATION_QUEUE_KEY, async () => {
      if ((await this.gameStore.countGames()) >= this.options.maxGames) {
        throw new ServiceError('GAME_LIMIT_REACHED', `no more than ${this.options.maxGames} games may run at once`);
      }

      const created = { gameId: uuidv4(), engine: new GameEngine() };
      await this.gameStore.saveGame(created.gameId, created.engine);
      return created;
    });
    this.logger.info({ gameId }, 'game created');

    return this.validated('v1:game.created', { gameId, snapshot: engine.snapshot() });
  }

  async getSnapshot(gameId: string): Promise<ResponsePayload<'v1:game.state'>> {
    const snapshot = await this.readGame(gameId, (engine) => engine.snapshot());
    return this.validated('v1:game.state', { snapshot });
  }

  async deleteGame(gameId: string): Promise<void> {
    await this.withGameMutationLock(gameId, async () => {
      await this.requireGame(gameId);
      await this.gameStore.deleteGame(gameId);
    });
    this.logger.info({ gameId }, 'game deleted');
  }

  async createSpaces(gameId: string, payload: unknown): Promise<ResponsePayload<'v1:game.state'>> {
    const { goPayout, rentList } = parsePayload(requestSchemas['v1:spaces.create'], payload, 'board');
    const snapshot = await this.mutateGame(gameId, (engine) => {
      engine.createSpaces(goPayout, rentList);
      return engine.snapshot();
    });

    this.logger.info({ gameId, goPayout }, 'board created');
    return this.validated('v1:game.state', { snapshot });
  }

  async createPlayer(gameId: string, payload: unknown): Promise<ResponsePayload<'v1:player.created'>> {
    const { name, startingBalance } = parsePayload(requestSchemas['v1:player.create'], payload, 'player');
    const { registration, snapshot } = await this.mutateGame(gameId, (engine) => ({
      registration: engine.createPlayer(name, startingBalance),
      snapshot: engine.snapshot(),
    }));

    if (!registration.ok) {
      this.logger.warn({ gameId, playerName: name }, 'player was not added, name already in use');
      return this.validated('v1:player.created', { created: false, notice: registration.code, snapshot });
    }

    this.logger.info({ gameId, playerName: name, startingBalance }, 'player registered');
    return this.validated('v1:player.created', { created: true, snapshot });
  }

  async getPlayer(gameId: string, name: string): Promise<ResponsePayload<'v1:player.state'>> {
    const player = await this.readGame(gameId, (engine) => {
      const balance = engine.accountBalance(name);
      return {
        name,
        balance,
        position: engine.position(name),
        ownedSpaces: engine.ownedSpaces(name),
        active: balance > 0,
      };
    });
    return this.validated('v1:player.state', { player });
  }

  async movePlayer(gameId: string, name: string, payload: unknown): Promise<ResponsePayload<'v1:player.moved'>> {
    const { spaces } = parsePayload(requestSchemas['v1:player.move'], payload, 'move');
    const { effects, winner, snapshot } = await this.mutateGame(gameId, (engine) => ({
      effects: engine.movePlayer(name, spaces),
      winner: engine.checkGameOver(),
      snapshot: engine.snapshot(),
    }));

    for (const effect of effects) {
      if (effect.type === 'PLAYER_ELIMINATED') {
        this.logger.info(
          {
            gameId,
            playerName: effect.playerName,
            creditorName: effect.creditorName,
            releasedSpaces: effect.releasedSpaces,
          },
          'player eliminated',
        );
        if (winner) {
          this.logger.info({ gameId, winner }, 'game won');
        }
      }
    }

    return this.validated('v1:player.moved', { effects, winner, snapshot });
  }

  async buySpace(gameId: string, name: string): Promise<ResponsePayload<'v1:space.bought'>> {
    const { validation, purchased, snapshot } = await this.mutateGame(gameId, (engine) => {
      const check = engine.canBuySpace(name);
      return { validation: check, purchased: engine.buySpace(name), snapshot: engine.snapshot() };
    });

    if (!validation.ok) {
      this.logger.debug({ gameId, playerName: name, reason: validation.code }, 'purchase rejected');
      return this.validated('v1:space.bought', { purchased, reason: validation.code, snapshot });
    }

    this.logger.info(
      { gameId, playerName: name, spaceIndex: validation.spaceIndex, price: validation.price },
      'space purchased',
    );
    return this.validated('v1:space.bought', { purchased, snapshot });
  }

  async getWinner(gameId: string): Promise<ResponsePayload<'v1:game.winner'>> {
    const winner = await this.readGame(gameId, (engine) => engine.checkGameOver());
    return this.validated('v1:game.winner', { winner });
  }

  toFailureResponse(error: unknown): FailureResponse {
    if (error instanceof ServiceError || isEngineError(error)) {
      return {
        statusCode: STATUS_BY_ERROR_CODE[error.code],
        body: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined ? { details: error.details } : {}),
        },
      };
    }

    if (hasClientStatusCode(error)) {
      return {
        statusCode: 400,
        body: { code: 'INVALID_PAYLOAD', message: error.message },
      };
    }

    this.logger.error({ error }, 'unexpected game service failure');
    return {
      statusCode: 500,
      body: { code: 'INTERNAL_ERROR', message: 'unexpected server error' },
    };
  }
}
