import type {
  FastifyBaseLogger,
  FastifyInstance,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault,
} from 'fastify';
import type { GameService } from './service/game-service';

interface GameParams {
  gameId: string;
}

interface PlayerParams extends GameParams {
  name: string;
}

type HttpApp<TLogger extends FastifyBaseLogger> = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression,
  RawReplyDefaultExpression,
  TLogger
>;

export const registerGameRoutes = <TLogger extends FastifyBaseLogger>(
  app: HttpApp<TLogger>,
  gameService: GameService,
): void => {
  app.setErrorHandler((error, _request, reply) => {
    const failure = gameService.toFailureResponse(error);
    return reply.status(failure.statusCode).send(failure.body);
  });

  app.get('/health', async () => ({ ok: true, now: Date.now() }));

  app.post('/v1/games', async (_request, reply) => {
    const created = await gameService.createGame();
    return reply.status(201).send(created);
  });

  app.get<{ Params: GameParams }>('/v1/games/:gameId', async (request) =>
    gameService.getSnapshot(request.params.gameId),
  );

  app.delete<{ Params: GameParams }>('/v1/games/:gameId', async (request, reply) => {
    await gameService.deleteGame(request.params.gameId);
    return reply.status(204).send();
  });

  app.post<{ Params: GameParams }>('/v1/games/:gameId/spaces', async (request) =>
    gameService.createSpaces(request.params.gameId, request.body),
  );

  app.post<{ Params: GameParams }>('/v1/games/:gameId/players', async (request) =>
    gameService.createPlayer(request.params.gameId, request.body),
  );

  app.get<{ Params: PlayerParams }>('/v1/games/:gameId/players/:name', async (request) =>
    gameService.getPlayer(request.params.gameId, request.params.name),
  );

  app.post<{ Params: PlayerParams }>('/v1/games/:gameId/players/:name/move', async (request) =>
    gameService.movePlayer(request.params.gameId, request.params.name, request.body),
  );

  app.post<{ Params: PlayerParams }>('/v1/games/:gameId/players/:name/buy', async (request) =>
    gameService.buySpace(request.params.gameId, request.params.name),
  );

  app.get<{ Params: GameParams }>('/v1/games/:gameId/winner', async (request) =>
    gameService.getWinner(request.params.gameId),
  );
};
