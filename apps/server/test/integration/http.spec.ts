import Fastify, { type FastifyInstance } from 'fastify';
import pino from 'pino';
import { afterEach, describe, expect, it } from 'vitest';
import { registerGameRoutes } from '../../src/http';
import { GameService } from '../../src/service/game-service';
import { InMemoryGameStore } from '../../src/store/in-memory-game-store';
import { flatRents } from '../helpers';

const apps: FastifyInstance[] = [];

const buildApp = (): FastifyInstance => {
  const app = Fastify();
  const service = new GameService(new InMemoryGameStore(), pino({ level: 'silent' }), { maxGames: 10 });
  registerGameRoutes(app, service);
  apps.push(app);
  return app;
};

const createGameWithBoard = async (app: FastifyInstance): Promise<string> => {
  const created = await app.inject({ method: 'POST', url: '/v1/games' });
  const { gameId } = created.json<{ gameId: string }>();
  await app.inject({
    method: 'POST',
    url: `/v1/games/${gameId}/spaces`,
    payload: { goPayout: 200, rentList: flatRents(50) },
  });
  return gameId;
};

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()));
});

describe('game routes', () => {
  it('answers health checks', async () => {
    const app = buildApp();

    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json<{ ok: boolean }>().ok).toBe(true);
  });

  it('serves nothing outside the game routes', async () => {
    const app = buildApp();

    const response = await app.inject({ method: 'GET', url: '/version' });

    expect(response.statusCode).toBe(404);
  });

  it('creates games with 201', async () => {
    const app = buildApp();

    const response = await app.inject({ method: 'POST', url: '/v1/games' });

    expect(response.statusCode).toBe(201);
    expect(response.json<{ snapshot: { version: number } }>().snapshot.version).toBe(0);
  });

  it('plays a rent elimination end to end', async () => {
    const app = buildApp();
    const gameId = await createGameWithBoard(app);

    for (const player of [
      { name: 'A', startingBalance: 1000 },
      { name: 'B', startingBalance: 30 },
    ]) {
      const registered = await app.inject({ method: 'POST', url: `/v1/games/${gameId}/players`, payload: player });
      expect(registered.json<{ created: boolean }>().created).toBe(true);
    }

    await app.inject({ method: 'POST', url: `/v1/games/${gameId}/players/A/move`, payload: { spaces: 1 } });
    const bought = await app.inject({ method: 'POST', url: `/v1/games/${gameId}/players/A/buy` });
    expect(bought.json<{ purchased: boolean }>().purchased).toBe(true);

    const moved = await app.inject({
      method: 'POST',
      url: `/v1/games/${gameId}/players/B/move`,
      payload: { spaces: 1 },
    });
    expect(moved.statusCode).toBe(200);
    expect(moved.json<{ effects: Array<{ type: string }> }>().effects.map((effect) => effect.type)).toEqual([
      'PLAYER_MOVED',
      'RENT_PAID',
      'PLAYER_ELIMINATED',
    ]);

    const loser = await app.inject({ method: 'GET', url: `/v1/games/${gameId}/players/B` });
    expect(loser.json()).toEqual({
      player: { name: 'B', balance: 0, position: 1, ownedSpaces: [], active: false },
    });

    const owner = await app.inject({ method: 'GET', url: `/v1/games/${gameId}/players/A` });
    expect(owner.json<{ player: { balance: number } }>().player.balance).toBe(780);

    const winner = await app.inject({ method: 'GET', url: `/v1/games/${gameId}/winner` });
    expect(winner.json()).toEqual({ winner: 'A' });
  });

  it('answers 200 with a notice for a taken name', async () => {
    const app = buildApp();
    const gameId = await createGameWithBoard(app);
    const url = `/v1/games/${gameId}/players`;
    await app.inject({ method: 'POST', url, payload: { name: 'A', startingBalance: 1000 } });

    const response = await app.inject({ method: 'POST', url, payload: { name: 'A', startingBalance: 1 } });

    expect(response.statusCode).toBe(200);
    expect(response.json<{ created: boolean; notice: string }>()).toMatchObject({
      created: false,
      notice: 'DUPLICATE_NAME',
    });
  });

  it('answers 404 for unknown games and players', async () => {
    const app = buildApp();
    const gameId = await createGameWithBoard(app);

    const game = await app.inject({ method: 'GET', url: '/v1/games/3f9a5c1e-8d2b-4e7f-9a6c-1b2d3e4f5a6b' });
    expect(game.statusCode).toBe(404);
    expect(game.json()).toEqual({ code: 'GAME_NOT_FOUND', message: 'game does not exist' });

    const player = await app.inject({ method: 'GET', url: `/v1/games/${gameId}/players/ghost` });
    expect(player.statusCode).toBe(404);
    expect(player.json()).toEqual({ code: 'PLAYER_NOT_FOUND', message: 'player ghost is not registered' });
  });

  it('answers 400 for invalid bodies', async () => {
    const app = buildApp();
    const gameId = await createGameWithBoard(app);

    const invalid = await app.inject({
      method: 'POST',
      url: `/v1/games/${gameId}/players`,
      payload: { name: 'A', startingBalance: -5 },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json<{ code: string; message: string }>()).toMatchObject({
      code: 'INVALID_PAYLOAD',
      message: 'invalid player payload',
    });

    const unparseable = await app.inject({
      method: 'POST',
      url: `/v1/games/${gameId}/players`,
      headers: { 'content-type': 'application/json' },
      payload: '{"name":',
    });
    expect(unparseable.statusCode).toBe(400);
    expect(unparseable.json<{ code: string }>().code).toBe('INVALID_PAYLOAD');
  });

  it('answers 409 when the board is built twice', async () => {
    const app = buildApp();
    const gameId = await createGameWithBoard(app);

    const response = await app.inject({
      method: 'POST',
      url: `/v1/games/${gameId}/spaces`,
      payload: { goPayout: 100, rentList: flatRents(10) },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json<{ code: string }>().code).toBe('BOARD_ALREADY_CREATED');
  });

  it('deletes games', async () => {
    const app = buildApp();
    const gameId = await createGameWithBoard(app);

    const deleted = await app.inject({ method: 'DELETE', url: `/v1/games/${gameId}` });
    expect(deleted.statusCode).toBe(204);

    const lookup = await app.inject({ method: 'GET', url: `/v1/games/${gameId}` });
    expect(lookup.statusCode).toBe(404);
  });
});
