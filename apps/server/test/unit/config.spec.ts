import { describe, expect, it } from 'vitest';
import { parseConfigFromEnv } from '../../src/config';

const baseEnv = (): NodeJS.ProcessEnv => ({
  PORT: '3001',
  LOG_LEVEL: 'info',
  NODE_ENV: 'development',
});

describe('parseConfigFromEnv', () => {
  it('fills in defaults for everything left unset', () => {
    expect(parseConfigFromEnv({})).toEqual({
      port: 3001,
      host: '0.0.0.0',
      logLevel: 'info',
      nodeEnv: 'development',
      isProduction: false,
      maxGames: 100,
      gameTtlSeconds: 3600,
    });
  });

  it('coerces numeric settings from strings', () => {
    const env = baseEnv();
    env.PORT = '8080';
    env.MAX_GAMES = '5';
    env.GAME_TTL_SECONDS = '60';

    const config = parseConfigFromEnv(env);
    expect(config.port).toBe(8080);
    expect(config.maxGames).toBe(5);
    expect(config.gameTtlSeconds).toBe(60);
  });

  it('flags production from NODE_ENV', () => {
    const env = baseEnv();
    env.NODE_ENV = 'production';

    expect(parseConfigFromEnv(env).isProduction).toBe(true);
  });

  it('fails on an out-of-range port', () => {
    const env = baseEnv();
    env.PORT = '70000';

    expect(() => parseConfigFromEnv(env)).toThrow('invalid environment: PORT');
  });

  it('fails on an unknown log level', () => {
    const env = baseEnv();
    env.LOG_LEVEL = 'verbose';

    expect(() => parseConfigFromEnv(env)).toThrow('invalid environment: LOG_LEVEL');
  });

  it('fails when the game cap is not a positive integer', () => {
    const env = baseEnv();
    env.MAX_GAMES = '0';

    expect(() => parseConfigFromEnv(env)).toThrow('invalid environment: MAX_GAMES');
  });
});
