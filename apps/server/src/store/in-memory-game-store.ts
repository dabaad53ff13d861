import type { GameEngine } from '@landgrab/engine';
import { GAME_TTL_SECONDS } from '@landgrab/shared';
import type { GameStore } from './game-store';

interface Entry {
  engine: GameEngine;
  expiresAt: number;
}

export interface InMemoryGameStoreOptions {
  ttlSeconds?: number;
  now?: () => number;
}

/**
 * Keeps live engines in process memory. Every save pushes the expiry out by
 * the TTL; expired games disappear the next time they are looked up or
 * counted.
 */
export class InMemoryGameStore implements GameStore {
  private readonly gamesById = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: InMemoryGameStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? GAME_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  private sweep(gameId: string): void {
    const entry = this.gamesById.get(gameId);
    if (!entry) {
      return;
    }

    if (entry.expiresAt > this.now()) {
      return;
    }

    this.gamesById.delete(gameId);
  }

  async getGame(gameId: string): Promise<GameEngine | null> {
    this.sweep(gameId);
    return this.gamesById.get(gameId)?.engine ?? null;
  }

  async saveGame(gameId: string, engine: GameEngine): Promise<void> {
    this.gamesById.set(gameId, {
      engine,
      expiresAt: this.now() + this.ttlMs,
    });
  }

  async deleteGame(gameId: string): Promise<boolean> {
    return this.gamesById.delete(gameId);
  }

  async countGames(): Promise<number> {
    for (const gameId of [...this.gamesById.keys()]) {
      this.sweep(gameId);
    }
    return this.gamesById.size;
  }
}
