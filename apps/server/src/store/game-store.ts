import type { GameEngine } from '@landgrab/engine';

export interface GameStore {
  getGame(gameId: string): Promise<GameEngine | null>;
  saveGame(gameId: string, engine: GameEngine): Promise<void>;
  deleteGame(gameId: string): Promise<boolean>;
  countGames(): Promise<number>;
}
