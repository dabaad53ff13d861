import type { BuyRejectionCode, GameEffect } from '@landgrab/shared';
import type { Board } from './board';
import type { Player } from './player';

export type EngineEffect = GameEffect;

export type RegistrationResult = { ok: true } | { ok: false; code: 'DUPLICATE_NAME' };

export type BuyValidationResult =
  | { ok: true; spaceIndex: number; price: number }
  | { ok: false; code: BuyRejectionCode };

export interface SnapshotSource {
  board: Board | undefined;
  players: readonly Player[];
  winner: string;
  version: number;
}
