export { Board, Space } from './board';
export { GameEngine } from './engine';
export { EngineError, isEngineError } from './errors';
export { Player } from './player';
export { buildGameSnapshot, buildPlayerView, buildSpaceView } from './view';
export type { BuyValidationResult, EngineEffect, RegistrationResult, SnapshotSource } from './types';
