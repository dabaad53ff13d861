import type { GameSnapshot, PlayerView, SpaceView } from '@landgrab/shared';
import type { Space } from './board';
import type { Player } from './player';
import type { SnapshotSource } from './types';

export const buildSpaceView = (space: Space): SpaceView => ({
  index: space.index,
  name: space.name,
  rent: space.rent,
  ...(space.purchasePrice !== undefined ? { purchasePrice: space.purchasePrice } : {}),
  ...(space.owner !== undefined ? { owner: space.owner } : {}),
});

export const buildPlayerView = (player: Player): PlayerView => ({
  name: player.name,
  balance: player.balance,
  position: player.position,
  ownedSpaces: player.ownedSpaces,
  active: player.isActive,
});

export const buildGameSnapshot = (source: SnapshotSource): GameSnapshot => ({
  spaces: source.board ? source.board.spaces().map(buildSpaceView) : [],
  players: source.players.map(buildPlayerView),
  winner: source.winner,
  version: source.version,
});
