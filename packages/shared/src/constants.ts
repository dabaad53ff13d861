export const BOARD_SIZE = 25;
export const GO_INDEX = 0;
export const GO_SPACE_NAME = 'GO';
export const RENT_LIST_LENGTH = BOARD_SIZE - 1;
export const PURCHASE_PRICE_MULTIPLIER = 5;
// Largest rent whose purchase price is still a safe integer.
export const MAX_RENT = Math.floor(Number.MAX_SAFE_INTEGER / PURCHASE_PRICE_MULTIPLIER);

export const MAX_PLAYER_NAME_LENGTH = 32;
export const GAME_TTL_SECONDS = 3600;
export const MAX_GAMES = 100;
