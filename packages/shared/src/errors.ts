export const ERROR_CODES = [
  'GAME_NOT_FOUND',
  'GAME_LIMIT_REACHED',
  'PLAYER_NOT_FOUND',
  'DUPLICATE_NAME',
  'BOARD_NOT_CREATED',
  'BOARD_ALREADY_CREATED',
  'INVALID_BOARD',
  'INVALID_SPACE_INDEX',
  'INVALID_PLAYER',
  'INVALID_MOVE',
  'SPACE_NOT_OWNABLE',
  'INVALID_PAYLOAD',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export const BUY_REJECTION_CODES = ['PLAYER_INACTIVE', 'SPACE_IS_GO', 'SPACE_OWNED', 'INSUFFICIENT_FUNDS'] as const;

export type BuyRejectionCode = (typeof BUY_REJECTION_CODES)[number];
