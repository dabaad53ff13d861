import { z } from 'zod';
import { BOARD_SIZE, MAX_PLAYER_NAME_LENGTH, MAX_RENT, RENT_LIST_LENGTH } from './constants';
import { BUY_REJECTION_CODES, ERROR_CODES } from './errors';

export const playerNameSchema = z
  .string()
  .min(1)
  .max(MAX_PLAYER_NAME_LENGTH)
  .regex(/^\S(?:.*\S)?$/, 'must not start or end with whitespace');

export const gameIdSchema = z.string().uuid();
export const spaceIndexSchema = z.number().int().min(0).max(BOARD_SIZE - 1);
export const goPayoutSchema = z.number().int().positive().safe();
export const rentListSchema = z.array(z.number().int().positive().max(MAX_RENT)).length(RENT_LIST_LENGTH);
export const startingBalanceSchema = z.number().int().nonnegative().safe();
export const spacesToMoveSchema = z.number().int().positive().safe();

export const boardSetupSchema = z.object({
  goPayout: goPayoutSchema,
  rentList: rentListSchema,
});

export const spaceViewSchema = z.object({
  index: spaceIndexSchema,
  name: z.string().min(1),
  rent: z.number().int().positive(),
  purchasePrice: z.number().int().positive().optional(),
  owner: playerNameSchema.optional(),
});

export const playerViewSchema = z.object({
  name: playerNameSchema,
  balance: z.number().int(),
  position: spaceIndexSchema,
  ownedSpaces: z.array(spaceIndexSchema),
  active: z.boolean(),
});

export const gameSnapshotSchema = z.object({
  spaces: z.array(spaceViewSchema).refine((spaces) => spaces.length === 0 || spaces.length === BOARD_SIZE, {
    message: `board must be empty or hold ${BOARD_SIZE} spaces`,
  }),
  players: z.array(playerViewSchema),
  winner: z.string(),
  version: z.number().int().nonnegative(),
});

export const effectSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('PLAYER_MOVED'),
    playerName: playerNameSchema,
    from: spaceIndexSchema,
    to: spaceIndexSchema,
  }),
  z.object({
    type: z.literal('PASSED_GO'),
    playerName: playerNameSchema,
    amount: goPayoutSchema,
  }),
  z.object({
    type: z.literal('RENT_PAID'),
    playerName: playerNameSchema,
    ownerName: playerNameSchema,
    spaceIndex: spaceIndexSchema,
    amount: z.number().int().nonnegative(),
  }),
  z.object({
    type: z.literal('PLAYER_ELIMINATED'),
    playerName: playerNameSchema,
    creditorName: playerNameSchema,
    releasedSpaces: z.array(spaceIndexSchema),
  }),
]);

export const requestSchemas = {
  'v1:spaces.create': boardSetupSchema,
  'v1:player.create': z.object({
    name: playerNameSchema,
    startingBalance: startingBalanceSchema,
  }),
  'v1:player.move': z.object({ spaces: spacesToMoveSchema }),
} as const;

export const responseSchemas = {
  'v1:game.created': z.object({
    gameId: gameIdSchema,
    snapshot: gameSnapshotSchema,
  }),
  'v1:game.state': z.object({ snapshot: gameSnapshotSchema }),
  'v1:player.created': z.object({
    created: z.boolean(),
    notice: z.literal('DUPLICATE_NAME').optional(),
    snapshot: gameSnapshotSchema,
  }),
  'v1:player.state': z.object({ player: playerViewSchema }),
  'v1:player.moved': z.object({
    effects: z.array(effectSchema),
    winner: z.string(),
    snapshot: gameSnapshotSchema,
  }),
  'v1:space.bought': z.object({
    purchased: z.boolean(),
    reason: z.enum(BUY_REJECTION_CODES).optional(),
    snapshot: gameSnapshotSchema,
  }),
  'v1:game.winner': z.object({ winner: z.string() }),
  'v1:error': z.object({
    code: z.enum(ERROR_CODES),
    message: z.string(),
    details: z.unknown().optional(),
  }),
} as const;

export type RequestName = keyof typeof requestSchemas;
export type ResponseName = keyof typeof responseSchemas;

export type RequestPayload<T extends RequestName> = z.infer<(typeof requestSchemas)[T]>;

export type ResponsePayload<T extends ResponseName> = z.infer<(typeof responseSchemas)[T]>;
