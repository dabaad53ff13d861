import {
  playerNameSchema,
  spacesToMoveSchema,
  startingBalanceSchema,
  type GameSnapshot,
} from '@landgrab/shared';
import { Board, type Space } from './board';
import { EngineError } from './errors';
import { Player } from './player';
import type { BuyValidationResult, EngineEffect, RegistrationResult } from './types';
import { buildGameSnapshot } from './view';

/**
 * Turn resolution for one game. Holds the board and the players registered
 * under unique names, and mutates both as moves and purchases are applied.
 *
 * The engine is synchronous and keeps no locks: a host running several
 * callers against one instance must serialize the mutating calls itself.
 */
export class GameEngine {
  private board: Board | undefined = undefined;
  private readonly players = new Map<string, Player>();
  private currentVersion = 0;

  get version(): number {
    return this.currentVersion;
  }

  get hasBoard(): boolean {
    return this.board !== undefined;
  }

  createSpaces(goPayout: number, rentList: readonly number[]): void {
    if (this.board) {
      throw new EngineError('BOARD_ALREADY_CREATED', 'board has already been created');
    }
    this.board = Board.create(goPayout, rentList);
    this.currentVersion += 1;
  }

  /**
   * Registers a player at GO. A taken name leaves the game untouched and is
   * reported through the result rather than thrown.
   */
  createPlayer(name: string, startingBalance: number): RegistrationResult {
    const validName = playerNameSchema.safeParse(name);
    if (!validName.success) {
      throw new EngineError('INVALID_PLAYER', `invalid player name: ${JSON.stringify(name)}`, validName.error.issues);
    }
    if (!startingBalanceSchema.safeParse(startingBalance).success) {
      throw new EngineError('INVALID_PLAYER', 'starting balance must be a non-negative integer');
    }
    if (this.players.has(name)) {
      return { ok: false, code: 'DUPLICATE_NAME' };
    }

    this.players.set(name, new Player(name, startingBalance));
    this.currentVersion += 1;
    return { ok: true };
  }

  hasPlayer(name: string): boolean {
    return this.players.has(name);
  }

  playerNames(): string[] {
    return [...this.players.keys()];
  }

  accountBalance(name: string): number {
    return this.requirePlayer(name).balance;
  }

  position(name: string): number {
    return this.requirePlayer(name).position;
  }

  ownedSpaces(name: string): number[] {
    return this.requirePlayer(name).ownedSpaces;
  }

  canBuySpace(name: string): BuyValidationResult {
    const player = this.requirePlayer(name);
    const space = this.requireBoard().spaceAt(player.position);

    if (!player.isActive) {
      return { ok: false, code: 'PLAYER_INACTIVE' };
    }
    if (space.isGo || space.purchasePrice === undefined) {
      return { ok: false, code: 'SPACE_IS_GO' };
    }
    if (space.owner !== undefined) {
      return { ok: false, code: 'SPACE_OWNED' };
    }
    if (player.balance <= space.purchasePrice) {
      return { ok: false, code: 'INSUFFICIENT_FUNDS' };
    }
    return { ok: true, spaceIndex: space.index, price: space.purchasePrice };
  }

  buySpace(name: string): boolean {
    const validation = this.canBuySpace(name);
    if (!validation.ok) {
      return false;
    }

    const player = this.requirePlayer(name);
    player.withdraw(validation.price);
    player.addOwnedSpace(validation.spaceIndex);
    this.requireBoard().spaceAt(validation.spaceIndex).setOwner(name);
    this.currentVersion += 1;
    return true;
  }

  /**
   * Advances an active player, pays out GO on wraparound and settles rent on
   * the landing space. Eliminated players do not move.
   *
   * Any move that reaches index 24 or beyond counts as a wraparound, so
   * landing exactly on the last space also pays the GO payout.
   */
  movePlayer(name: string, spacesToMove: number): EngineEffect[] {
    if (!spacesToMoveSchema.safeParse(spacesToMove).success) {
      throw new EngineError('INVALID_MOVE', 'spaces to move must be a positive integer');
    }
    const player = this.requirePlayer(name);
    const board = this.requireBoard();
    if (!player.isActive) {
      return [];
    }

    const from = player.position;
    const target = from + spacesToMove;
    const wraps = target >= board.length - 1;
    const to = wraps ? target % board.length : target;

    player.setPosition(to);
    const effects: EngineEffect[] = [{ type: 'PLAYER_MOVED', playerName: name, from, to }];

    if (wraps) {
      player.deposit(board.goPayout);
      effects.push({ type: 'PASSED_GO', playerName: name, amount: board.goPayout });
    }

    effects.push(...this.settleRent(player, board.spaceAt(to)));
    this.currentVersion += 1;
    return effects;
  }

  /**
   * Returns the last player standing once every other registered player is
   * down to a zero balance, otherwise an empty string.
   */
  checkGameOver(): string {
    let eliminated = 0;
    let winner = '';
    for (const player of this.players.values()) {
      if (player.balance === 0) {
        eliminated += 1;
      } else {
        winner = player.name;
      }
    }
    return eliminated === this.players.size - 1 ? winner : '';
  }

  snapshot(): GameSnapshot {
    return buildGameSnapshot({
      board: this.board,
      players: [...this.players.values()],
      winner: this.checkGameOver(),
      version: this.currentVersion,
    });
  }

  // Rent equal to the whole balance still eliminates the payer.
  private settleRent(player: Player, space: Space): EngineEffect[] {
    const ownerName = space.owner;
    if (ownerName === undefined || space.isGo || ownerName === player.name) {
      return [];
    }

    const owner = this.requirePlayer(ownerName);
    const rentPaid = {
      type: 'RENT_PAID',
      playerName: player.name,
      ownerName,
      spaceIndex: space.index,
    } as const;

    if (space.rent < player.balance) {
      player.withdraw(space.rent);
      owner.deposit(space.rent);
      return [{ ...rentPaid, amount: space.rent }];
    }

    const amount = player.balance;
    player.withdraw(amount);
    owner.deposit(amount);
    return [
      { ...rentPaid, amount },
      {
        type: 'PLAYER_ELIMINATED',
        playerName: player.name,
        creditorName: ownerName,
        releasedSpaces: this.eliminate(player),
      },
    ];
  }

  private eliminate(player: Player): number[] {
    const board = this.requireBoard();
    const released = player.ownedSpaces;
    for (const index of released) {
      board.spaceAt(index).clearOwner();
    }
    player.clearOwnedSpaces();
    return released;
  }

  private requirePlayer(name: string): Player {
    const player = this.players.get(name);
    if (!player) {
      throw new EngineError('PLAYER_NOT_FOUND', `player ${name} is not registered`);
    }
    return player;
  }

  private requireBoard(): Board {
    if (!this.board) {
      throw new EngineError('BOARD_NOT_CREATED', 'spaces must be created before play');
    }
    return this.board;
  }
}
