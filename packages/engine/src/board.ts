import { GO_INDEX, GO_SPACE_NAME, PURCHASE_PRICE_MULTIPLIER, boardSetupSchema } from '@landgrab/shared';
import { EngineError } from './errors';

export class Space {
  readonly purchasePrice: number | undefined;
  private ownerName: string | undefined = undefined;

  constructor(
    readonly index: number,
    readonly rent: number,
  ) {
    this.purchasePrice = index === GO_INDEX ? undefined : rent * PURCHASE_PRICE_MULTIPLIER;
  }

  get isGo(): boolean {
    return this.index === GO_INDEX;
  }

  get name(): string {
    return this.isGo ? GO_SPACE_NAME : `Space ${this.index}`;
  }

  get owner(): string | undefined {
    return this.ownerName;
  }

  setOwner(playerName: string): void {
    if (this.isGo) {
      throw new EngineError('SPACE_NOT_OWNABLE', 'GO cannot be owned');
    }
    this.ownerName = playerName;
  }

  clearOwner(): void {
    this.ownerName = undefined;
  }
}

/**
 * The ring of spaces players move around. Index 0 is GO, whose rent is the
 * amount paid out on wraparound; every other space can be bought for five
 * times its rent.
 */
export class Board {
  private constructor(private readonly ring: readonly Space[]) {}

  static create(goPayout: number, rentList: readonly number[]): Board {
    const parsed = boardSetupSchema.safeParse({ goPayout, rentList });
    if (!parsed.success) {
      throw new EngineError(
        'INVALID_BOARD',
        'board needs a positive integer GO payout and 24 positive integer rents',
        parsed.error.issues,
      );
    }

    return new Board([
      new Space(GO_INDEX, parsed.data.goPayout),
      ...parsed.data.rentList.map((rent, offset) => new Space(offset + 1, rent)),
    ]);
  }

  get length(): number {
    return this.ring.length;
  }

  get goPayout(): number {
    return this.spaceAt(GO_INDEX).rent;
  }

  spaceAt(index: number): Space {
    const space = Number.isInteger(index) ? this.ring[index] : undefined;
    if (!space) {
      throw new EngineError('INVALID_SPACE_INDEX', `no space at index ${index}`);
    }
    return space;
  }

  spaces(): readonly Space[] {
    return this.ring;
  }
}
