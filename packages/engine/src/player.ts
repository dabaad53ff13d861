import { GO_INDEX } from '@landgrab/shared';

export class Player {
  private accountBalance: number;
  private currentPosition = GO_INDEX;
  private owned: number[] = [];

  constructor(
    readonly name: string,
    startingBalance: number,
  ) {
    this.accountBalance = startingBalance;
  }

  get balance(): number {
    return this.accountBalance;
  }

  get position(): number {
    return this.currentPosition;
  }

  get isActive(): boolean {
    return this.accountBalance > 0;
  }

  get ownedSpaces(): number[] {
    return [...this.owned];
  }

  // Callers make sure a withdrawal never exceeds the balance.
  deposit(amount: number): void {
    this.accountBalance += amount;
  }

  withdraw(amount: number): void {
    this.accountBalance -= amount;
  }

  setPosition(index: number): void {
    this.currentPosition = index;
  }

  addOwnedSpace(index: number): void {
    this.owned.push(index);
  }

  clearOwnedSpaces(): void {
    this.owned = [];
  }
}
