import { GameEngine } from '../src';

export const flatRents = (rent: number): number[] => Array.from({ length: 24 }, () => rent);

export const thrown = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
};

export const createGame = (goPayout = 200, rentList: number[] = flatRents(50)): GameEngine => {
  const engine = new GameEngine();
  engine.createSpaces(goPayout, rentList);
  return engine;
};
