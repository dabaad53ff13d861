import type { z } from 'zod';
import type { ErrorCode } from './errors';
import type { effectSchema, gameSnapshotSchema, playerViewSchema, spaceViewSchema } from './schemas';

export type SpaceView = z.infer<typeof spaceViewSchema>;
export type PlayerView = z.infer<typeof playerViewSchema>;
export type GameSnapshot = z.infer<typeof gameSnapshotSchema>;
export type GameEffect = z.infer<typeof effectSchema>;

export interface BoardSetup {
  goPayout: number;
  rentList: number[];
}

export interface ServiceErrorPayload {
  code: ErrorCode;
  message: string;
  details?: unknown | undefined;
}
