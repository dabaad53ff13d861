import pino from 'pino';

export interface LogEntry {
  level: number;
  msg: string;
  [field: string]: unknown;
}

export const createCapturingLogger = () => {
  const lines: string[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        lines.push(line);
      },
    },
  );
  const entries = (): LogEntry[] => lines.map((line): LogEntry => JSON.parse(line));
  return { logger, entries };
};

export const flatRents = (rent: number): number[] => Array.from({ length: 24 }, () => rent);
