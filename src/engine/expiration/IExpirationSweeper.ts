export interface SweeperStats {
  readonly totalSweeps: number;
  readonly totalRemoved: number;
  readonly lastSweepTime: number | null;
  readonly running: boolean;
}

export interface IExpirationSweeper {
  start(): void;
  stop(): void;
  runOnce(): number;
  getStats(): SweeperStats;
}
