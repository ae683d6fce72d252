export type { IExpirationSweeper, SweeperStats } from './IExpirationSweeper';
export { ExpirationSweeper } from './ExpirationSweeper';
export type { ExpirationSweeperConfig, ExpirationSweeperDependencies } from './ExpirationSweeper';
