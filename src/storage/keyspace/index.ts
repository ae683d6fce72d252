export type { KeyspaceEntry } from './KeyspaceEntry';
export { isExpired } from './KeyspaceEntry';
export { KeyspaceStore } from './KeyspaceStore';
export type { KeyspaceStoreDependencies } from './KeyspaceStore';
