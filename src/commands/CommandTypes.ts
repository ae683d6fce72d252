import { IKeyspaceStore } from '../interfaces/Keyspace';
import { Reply } from './Reply';

export interface CommandArity {
  /** Arguments after the command name. */
  readonly min: number;
  readonly max: number;
}

export interface CommandDefinition {
  /** Canonical upper-case name (e.g. SET, GET). */
  readonly name: string;
  readonly aliases?: readonly string[];
  readonly arity: CommandArity;

  /**
   * Runs against the store. Must be synchronous and must not perform I/O;
   * throws CommandError for bad input.
   */
  execute(store: IKeyspaceStore, args: readonly string[]): Reply;
}
