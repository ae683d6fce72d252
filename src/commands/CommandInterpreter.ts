import { IKeyspaceStore } from '../interfaces/Keyspace';
import { ArityError, CommandError, UnknownCommandError } from '../common/Errors';
import { ICommandInterpreter } from './ICommandInterpreter';
import { CommandRegistry } from './CommandRegistry';
import { CommandDefinition } from './CommandTypes';
import { KEYSPACE_COMMANDS } from './handlers/KeyspaceCommands';
import { Reply, Replies } from './Reply';

export function createDefaultRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  for (const command of KEYSPACE_COMMANDS) {
    registry.register(command);
  }
  return registry;
}

export class CommandInterpreter implements ICommandInterpreter {
  private readonly store: IKeyspaceStore;
  private readonly registry: CommandRegistry;

  constructor(store: IKeyspaceStore, registry: CommandRegistry = createDefaultRegistry()) {
    this.store = store;
    this.registry = registry;
  }

  /**
   * Orchestrates:
   * - lookup
   * - arity validation
   * - execution
   */
  execute(request: readonly string[]): Reply {
    const [name, ...args] = request;

    try {
      const command = this.resolve(name ?? '', args.length);
      return command.execute(this.store, args);
    } catch (err) {
      if (err instanceof CommandError) {
        return Replies.error(err.message);
      }
      throw err;
    }
  }

  private resolve(name: string, argCount: number): CommandDefinition {
    const command = this.registry.get(name);
    if (command === null) {
      throw new UnknownCommandError(name);
    }

    if (argCount < command.arity.min || argCount > command.arity.max) {
      throw new ArityError(command.name, argCount);
    }

    return command;
  }
}
