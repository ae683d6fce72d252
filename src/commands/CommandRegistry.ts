import { CommandDefinition } from './CommandTypes';

export class CommandRegistry {
  private readonly commands = new Map<string, CommandDefinition>();

  /**
   * Registers a command and its aliases.
   * Throws on a name that is already taken.
   */
  register(command: CommandDefinition): void {
    const names = [command.name, ...(command.aliases ?? [])].map((name) => name.toUpperCase());

    for (const name of names) {
      if (this.commands.has(name)) {
        throw new Error(`Command '${name}' is already registered`);
      }
    }

    for (const name of names) {
      this.commands.set(name, command);
    }
  }

  get(name: string): CommandDefinition | null {
    return this.commands.get(name.toUpperCase()) ?? null;
  }
}
