export type { Reply, StatusReply, BulkReply, IntegerReply, NilReply, ErrorReply, ArrayReply } from './Reply';
export { Replies } from './Reply';
export type { CommandDefinition, CommandArity } from './CommandTypes';
export type { ICommandInterpreter } from './ICommandInterpreter';
export { CommandRegistry } from './CommandRegistry';
export { CommandInterpreter, createDefaultRegistry } from './CommandInterpreter';
export { KEYSPACE_COMMANDS, parseTTL } from './handlers/KeyspaceCommands';
