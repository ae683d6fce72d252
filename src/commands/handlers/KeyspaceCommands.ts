/**
 * Keyspace commands: SET, GET, DEL, EXISTS, MGET, MSET, FLUSH, PING.
 *
 * Each handler is one synchronous call (or a loop of calls) against the
 * store, so it never interleaves with another connection's command.
 */

import { ArityError, InvalidArgumentError } from '../../common/Errors';
import { CommandDefinition } from '../CommandTypes';
import { Replies } from '../Reply';

const TTL_PATTERN = /^\d+$/;

/**
 * TTL is a positive integer number of milliseconds.
 */
export function parseTTL(raw: string): number {
  const ttlMs = TTL_PATTERN.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(ttlMs) || ttlMs <= 0) {
    throw new InvalidArgumentError('ERROR: invalid ttl');
  }
  return ttlMs;
}

export const SetCommand: CommandDefinition = {
  name: 'SET',
  arity: { min: 2, max: 3 },
  execute(store, [key = '', value = '', ttl]) {
    if (ttl === undefined) {
      store.set(key, value);
    } else {
      store.set(key, value, { ttlMs: parseTTL(ttl) });
    }
    return Replies.OK;
  },
};

export const GetCommand: CommandDefinition = {
  name: 'GET',
  arity: { min: 1, max: 1 },
  execute(store, [key = '']) {
    return Replies.bulkOrNil(store.get(key));
  },
};

export const DelCommand: CommandDefinition = {
  name: 'DEL',
  aliases: ['DELETE'],
  arity: { min: 1, max: 1 },
  execute(store, [key = '']) {
    return Replies.integer(store.delete(key) ? 1 : 0);
  },
};

export const ExistsCommand: CommandDefinition = {
  name: 'EXISTS',
  arity: { min: 1, max: 1 },
  execute(store, [key = '']) {
    return Replies.integer(store.exists(key) ? 1 : 0);
  },
};

export const MGetCommand: CommandDefinition = {
  name: 'MGET',
  arity: { min: 1, max: Number.POSITIVE_INFINITY },
  execute(store, keys) {
    return Replies.array(keys.map((key) => Replies.bulkOrNil(store.get(key))));
  },
};

export const MSetCommand: CommandDefinition = {
  name: 'MSET',
  arity: { min: 2, max: Number.POSITIVE_INFINITY },
  execute(store, args) {
    if (args.length % 2 !== 0) {
      throw new ArityError('MSET', args.length);
    }

    for (let i = 0; i < args.length; i += 2) {
      store.set(args[i] ?? '', args[i + 1] ?? '');
    }
    return Replies.integer(args.length / 2);
  },
};

export const FlushCommand: CommandDefinition = {
  name: 'FLUSH',
  arity: { min: 0, max: 0 },
  execute(store) {
    return Replies.integer(store.flush());
  },
};

export const PingCommand: CommandDefinition = {
  name: 'PING',
  arity: { min: 0, max: 1 },
  execute(_store, [message]) {
    return message === undefined ? Replies.status('PONG') : Replies.bulk(message);
  },
};

export const KEYSPACE_COMMANDS: readonly CommandDefinition[] = [
  SetCommand,
  GetCommand,
  DelCommand,
  ExistsCommand,
  MGetCommand,
  MSetCommand,
  FlushCommand,
  PingCommand,
];
