/**
 * Reply values produced by the command interpreter.
 * Encoding to bytes belongs to the wire protocol, not here.
 */

export interface StatusReply {
  readonly kind: 'status';
  readonly value: string;
}

export interface BulkReply {
  readonly kind: 'bulk';
  readonly value: string;
}

export interface IntegerReply {
  readonly kind: 'integer';
  readonly value: number;
}

export interface NilReply {
  readonly kind: 'nil';
}

export interface ErrorReply {
  readonly kind: 'error';
  readonly message: string;
}

export interface ArrayReply {
  readonly kind: 'array';
  readonly items: readonly Reply[];
}

export type Reply = StatusReply | BulkReply | IntegerReply | NilReply | ErrorReply | ArrayReply;

const OK: StatusReply = { kind: 'status', value: 'OK' };
const NIL: NilReply = { kind: 'nil' };

export const Replies = {
  OK,
  NIL,

  status(value: string): StatusReply {
    return { kind: 'status', value };
  },

  bulk(value: string): BulkReply {
    return { kind: 'bulk', value };
  },

  integer(value: number): IntegerReply {
    return { kind: 'integer', value };
  },

  error(message: string): ErrorReply {
    return { kind: 'error', message };
  },

  array(items: readonly Reply[]): ArrayReply {
    return { kind: 'array', items };
  },

  bulkOrNil(value: string | null): BulkReply | NilReply {
    return value === null ? NIL : { kind: 'bulk', value };
  },
};
