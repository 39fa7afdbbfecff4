import type { InstrumentedOperation, Operation } from '../../types';
import { GuardedBackend } from '../backend/guardedBackend';
import type { KeyValueBackend } from '../backend/keyValueBackend';
import { OperationLock } from './operationLock';
import { serializeArgs, serializeResult } from './serialize';

export { OperationLock } from './operationLock';
export { serializeArgs, serializeResult } from './serialize';

export interface HistoryKeys {
  inputs: string;
  outputs: string;
}

/** Backend list keys holding the call history of `operation`. */
export function historyKeys(operation: string): HistoryKeys {
  return { inputs: `${operation}:inputs`, outputs: `${operation}:outputs` };
}

/**
 * Counts invocations of `fn` in the backend integer at key `operation`.
 * The increment happens before `fn` runs, so failed calls are counted too.
 */
export function countCalls<A extends unknown[], R>(
  backend: KeyValueBackend,
  operation: string,
  fn: Operation<A, R>,
): InstrumentedOperation<A, R> {
  const guarded = GuardedBackend.wrap(backend);
  return async (...args: A): Promise<R> => {
    await guarded.incr(operation);
    return await fn(...args);
  };
}

/**
 * Records each call of `fn` in two parallel backend lists.
 *
 * The serialized arguments are appended to `<operation>:inputs` before `fn`
 * runs and the result to `<operation>:outputs` after it returns. When `fn`
 * throws, the input entry stays and no output is appended.
 */
export function callHistory<A extends unknown[], R>(
  backend: KeyValueBackend,
  operation: string,
  fn: Operation<A, R>,
): InstrumentedOperation<A, R> {
  const guarded = GuardedBackend.wrap(backend);
  const keys = historyKeys(operation);
  return async (...args: A): Promise<R> => {
    await guarded.rpush(keys.inputs, serializeArgs(args));
    const result = await fn(...args);
    await guarded.rpush(keys.outputs, serializeResult(result));
    return result;
  };
}

/**
 * Lets only one call of `fn` run at a time within this process.
 * Pass the same `lock` to several wrappers to serialize them against each other.
 */
export function serializeCalls<A extends unknown[], R>(
  fn: Operation<A, R>,
  lock: OperationLock = new OperationLock(),
): InstrumentedOperation<A, R> {
  return (...args: A): Promise<R> => lock.run(async (): Promise<R> => await fn(...args));
}

export interface InstrumentOptions {
  /** Wrap with countCalls. Default true. */
  count?: boolean;
  /** Wrap with callHistory. Default true. */
  history?: boolean;
  /**
   * Run the whole instrumented call (increment, input append, call, output append)
   * under a lock so history entries of concurrent calls stay paired. Default true.
   */
  serialize?: boolean;
  lock?: OperationLock;
}

/**
 * Composes the instrumentation wrappers around `fn`.
 * Counting and history are independent, so their nesting order does not change what ends up in the backend.
 */
export function instrument<A extends unknown[], R>(
  backend: KeyValueBackend,
  operation: string,
  fn: Operation<A, R>,
  options: InstrumentOptions = {},
): InstrumentedOperation<A, R> {
  const { count = true, history = true, serialize = true } = options;

  let wrapped: InstrumentedOperation<A, R> = async (...args: A): Promise<R> => await fn(...args);
  if (history) wrapped = callHistory<A, R>(backend, operation, wrapped);
  if (count) wrapped = countCalls<A, R>(backend, operation, wrapped);
  if (serialize) wrapped = serializeCalls<A, R>(wrapped, options.lock);
  return wrapped;
}
