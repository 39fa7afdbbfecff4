import { GuardedBackend } from '../backend/guardedBackend';
import type { KeyValueBackend } from '../backend/keyValueBackend';
import { historyKeys } from '../instrumentation';
import { asInteger, asText } from '../store/codec';

export interface ReplayOptions {
  /** Receives each trace line. Defaults to console.log. */
  write?: (line: string) => void;
}

export interface ReplayEntry {
  input: string;
  output: string;
}

export interface ReplayReport {
  operation: string;
  count: number;
  entries: ReplayEntry[];
}

/**
 * Reads the counter and call history of `operation` without modifying anything.
 * Inputs and outputs are paired by position; when one list is longer the
 * unpaired tail is dropped.
 */
export async function readHistory(backend: KeyValueBackend, operation: string): Promise<ReplayReport> {
  const guarded = GuardedBackend.wrap(backend);
  const keys = historyKeys(operation);

  const [rawCount, inputs, outputs] = await Promise.all([
    guarded.get(operation),
    guarded.lrange(keys.inputs, 0, -1),
    guarded.lrange(keys.outputs, 0, -1),
  ]);

  const entries: ReplayEntry[] = [];
  const paired = Math.min(inputs.length, outputs.length);
  for (let i = 0; i < paired; i++) {
    entries.push({ input: asText(inputs[i]), output: asText(outputs[i]) });
  }

  return {
    operation,
    count: rawCount === null ? 0 : asInteger(rawCount),
    entries,
  };
}

export function formatReplay(report: ReplayReport): string[] {
  return [
    `${report.operation} was called ${report.count} times:`,
    ...report.entries.map((entry) => `${report.operation}(*${entry.input}) -> ${entry.output}`),
  ];
}

/**
 * Emits a human-readable trace of every recorded call of `operation` and returns the lines.
 *
 * @example
 * await replay(backend, CacheOperation.Store);
 * // Cache.store was called 2 times:
 * // Cache.store(*["foo"]) -> 3f1c…
 * // Cache.store(*[42]) -> 9a0b…
 */
export async function replay(
  backend: KeyValueBackend,
  operation: string,
  options: ReplayOptions = {},
): Promise<string[]> {
  const write = options.write ?? ((line: string) => console.log(line));
  const lines = formatReplay(await readHistory(backend, operation));
  for (const line of lines) write(line);
  return lines;
}
