import { KeyValueStore } from '../store/KeyValueStore';
import { TokenSnapshot, TokenTable } from './TokenTable';

interface KeyedWrite {
  key: string;
  value: unknown;
  expire: number;
}

interface Adjustment {
  key: string;
  offset: number;
  initial: number;
  expire: number;
}

/**
 * A write recorded during a transaction, replayed against the backend on
 * commit. Values are copied when the action is created, so later changes
 * to the caller's objects don't leak into the replay.
 */
export type DeferredAction =
  | ({ kind: 'set' } & KeyedWrite)
  | ({ kind: 'add' } & KeyedWrite)
  | ({ kind: 'replace' } & KeyedWrite)
  | ({ kind: 'cas'; expected: TokenSnapshot } & KeyedWrite)
  | { kind: 'setMulti'; items: Map<string, unknown>; expire: number }
  | { kind: 'delete'; key: string }
  | { kind: 'deleteMulti'; keys: string[] }
  | ({ kind: 'increment' } & Adjustment)
  | ({ kind: 'decrement' } & Adjustment)
  | { kind: 'touch'; key: string; expire: number }
  | { kind: 'flush' };

export type DeferredKind = DeferredAction['kind'];

export interface DeferredEntry {
  action: DeferredAction;
  keys: string[];
}

export function affectedKeys(action: DeferredAction): string[] {
  switch (action.kind) {
    case 'setMulti':
      return Array.from(action.items.keys());
    case 'deleteMulti':
      return [...action.keys];
    case 'flush':
      return [];
    default:
      return [action.key];
  }
}

export function createEntry(action: DeferredAction): DeferredEntry {
  return { action, keys: affectedKeys(action) };
}

/**
 * Applies one action to the backend and reports whether it took.
 *
 * Deletes always report success: a key that is already gone on the backend
 * is the outcome the delete wanted. A CAS re-reads the backend to get a live
 * token and only goes through if the value is still the one the
 * transaction originally read.
 */
export async function replay(action: DeferredAction, backend: KeyValueStore): Promise<boolean> {
  switch (action.kind) {
    case 'set':
      return backend.set(action.key, action.value, action.expire);
    case 'add':
      return backend.add(action.key, action.value, action.expire);
    case 'replace':
      return backend.replace(action.key, action.value, action.expire);
    case 'setMulti': {
      const results = await backend.setMulti(action.items, action.expire);
      for (const key of action.items.keys()) {
        if (results.get(key) !== true) return false;
      }
      return true;
    }
    case 'delete':
      await backend.delete(action.key);
      return true;
    case 'deleteMulti':
      await backend.deleteMulti(action.keys);
      return true;
    case 'cas': {
      const current = await backend.get(action.key);
      if (!current || !TokenTable.matches(action.expected, current.value)) {
        return false;
      }
      return backend.cas(current.token, action.key, action.value, action.expire);
    }
    case 'increment':
      return (await backend.increment(action.key, action.offset, action.initial, action.expire)) !== false;
    case 'decrement':
      return (await backend.decrement(action.key, action.offset, action.initial, action.expire)) !== false;
    case 'touch':
      return backend.touch(action.key, action.expire);
    case 'flush':
      return backend.flush();
  }
}
