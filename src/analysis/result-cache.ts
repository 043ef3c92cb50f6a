/**
 * Per-session cache of theory results.
 *
 * An entry is reused only while the input fields its theory declares are
 * unchanged. Modifying a field drops the entries of the theories that
 * declare it and requeues them.
 *
 * @packageDocumentation
 */

import { declaredFields } from '../theory/completeness.js';
import type { TheoryRegistry } from '../theory/registry.js';
import type {
  FieldName,
  TheoryDescriptor,
  TheoryId,
  TheoryResult,
  UserInput,
} from '../theory/types.js';

interface CacheEntry {
  readonly result: TheoryResult;
  readonly inputKey: string;
}

/**
 * Stable key over the declared fields of a theory.
 */
export function inputKey(descriptor: TheoryDescriptor, input: UserInput): string {
  return JSON.stringify(declaredFields(descriptor).map((field) => [field, input[field] ?? null]));
}

export class ResultCache {
  private readonly entries = new Map<TheoryId, CacheEntry>();
  private readonly requeued = new Set<TheoryId>();

  /**
   * Cached result for the theory, if it was computed from the same input.
   */
  get(descriptor: TheoryDescriptor, input: UserInput): TheoryResult | undefined {
    const entry = this.entries.get(descriptor.id);
    if (entry === undefined || entry.inputKey !== inputKey(descriptor, input)) {
      return undefined;
    }
    return entry.result;
  }

  set(descriptor: TheoryDescriptor, input: UserInput, result: TheoryResult): void {
    this.entries.set(descriptor.id, { result, inputKey: inputKey(descriptor, input) });
    this.requeued.delete(descriptor.id);
  }

  has(id: TheoryId): boolean {
    return this.entries.has(id);
  }

  /**
   * Drops every entry whose theory declares the field.
   *
   * @returns Ids of the invalidated theories, now requeued.
   */
  invalidateField(field: FieldName, registry: TheoryRegistry): TheoryId[] {
    const invalidated: TheoryId[] = [];
    for (const id of [...this.entries.keys()]) {
      const descriptor = registry.tryGet(id);
      if (descriptor !== undefined && declaredFields(descriptor).includes(field)) {
        this.entries.delete(id);
        this.requeued.add(id);
        invalidated.push(id);
      }
    }
    return invalidated;
  }

  /** Theories invalidated and not yet recomputed. */
  requeuedIds(): TheoryId[] {
    return [...this.requeued];
  }

  clear(): void {
    this.entries.clear();
    this.requeued.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
