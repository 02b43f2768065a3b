/**
 * Keyed store of the executions a supervisor currently owns.
 *
 * Every method is synchronous, so on Node's event loop a cancel and a natural-exit
 * cleanup can never interleave inside one call. `remove` reports whether this call
 * took the entry out; only that caller may move the execution to a terminal state.
 */
export class ExecutionRegistry<T> {
  private readonly entries = new Map<string, T>();

  insert(id: string, entry: T): void {
    if (this.entries.has(id)) throw new Error(`execution already registered: ${id}`);
    this.entries.set(id, entry);
  }

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  remove(id: string): boolean {
    return this.entries.delete(id);
  }

  get size(): number {
    return this.entries.size;
  }

  values(): T[] {
    return Array.from(this.entries.values());
  }
}
