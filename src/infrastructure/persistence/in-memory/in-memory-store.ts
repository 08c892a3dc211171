/**
 * Map-backed storage for the in-process repositories. Rows are keyed by their
 * numeric id and handed out as copies so callers cannot mutate stored state.
 */
export abstract class InMemoryStore<T extends { id: number }> {
  private store: Map<number, T> = new Map();
  private sequence = 0;

  protected nextId(): number {
    this.sequence += 1;
    return this.sequence;
  }

  protected get(id: number): T | undefined {
    const value = this.store.get(id);
    return value ? this.copy(value) : undefined;
  }

  protected set(value: T): void {
    this.store.set(value.id, this.copy(value));
  }

  protected remove(id: number): void {
    this.store.delete(id);
  }

  protected values(): T[] {
    return [...this.store.values()].map((value) => this.copy(value));
  }

  protected abstract copy(value: T): T;
}
