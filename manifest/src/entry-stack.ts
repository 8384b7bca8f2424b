/**
 * Last-in-first-out buffer of pending manifest entries
 *
 * A generation step pushes its entries in emission order; consumers
 * receive them newest first.
 */
export class EntryStack<T> {
  private readonly items: T[] = [];

  push(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the most recently pushed item
   */
  pop(): T | undefined {
    return this.items.pop();
  }

  peek(): T | undefined {
    return this.items[this.items.length - 1];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Remove every item, returned in pop order
   */
  drain(): T[] {
    return this.items.splice(0).reverse();
  }
}
