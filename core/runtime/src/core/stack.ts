/**
 * Array-backed LIFO. `pop` and `peek` return `undefined` on an empty stack;
 * callers decide what that means.
 */
export class Stack<T> {
  private items: T[] = [];

  push(x: T): void {
    this.items.push(x);
  }

  pop(): T | undefined {
    return this.items.pop();
  }

  peek(): T | undefined {
    return this.items[this.items.length - 1];
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Bottom first. */
  toArray(): readonly T[] {
    return [...this.items];
  }
}
