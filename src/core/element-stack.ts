/**
 * Element Stack
 *
 * LIFO record of elements that have been opened but not yet closed. Its size
 * is the current nesting depth. One stack lives for one formatting run.
 */

export class ElementStack {
  private readonly open: string[] = [];

  get depth(): number {
    return this.open.length;
  }

  isEmpty(): boolean {
    return this.open.length === 0;
  }

  push(name: string): void {
    this.open.push(name);
  }

  /** Name of the innermost open element, or null when nothing is open. */
  peek(): string | null {
    return this.open[this.open.length - 1] ?? null;
  }

  pop(): string | null {
    return this.open.pop() ?? null;
  }

  /** Open element names, innermost first. */
  names(): string[] {
    return [...this.open].reverse();
  }
}
