/**
 * Single-assignment cell for a value computed on first access. A failing
 * compute leaves the cell empty so the error is raised again on the next read.
 */
export class Lazy<T> {
  private cell: { readonly value: T } | undefined;

  constructor(private readonly compute: () => T) {}

  get(): T {
    if (this.cell === undefined) {
      this.cell = { value: this.compute() };
    }
    return this.cell.value;
  }

  get isComputed(): boolean {
    return this.cell !== undefined;
  }
}
