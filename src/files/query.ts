import type { Param } from "../store/postgres.js";

// ParamBuilder hands out $n placeholders in the order values are bound.
export class ParamBuilder {
  params: Param[] = [];
  private n = 0;

  add(v: Param): string {
    this.n++;
    this.params.push(v);
    return `$${this.n}`;
  }

  /** Binds values whose placeholders were already rendered from `count`. */
  addAll(values: Param[]): void {
    for (const v of values) this.add(v);
  }

  get count(): number {
    return this.n;
  }
}
