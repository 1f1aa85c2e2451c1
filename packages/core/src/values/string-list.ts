import type { FlagValue } from "@greedyflags/sdk";

/**
 * Backing value of a greedy flag. Every `set` appends one element; nothing
 * ever clears the list, so values given with `-e=a` and `-e b c` accumulate.
 */
export class StringListValue implements FlagValue<string[]> {
  readonly kind = "greedy";
  readonly typeName = "string";
  private readonly items: string[];

  constructor(initial: readonly string[] = []) {
    this.items = [...initial];
  }

  get(): string[] {
    return [...this.items];
  }

  set(token: string): void {
    this.items.push(token);
  }

  /** `[a,b,c]`, or `[]` when empty. Elements are joined as-is. */
  render(): string {
    return `[${this.items.join(",")}]`;
  }
}
