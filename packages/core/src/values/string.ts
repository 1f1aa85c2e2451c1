import type { FlagValue } from "@greedyflags/sdk";

export class StringValue implements FlagValue<string> {
  readonly kind = "scalar";
  readonly typeName = "string";

  constructor(private current = "") {}

  get(): string {
    return this.current;
  }

  set(token: string): void {
    this.current = token;
  }

  render(): string {
    return this.current;
  }
}
