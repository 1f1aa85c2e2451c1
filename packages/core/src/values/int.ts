import type { FlagValue } from "@greedyflags/sdk";
import { ErrorCode, ValueError } from "@greedyflags/sdk";

const INTEGER = /^[-+]?\d+$/;

/** Integer scalar. Shipped as the worked extension of the FlagValue contract. */
export class IntValue implements FlagValue<number> {
  readonly kind = "scalar";
  readonly typeName = "int";

  constructor(private current = 0) {}

  get(): number {
    return this.current;
  }

  set(token: string): void {
    const parsed = Number(token);
    if (!INTEGER.test(token) || !Number.isSafeInteger(parsed)) {
      throw new ValueError(token, `invalid integer value "${token}"`, ErrorCode.INVALID_INTEGER);
    }
    this.current = parsed;
  }

  render(): string {
    return String(this.current);
  }
}
