import type { FlagValue } from "@greedyflags/sdk";
import { ErrorCode, ValueError } from "@greedyflags/sdk";

const TRUTHY = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSY = new Set(["0", "f", "F", "FALSE", "false", "False"]);

export class BooleanValue implements FlagValue<boolean> {
  readonly kind = "boolean";
  readonly typeName = "bool";

  constructor(private current = false) {}

  get(): boolean {
    return this.current;
  }

  set(token: string): void {
    const lower = token.toLowerCase();
    if (TRUTHY.has(token) || lower === "yes") {
      this.current = true;
    } else if (FALSY.has(token) || lower === "no") {
      this.current = false;
    } else {
      throw new ValueError(token, `invalid boolean value "${token}"`, ErrorCode.INVALID_BOOLEAN);
    }
  }

  render(): string {
    return String(this.current);
  }
}
