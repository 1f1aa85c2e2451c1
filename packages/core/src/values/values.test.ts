import { describe, it, expect } from "vitest";
import { ValueError } from "@greedyflags/sdk";
import { BooleanValue, IntValue, StringListValue, StringValue } from "./index.js";

describe("BooleanValue", () => {
  it.each(["1", "t", "T", "true", "TRUE", "True", "yes", "YES", "yEs"])("accepts %s as true", (token) => {
    const value = new BooleanValue(false);
    value.set(token);
    expect(value.get()).toBe(true);
  });

  it.each(["0", "f", "F", "false", "FALSE", "False", "no", "NO", "nO"])("accepts %s as false", (token) => {
    const value = new BooleanValue(true);
    value.set(token);
    expect(value.get()).toBe(false);
  });

  it("accepts only the exact spellings of the short literals", () => {
    const value = new BooleanValue();
    expect(() => value.set("tRUE")).toThrow(ValueError);
    expect(() => value.set("fALSE")).toThrow(ValueError);
  });

  it("rejects anything else and keeps the old value", () => {
    const value = new BooleanValue(true);
    expect(() => value.set("maybe")).toThrow(ValueError);
    expect(value.get()).toBe(true);
  });

  it("carries the rejected token and code", () => {
    const value = new BooleanValue();
    try {
      value.set("yep");
      expect.fail("set should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ValueError);
      if (err instanceof ValueError) {
        expect(err.token).toBe("yep");
        expect(err.code).toBe("INVALID_BOOLEAN");
      }
    }
  });

  it("renders true/false", () => {
    expect(new BooleanValue().render()).toBe("false");
    expect(new BooleanValue(true).render()).toBe("true");
  });
});

describe("StringValue", () => {
  it("replaces the stored text", () => {
    const value = new StringValue("initial");
    value.set("first");
    value.set("second");
    expect(value.get()).toBe("second");
    expect(value.render()).toBe("second");
  });

  it("is a scalar", () => {
    expect(new StringValue().kind).toBe("scalar");
  });
});

describe("StringListValue", () => {
  it("appends on every set", () => {
    const value = new StringListValue();
    value.set("go");
    value.set("mod");
    value.set("go");
    expect(value.get()).toEqual(["go", "mod", "go"]);
  });

  it("keeps defaults and appends after them", () => {
    const value = new StringListValue(["a"]);
    value.set("b");
    expect(value.get()).toEqual(["a", "b"]);
  });

  it("renders exactly the set values in insertion order", () => {
    const value = new StringListValue();
    expect(value.render()).toBe("[]");
    value.set("x y");
    value.set("z");
    expect(value.render()).toBe("[x y,z]");
  });

  it("returns copies from get()", () => {
    const value = new StringListValue(["a"]);
    value.get().push("mutated");
    expect(value.get()).toEqual(["a"]);
  });

  it("does not share the default array", () => {
    const defaults = ["a"];
    const value = new StringListValue(defaults);
    value.set("b");
    expect(defaults).toEqual(["a"]);
  });
});

describe("IntValue", () => {
  it("parses signed integers", () => {
    const value = new IntValue();
    value.set("-42");
    expect(value.get()).toBe(-42);
    value.set("+7");
    expect(value.get()).toBe(7);
    expect(value.render()).toBe("7");
  });

  it.each(["", "1.5", "0x10", "12abc", "99999999999999999999"])("rejects %j", (token) => {
    const value = new IntValue(3);
    expect(() => value.set(token)).toThrow('invalid integer value "' + token + '"');
    expect(value.get()).toBe(3);
  });
});
