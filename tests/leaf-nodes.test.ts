import { describe, it, expect } from "vitest";
import { createNode } from "../src/SchemaBuilder.js";

describe("StringNode", () => {
  it("checks length bounds", () => {
    const node = createNode("string", { minLength: 2, maxLength: 4 });

    expect(node.validate("abc").valid).toBe(true);
    expect(node.validate("a").errors).toEqual([
      { path: "/", message: "String is too short (1 < 2)." },
    ]);
    expect(node.validate("abcde").errors).toEqual([
      { path: "/", message: "String is too long (5 > 4)." },
    ]);
  });

  it("checks the pattern", () => {
    const node = createNode("string", { pattern: "^[a-z]+-\\d+$" });

    expect(node.validate("item-12").valid).toBe(true);
    expect(node.validate("Item-12").errors).toEqual([
      { path: "/", message: 'String does not match pattern "^[a-z]+-\\d+$".' },
    ]);
  });
});

describe("NumberNode and IntegerNode", () => {
  it("rejects non-finite numbers", () => {
    const node = createNode("number");

    expect(node.validate(Number.NaN).valid).toBe(false);
    expect(node.validate(Number.POSITIVE_INFINITY).valid).toBe(false);
    expect(node.validate(-0.5).valid).toBe(true);
  });

  it("accepts decimal multiples", () => {
    const node = createNode("number", { multipleOf: 0.1 });

    expect(node.validate(0.3).valid).toBe(true);
    expect(node.validate(1.7).valid).toBe(true);
    expect(node.validate(0.35).errors).toEqual([
      { path: "/", message: "Value must be a multiple of 0.1." },
    ]);
  });

  it("checks bounds and multiples", () => {
    const node = createNode("integer", { minimum: 0, maximum: 100, multipleOf: 5 });

    expect(node.validate(25).valid).toBe(true);
    expect(node.validate(-5).errors).toEqual([
      { path: "/", message: "Value must have a minimum of 0." },
    ]);
    expect(node.validate(102).errors).toEqual([
      { path: "/", message: "Value must have a maximum of 100." },
      { path: "/", message: "Value must be a multiple of 5." },
    ]);
  });

  it("accepts only integers on integer nodes", () => {
    expect(createNode("integer").validate(1.5).errors).toEqual([
      { path: "/", message: 'Invalid type, expected "integer".' },
    ]);
  });
});

describe("ObjectNode", () => {
  const person = () =>
    createNode("object", {}, (s) => {
      s.add("string", { name: "name", required: true });
      s.add("integer", { name: "age", minimum: 0 });
      s.add("string", { name: "role", default: "member", enum: ["member", "admin"] });
    });

  it("validates each property under its own path", () => {
    expect(person().validate({ age: "x", role: "owner" }).errors).toEqual([
      { path: "/name", message: "Value must be given." },
      { path: "/age", message: 'Invalid type, expected "integer".' },
      { path: "/role", message: 'Value not included in enum ["member", "admin"].' },
    ]);
  });

  it("rejects undeclared properties unless additional properties are allowed", () => {
    expect(person().validate({ name: "Ada", nickname: "A" }).errors).toEqual([
      { path: "/", message: 'Obsolete property "nickname".' },
    ]);

    const open = createNode("object", { additionalProperties: true }, (s) => {
      s.add("string", { name: "name" });
    });
    expect(open.validate({ name: "Ada", nickname: "A" }).valid).toBe(true);
  });

  it("rejects arrays and class instances", () => {
    expect(person().validate([]).errors).toEqual([
      { path: "/", message: 'Invalid type, expected "object".' },
    ]);
    expect(person().validate(new Date(0)).valid).toBe(false);
  });

  it("treats inherited members as absent properties", () => {
    const node = createNode("object", {}, (s) => {
      s.add("string", { name: "toString" });
      s.add("string", { name: "constructor", required: true });
    });

    expect(node.validate({}).errors).toEqual([
      { path: "/constructor", message: "Value must be given." },
    ]);
    expect(node.validateOrFail({ constructor: "Ada" })).toEqual({
      constructor: "Ada",
    });
  });

  it("fills property defaults without touching the input", () => {
    const input = { name: "Ada" };

    expect(person().validateOrFail(input)).toEqual({ name: "Ada", role: "member" });
    expect(input).toEqual({ name: "Ada" });
  });
});

describe("ArrayNode", () => {
  it("validates each element under its index", () => {
    const node = createNode("array", {}, (s) => {
      s.add("object", {}, (o) => {
        o.add("integer", { name: "id", required: true });
      });
    });

    expect(node.validate([{ id: 1 }, {}, { id: "3" }]).errors).toEqual([
      { path: "/1/id", message: "Value must be given." },
      { path: "/2/id", message: 'Invalid type, expected "integer".' },
    ]);
  });

  it("checks the item count and uniqueness", () => {
    const node = createNode("array", { minItems: 2, maxItems: 3, unique: true });

    expect(node.validate([1]).errors).toEqual([
      { path: "/", message: "Array has 1 items but needs at least 2." },
    ]);
    expect(node.validate([1, 2, 3, 4]).errors).toEqual([
      { path: "/", message: "Array has 4 items but needs at most 3." },
    ]);
    expect(node.validate([{ a: 1 }, { a: 1 }]).errors).toEqual([
      { path: "/", message: "Array has duplicate items." },
    ]);
  });

  it("accepts any elements without an item schema", () => {
    expect(createNode("array").validate([1, "a", null]).valid).toBe(true);
  });

  it("casts each element", () => {
    const node = createNode("array", {}, (s) => {
      s.add("string", { default: "n/a" });
    });

    expect(node.validateOrFail(["a", null])).toEqual(["a", "n/a"]);
  });
});
