import { describe, it, expect, afterEach } from "vitest";
import { SchemaDefinitionError } from "../src/errors.js";
import { createNode } from "../src/SchemaBuilder.js";
import { defaultNodes, registerNode, resolveNode } from "../src/NodeRegistry.js";
import { AnyOfNode } from "../src/nodes/AnyOfNode.js";
import { IntegerNode } from "../src/nodes/IntegerNode.js";
import { StringNode } from "../src/nodes/StringNode.js";
import { ValidationResult } from "../src/ValidationResult.js";

class EvenNode extends IntegerNode {
  get type(): string {
    return "even";
  }

  _validate(data: unknown, result: ValidationResult): unknown {
    const value = super._validate(data, result);
    if (typeof value === "number" && value % 2 !== 0) {
      result.error("Value must be even.");
    }
    return value;
  }
}

describe("Node construction", () => {
  afterEach(() => {
    delete defaultNodes["even"];
  });

  it("rejects unknown options with their names", () => {
    expect(() => createNode("string", { foo: 1, bar: 2 })).toThrowError(
      new SchemaDefinitionError('Options ["foo", "bar"] are not allowed for this node.')
    );
  });

  it("rejects options of the wrong type", () => {
    expect(() => createNode("boolean", { required: "yes" })).toThrowError(
      'Invalid option "required" for this node: Expected boolean, received string.'
    );
  });

  it("rejects invalid patterns at build time", () => {
    expect(() => createNode("string", { pattern: "(" })).toThrowError(
      'Invalid option "pattern" for this node: Invalid regular expression.'
    );
  });

  it("rejects contradictory bounds", () => {
    expect(() => createNode("string", { minLength: 3, maxLength: 1 })).toThrowError(
      "Option minLength can't be greater than maxLength."
    );
    expect(() => createNode("number", { minimum: 3, maximum: 1 })).toThrowError(
      "Option minimum can't be greater than maximum."
    );
    expect(() => createNode("array", { minItems: 3, maxItems: 1 })).toThrowError(
      "Option minItems can't be greater than maxItems."
    );
  });

  it.each(["any_of", "one_of", "all_of"])(
    "fails to build %s without items",
    (type) => {
      expect(() => createNode(type)).toThrowError(
        `Node "${type}" makes only sense with at least 1 item.`
      );
      expect(() => createNode(type, {}, () => {})).toThrowError(
        SchemaDefinitionError
      );
    }
  );

  it("fails for unknown type tags", () => {
    expect(() => createNode("uuid")).toThrowError(
      'Could not find node for type "uuid".'
    );
    expect(() => resolveNode("toString")).toThrowError(
      'Could not find node for type "toString".'
    );
  });

  it("refuses children on scalar nodes", () => {
    expect(() => createNode("boolean", {}, () => {})).toThrowError(
      'Node "boolean" does not support children.'
    );
  });

  it("freezes the children once finalized", () => {
    const node = createNode("any_of", {}, (s) => {
      s.add("string");
    });

    expect(node.isFinalized).toBe(true);
    expect(Object.isFrozen(node.children)).toBe(true);
    expect(() => node.attach(createNode("integer"))).toThrowError(
      'Node "any_of" is finalized and cannot take more children.'
    );
  });

  it("does not let a node belong to two parents", () => {
    const shared = createNode("string");
    createNode("any_of", {}, (s) => {
      s.add(shared);
    });

    expect(() =>
      createNode("one_of", {}, (s) => {
        s.add(shared);
      })
    ).toThrowError('Node "string" already belongs to another node.');
  });

  it("requires named, unique object properties", () => {
    expect(() =>
      createNode("object", {}, (s) => {
        s.add("string");
      })
    ).toThrowError("Child nodes of an object must have a name.");

    expect(() =>
      createNode("object", {}, (s) => {
        s.add("string", { name: "a" });
        s.add("integer", { name: "a" });
      })
    ).toThrowError('Property "a" is defined more than once.');
  });

  it("accepts a single item schema on arrays", () => {
    expect(() =>
      createNode("array", {}, (s) => {
        s.add("string");
        s.add("integer");
      })
    ).toThrowError('Node "array" accepts only one item schema.');
  });

  it("requires finalization before validation", () => {
    const node = new AnyOfNode();

    expect(() => node.validate("a")).toThrowError(
      'Node "any_of" must be finalized before validation.'
    );

    node.addItem(new StringNode());
    expect(node.finalize().validate("a").valid).toBe(true);
  });

  it("builds nodes from registered classes and class references", () => {
    registerNode("even", EvenNode);

    const node = createNode("any_of", {}, (s) => {
      s.add("even", { minimum: 0 });
      s.add(StringNode, { maxLength: 1 });
    });

    expect(node.validate(4).valid).toBe(true);
    expect(node.validate("a").valid).toBe(true);
    expect(node.validate(3).errors).toEqual([
      { path: "/", message: "Does not match any anyOf condition." },
    ]);
    expect(createNode("even").validate(5).errors).toEqual([
      { path: "/", message: "Value must be even." },
    ]);
  });

  it("keeps metadata options without validation effect", () => {
    const node = createNode("string", {
      name: "title",
      description: "Document title",
      example: "Annual report",
    });

    expect(node.name).toBe("title");
    expect(node.description).toBe("Document title");
    expect(node.example).toBe("Annual report");
    expect(node.validate("x").valid).toBe(true);
  });
});
