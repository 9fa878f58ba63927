import { describe, expect, test } from "vitest";

import { SchemaViolation } from "../errors";
import {
  bind,
  defineShape,
  extendShape,
  parserBinder,
  shapeBinder,
  tryBind,
  type Shape,
} from "../schema-binder";

const TagShape: Shape = defineShape({
  objectType: "Tag",
  mode: "unique",
  fields: ["label"],
});

const EntryShape: Shape = defineShape({
  objectType: "Entry",
  mode: "only",
  fields: ["key", "value"],
});

const ContainerShape: Shape = defineShape({
  objectType: "Container",
  mode: "unique",
  fields: ["id"],
  encoded: ["meta"],
  nested: {
    primary: shapeBinder(TagShape),
    meta: shapeBinder(EntryShape),
    upper: parserBinder((value, context) => {
      if (typeof value !== "string") {
        throw new Error(`${context} must be a string`);
      }
      return value.toUpperCase();
    }),
  },
  arrays: { tags: shapeBinder(TagShape) },
  forbidden: ["client"],
});

const expectViolation = (run: () => unknown): SchemaViolation => {
  try {
    run();
  } catch (error) {
    expect(error).toBeInstanceOf(SchemaViolation);
    if (error instanceof SchemaViolation) {
      return error;
    }
  }
  throw new Error("Expected a schema violation.");
};

describe("bind", () => {
  test("binds nested objects and arrays in order", () => {
    const bound = bind(ContainerShape, {
      id: "c1",
      primary: { label: "main" },
      tags: [{ label: "first" }, { label: "second", extra: 1 }],
      untouched: 42,
    });

    expect(bound.id).toBe("c1");
    expect(bound.primary).toEqual({ label: "main" });
    expect(bound.tags).toEqual([{ label: "first" }, { label: "second", extra: 1 }]);
    expect(bound.untouched).toBe(42);
  });

  test("passes unknown keys through in unique mode", () => {
    const bound = bind(TagShape, { label: "x", futureField: { nested: true } });
    expect(bound.futureField).toEqual({ nested: true });
  });

  test("rejects missing required keys in unique mode", () => {
    const violation = expectViolation(() => bind(TagShape, { other: 1 }));
    expect(violation.reason).toBe("MissingOrUnexpectedField");
    expect(violation.key).toBe("label");
    expect(violation.objectType).toBe("Tag");
  });

  test("rejects unexpected keys in only mode", () => {
    const violation = expectViolation(() => bind(EntryShape, { key: "k", value: "v", surprise: true }));
    expect(violation.reason).toBe("MissingOrUnexpectedField");
    expect(violation.key).toBe("surprise");
  });

  test("rejects missing keys in only mode", () => {
    const violation = expectViolation(() => bind(EntryShape, { key: "k" }));
    expect(violation.reason).toBe("MissingOrUnexpectedField");
    expect(violation.key).toBe("value");
  });

  test("rejects reserved keys before anything else", () => {
    const violation = expectViolation(() => bind(ContainerShape, { client: "spoofed" }));
    expect(violation.reason).toBe("ReservedKeyCollision");
    expect(violation.key).toBe("client");
  });

  test("decodes JSON-encoded fields before binding them", () => {
    const bound = bind(ContainerShape, { id: "c1", meta: JSON.stringify({ key: "k", value: 2 }) });
    expect(bound.meta).toEqual({ key: "k", value: 2 });
  });

  test("reports malformed encoded fields", () => {
    const violation = expectViolation(() => bind(ContainerShape, { id: "c1", meta: "{not json" }));
    expect(violation.reason).toBe("MalformedEncodedField");
    expect(violation.key).toBe("meta");
  });

  test("reports encoded fields that are not strings", () => {
    const violation = expectViolation(() => bind(ContainerShape, { id: "c1", meta: { key: "k", value: 2 } }));
    expect(violation.reason).toBe("MalformedEncodedField");
  });

  test("fails the whole bind on the first bad array element", () => {
    const violation = expectViolation(() =>
      bind(ContainerShape, { id: "c1", tags: [{ label: "ok" }, { nope: true }, { label: "never" }] }),
    );
    expect(violation.objectType).toBe("Tag");
    expect(violation.key).toBe("label");
  });

  test("rejects non-array values for array fields", () => {
    const violation = expectViolation(() => bind(ContainerShape, { id: "c1", tags: { label: "x" } }));
    expect(violation.reason).toBe("InvalidFieldType");
    expect(violation.key).toBe("tags");
  });

  test("wraps parser failures as invalid field types", () => {
    const violation = expectViolation(() => bind(ContainerShape, { id: "c1", upper: 5 }));
    expect(violation.reason).toBe("InvalidFieldType");
    expect(violation.key).toBe("upper");
    expect(violation.message).toBe("Container: Container.upper: Container.upper must be a string");
  });

  test("applies parsers to their fields", () => {
    expect(bind(ContainerShape, { id: "c1", upper: "abc" }).upper).toBe("ABC");
  });

  test("rejects payloads that are not objects", () => {
    expect(expectViolation(() => bind(TagShape, ["label"])).reason).toBe("InvalidFieldType");
    expect(expectViolation(() => bind(TagShape, null)).reason).toBe("InvalidFieldType");
  });

  test("does not mutate its input", () => {
    const raw = { id: "c1", meta: JSON.stringify({ key: "k", value: 1 }) };
    bind(ContainerShape, raw);
    expect(raw.meta).toBe('{"key":"k","value":1}');
  });
});

describe("tryBind", () => {
  test("returns the violation instead of throwing", () => {
    const result = tryBind(TagShape, {});
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe("MissingOrUnexpectedField");
    }
  });

  test("returns the bound record on success", () => {
    const result = tryBind(TagShape, { label: "x" });
    expect(result).toEqual({ ok: true, value: { label: "x" } });
  });
});

describe("extendShape", () => {
  test("accumulates fields, binders and reserved keys", () => {
    const extended = extendShape(ContainerShape, {
      objectType: "SpecialContainer",
      fields: ["kind"],
      forbidden: ["internal"],
    });

    expect(extended.fields).toEqual(["id", "kind"]);
    expect(extended.forbidden).toEqual(["client", "internal"]);
    expect(Object.keys(extended.nested ?? {})).toEqual(["primary", "meta", "upper"]);
    expect(expectViolation(() => bind(extended, { id: "c1" })).key).toBe("kind");
    expect(expectViolation(() => bind(extended, { id: "c1", kind: "k", internal: 1 })).reason).toBe(
      "ReservedKeyCollision",
    );
  });

  test("shapes are frozen", () => {
    expect(Object.isFrozen(ContainerShape)).toBe(true);
    expect(Object.isFrozen(ContainerShape.fields)).toBe(true);
  });
});
