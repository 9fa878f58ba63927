import { SchemaViolation, toError } from "./errors";

export type BoundRecord = Readonly<Record<string, unknown>>;

/**
 * How a field is converted once its raw value has been decoded. `shape` binds
 * a nested object, `parser` hands the value to a custom parser such as the
 * location grammar.
 */
export type FieldBinder =
  | { readonly kind: "shape"; readonly shape: Shape }
  | { readonly kind: "parser"; readonly parse: (value: unknown, context: string) => unknown };

/**
 * `unique` checks only that the listed keys are present and passes unknown
 * keys through. `only` requires the payload to carry exactly the listed keys.
 */
export type ShapeMode = "unique" | "only";

export interface Shape {
  readonly objectType: string;
  readonly mode: ShapeMode;
  readonly fields: readonly string[];
  readonly encoded?: readonly string[];
  readonly nested?: Readonly<Record<string, FieldBinder>>;
  readonly arrays?: Readonly<Record<string, FieldBinder>>;
  readonly forbidden?: readonly string[];
}

export interface ShapeExtension {
  readonly objectType: string;
  readonly mode?: ShapeMode;
  readonly fields?: readonly string[];
  readonly encoded?: readonly string[];
  readonly nested?: Readonly<Record<string, FieldBinder>>;
  readonly arrays?: Readonly<Record<string, FieldBinder>>;
  readonly forbidden?: readonly string[];
}

export type BindResult =
  | { readonly ok: true; readonly value: BoundRecord }
  | { readonly ok: false; readonly error: SchemaViolation };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const hasOwn = (record: Record<string, unknown>, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key);

const freezeList = <T>(values: readonly T[] | undefined): readonly T[] =>
  Object.freeze([...(values ?? [])]);

const freezeMap = (
  values: Readonly<Record<string, FieldBinder>> | undefined,
): Readonly<Record<string, FieldBinder>> => Object.freeze({ ...(values ?? {}) });

export const defineShape = (shape: Shape): Shape =>
  Object.freeze({
    objectType: shape.objectType,
    mode: shape.mode,
    fields: freezeList(shape.fields),
    encoded: freezeList(shape.encoded),
    nested: freezeMap(shape.nested),
    arrays: freezeMap(shape.arrays),
    forbidden: freezeList(shape.forbidden),
  });

/** Derives a shape from a base one, adding fields and binders on top. */
export const extendShape = (base: Shape, extension: ShapeExtension): Shape =>
  defineShape({
    objectType: extension.objectType,
    mode: extension.mode ?? base.mode,
    fields: [...base.fields, ...(extension.fields ?? [])],
    encoded: [...(base.encoded ?? []), ...(extension.encoded ?? [])],
    nested: { ...base.nested, ...extension.nested },
    arrays: { ...base.arrays, ...extension.arrays },
    forbidden: [...(base.forbidden ?? []), ...(extension.forbidden ?? [])],
  });

export const shapeBinder = (shape: Shape): FieldBinder => ({ kind: "shape", shape });

export const parserBinder = (
  parse: (value: unknown, context: string) => unknown,
): FieldBinder => ({ kind: "parser", parse });

const checkForbiddenKeys = (shape: Shape, raw: Record<string, unknown>): void => {
  for (const key of shape.forbidden ?? []) {
    if (hasOwn(raw, key)) {
      throw new SchemaViolation(
        "ReservedKeyCollision",
        shape.objectType,
        key,
        `payload key "${key}" collides with a reserved field`,
      );
    }
  }
};

const checkFieldSet = (shape: Shape, raw: Record<string, unknown>): void => {
  if (shape.mode === "only") {
    for (const key of Object.keys(raw)) {
      if (!shape.fields.includes(key)) {
        throw new SchemaViolation(
          "MissingOrUnexpectedField",
          shape.objectType,
          key,
          `unexpected key "${key}"`,
        );
      }
    }
  }

  for (const key of shape.fields) {
    if (!hasOwn(raw, key)) {
      throw new SchemaViolation(
        "MissingOrUnexpectedField",
        shape.objectType,
        key,
        `missing required key "${key}"`,
      );
    }
  }
};

const decodeField = (shape: Shape, key: string, value: unknown): unknown => {
  if (!(shape.encoded ?? []).includes(key)) {
    return value;
  }
  if (typeof value !== "string") {
    throw new SchemaViolation(
      "MalformedEncodedField",
      shape.objectType,
      key,
      `key "${key}" must be a JSON-encoded string`,
    );
  }
  try {
    return JSON.parse(value) as unknown;
  } catch (error) {
    throw new SchemaViolation(
      "MalformedEncodedField",
      shape.objectType,
      key,
      `key "${key}" is not valid JSON`,
      { cause: error },
    );
  }
};

const applyBinder = (
  binder: FieldBinder,
  value: unknown,
  owner: Shape,
  key: string,
  context: string,
): unknown => {
  if (binder.kind === "shape") {
    return bind(binder.shape, value);
  }
  try {
    return binder.parse(value, context);
  } catch (error) {
    if (error instanceof SchemaViolation) {
      throw error;
    }
    throw new SchemaViolation(
      "InvalidFieldType",
      owner.objectType,
      key,
      `${context}: ${toError(error).message}`,
      { cause: error },
    );
  }
};

const bindField = (shape: Shape, key: string, rawValue: unknown): unknown => {
  const value = decodeField(shape, key, rawValue);

  const nested = shape.nested?.[key];
  if (nested) {
    if (nested.kind === "shape" && !isRecord(value)) {
      throw new SchemaViolation(
        "InvalidFieldType",
        shape.objectType,
        key,
        `key "${key}" must be an object`,
      );
    }
    return applyBinder(nested, value, shape, key, `${shape.objectType}.${key}`);
  }

  const element = shape.arrays?.[key];
  if (element) {
    if (!Array.isArray(value)) {
      throw new SchemaViolation(
        "InvalidFieldType",
        shape.objectType,
        key,
        `key "${key}" must be an array`,
      );
    }
    return value.map((entry: unknown, index) =>
      applyBinder(element, entry, shape, key, `${shape.objectType}.${key}[${index}]`),
    );
  }

  return value;
};

/**
 * Validates `raw` against `shape` and returns a fresh record with nested and
 * array fields converted. Throws `SchemaViolation` without producing a
 * partial record.
 */
export const bind = (shape: Shape, raw: unknown): BoundRecord => {
  if (!isRecord(raw)) {
    throw new SchemaViolation(
      "InvalidFieldType",
      shape.objectType,
      null,
      "payload must be an object",
    );
  }

  checkForbiddenKeys(shape, raw);
  checkFieldSet(shape, raw);

  const bound: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    bound[key] = bindField(shape, key, value);
  }
  return bound;
};

export const tryBind = (shape: Shape, raw: unknown): BindResult => {
  try {
    return { ok: true, value: bind(shape, raw) };
  } catch (error) {
    if (error instanceof SchemaViolation) {
      return { ok: false, error };
    }
    throw error;
  }
};
