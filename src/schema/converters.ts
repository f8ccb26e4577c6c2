import { z } from "zod";

import type { ContractNode, EnumContract, JsonPrimitive, ObjectContract, PrimitiveType } from "./contract.js";
import { isEnumContract } from "./contract.js";

/** Handle given to converters so they can recurse into nested schemas. */
export interface ContractVisitor {
  convert(schema: z.ZodTypeAny, path: readonly string[]): ContractNode;
  /** Builds an object contract for a raw shape, honouring optional/default members. */
  convertShape(shape: z.ZodRawShape, path: readonly string[]): ObjectContract;
}

/**
 * One entry of the converter table. `tryConvert` returns `undefined` when the
 * schema is not of the family the converter understands.
 */
export interface ContractConverter {
  readonly name: string;
  tryConvert(schema: z.ZodTypeAny, path: readonly string[], visitor: ContractVisitor): ContractNode | undefined;
}

/** Builds a converter from a type guard and a conversion for the narrowed schema. */
export function defineConverter<S extends z.ZodTypeAny>(
  name: string,
  matches: (schema: z.ZodTypeAny) => schema is S,
  convert: (schema: S, path: readonly string[], visitor: ContractVisitor) => ContractNode | undefined,
): ContractConverter {
  return {
    name,
    tryConvert(schema, path, visitor) {
      return matches(schema) ? convert(schema, path, visitor) : undefined;
    },
  };
}

function instanceOf<S extends z.ZodTypeAny>(ctor: abstract new (...args: never[]) => S) {
  return (schema: z.ZodTypeAny): schema is S => schema instanceof ctor;
}

function isNullish(schema: z.ZodTypeAny): boolean {
  return schema instanceof z.ZodNull || schema instanceof z.ZodUndefined || schema instanceof z.ZodVoid;
}

/** Returns the primitive type shared by every literal, if any. */
export function sharedPrimitiveType(values: readonly JsonPrimitive[]): PrimitiveType | undefined {
  if (values.length === 0) {
    return undefined;
  }
  if (values.every((value) => typeof value === "string")) {
    return "string";
  }
  if (values.every((value) => typeof value === "boolean")) {
    return "boolean";
  }
  if (values.every((value) => typeof value === "number")) {
    return values.every((value) => Number.isInteger(value)) ? "integer" : "number";
  }
  return undefined;
}

export function enumContract(values: readonly JsonPrimitive[]): EnumContract {
  const unique: JsonPrimitive[] = [];
  for (const value of values) {
    if (!unique.includes(value)) {
      unique.push(value);
    }
  }
  const type = sharedPrimitiveType(unique);
  return type ? { type, enum: unique } : { enum: unique };
}

function asJsonPrimitive(value: unknown): JsonPrimitive | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return undefined;
}

export function withNullable(node: ContractNode): ContractNode {
  return node.nullable ? node : { ...node, nullable: true };
}

/**
 * Values of a TypeScript enum object. Numeric enums carry reverse mappings
 * (`{ 0: "Low", Low: 0 }`) whose string side is not a member value.
 */
function nativeEnumValues(enumObject: Record<string, string | number>): JsonPrimitive[] {
  return Object.values(enumObject).filter(
    (value) => typeof value === "number" || typeof enumObject[value] !== "number",
  );
}

function convertUnion(
  options: readonly z.ZodTypeAny[],
  path: readonly string[],
  visitor: ContractVisitor,
): ContractNode {
  const nullable = options.some(isNullish);
  const branches = options
    .filter((option) => !isNullish(option))
    .map((option, index) => visitor.convert(option, [...path, `oneOf[${index}]`]));

  if (branches.length === 0) {
    return enumContract([null]);
  }

  // Unions made only of closed value sets collapse into a single enumeration.
  if (branches.every((branch) => isEnumContract(branch) && !branch.nullable)) {
    const merged = enumContract(branches.flatMap((branch) => (isEnumContract(branch) ? branch.enum : [])));
    return nullable ? withNullable(merged) : merged;
  }

  const [single] = branches;
  if (branches.length === 1 && single) {
    return nullable ? withNullable(single) : single;
  }
  const node: ContractNode = { oneOf: branches };
  return nullable ? withNullable(node) : node;
}

/**
 * Built-in converter table. Order matters only for wrapper types, which must
 * be unwrapped before the leaf converters are consulted; leaf families are
 * disjoint.
 */
export const DEFAULT_CONVERTERS: readonly ContractConverter[] = [
  defineConverter("effects", instanceOf(z.ZodEffects), (schema, path, visitor) =>
    visitor.convert(schema.innerType(), path),
  ),
  defineConverter("optional", instanceOf(z.ZodOptional), (schema, path, visitor) =>
    visitor.convert(schema.unwrap(), path),
  ),
  defineConverter("nullable", instanceOf(z.ZodNullable), (schema, path, visitor) =>
    withNullable(visitor.convert(schema.unwrap(), path)),
  ),
  defineConverter("default", instanceOf(z.ZodDefault), (schema, path, visitor) => {
    const inner = visitor.convert(schema.removeDefault(), path);
    const fallback: unknown = schema._def.defaultValue();
    return { ...inner, default: fallback };
  }),
  defineConverter("branded", instanceOf(z.ZodBranded), (schema, path, visitor) =>
    visitor.convert(schema.unwrap(), path),
  ),
  defineConverter("readonly", instanceOf(z.ZodReadonly), (schema, path, visitor) =>
    visitor.convert(schema.unwrap(), path),
  ),
  defineConverter("string", instanceOf(z.ZodString), () => ({ type: "string" })),
  defineConverter("number", instanceOf(z.ZodNumber), (schema) => ({ type: schema.isInt ? "integer" : "number" })),
  defineConverter("boolean", instanceOf(z.ZodBoolean), () => ({ type: "boolean" })),
  defineConverter("null", instanceOf(z.ZodNull), () => enumContract([null])),
  defineConverter("literal", instanceOf(z.ZodLiteral), (schema) => {
    const value = asJsonPrimitive(schema.value);
    return value === undefined ? undefined : enumContract([value]);
  }),
  defineConverter("enum", instanceOf(z.ZodEnum), (schema) => enumContract(schema.options)),
  defineConverter("native-enum", instanceOf(z.ZodNativeEnum), (schema) => enumContract(nativeEnumValues(schema.enum))),
  defineConverter("array", instanceOf(z.ZodArray), (schema, path, visitor) => ({
    type: "array",
    items: visitor.convert(schema.element, [...path, "items"]),
  })),
  defineConverter("set", instanceOf(z.ZodSet), (schema, path, visitor) => ({
    type: "array",
    items: visitor.convert(schema._def.valueType, [...path, "items"]),
  })),
  defineConverter("record", instanceOf(z.ZodRecord), (schema, path, visitor) => ({
    type: "object",
    additionalProperties: visitor.convert(schema.valueSchema, [...path, "additionalProperties"]),
  })),
  defineConverter("map", instanceOf(z.ZodMap), (schema, path, visitor) => ({
    type: "object",
    additionalProperties: visitor.convert(schema.valueSchema, [...path, "additionalProperties"]),
  })),
  defineConverter("object", instanceOf(z.ZodObject), (schema, path, visitor) => visitor.convertShape(schema.shape, path)),
  defineConverter("union", instanceOf(z.ZodUnion), (schema, path, visitor) =>
    convertUnion(schema.options, path, visitor),
  ),
  defineConverter("discriminated-union", instanceOf(z.ZodDiscriminatedUnion), (schema, path, visitor) =>
    convertUnion(schema.options, path, visitor),
  ),
];
