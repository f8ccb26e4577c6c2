import { z } from "zod";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const INTEGER_TEXT = /^-?\d+$/;
const NUMBER_TEXT = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

function reviveKey(schema: z.ZodTypeAny, key: string): unknown {
  const inner = schema instanceof z.ZodEffects ? schema.innerType() : schema;
  if (inner instanceof z.ZodNumber && NUMBER_TEXT.test(key)) {
    return Number(key);
  }
  return reviveArguments(inner, key);
}

/**
 * Turns JSON-shaped arguments into the runtime shapes the zod declaration
 * expects: arrays become `Set`s, objects become `Map`s, ISO strings and epoch
 * numbers become `Date`s and integer strings become bigints. Contracts
 * advertise those declarations as their JSON counterparts, so callers can only
 * send the JSON form. Values that do not fit are returned unchanged for zod to
 * reject.
 */
export function reviveArguments(schema: z.ZodTypeAny, value: unknown): unknown {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return value === undefined || value === null ? value : reviveArguments(schema.unwrap(), value);
  }
  if (schema instanceof z.ZodDefault) {
    return value === undefined ? value : reviveArguments(schema.removeDefault(), value);
  }
  if (schema instanceof z.ZodEffects) {
    return reviveArguments(schema.innerType(), value);
  }
  if (schema instanceof z.ZodBranded || schema instanceof z.ZodReadonly) {
    return reviveArguments(schema.unwrap(), value);
  }
  if (schema instanceof z.ZodLazy) {
    return reviveArguments(schema.schema, value);
  }
  if (schema instanceof z.ZodPipeline) {
    return reviveArguments(schema._def.in, value);
  }
  if (schema instanceof z.ZodDate) {
    return typeof value === "string" || typeof value === "number" ? new Date(value) : value;
  }
  if (schema instanceof z.ZodBigInt) {
    if (typeof value === "string" && INTEGER_TEXT.test(value)) {
      return BigInt(value);
    }
    return typeof value === "number" && Number.isSafeInteger(value) ? BigInt(value) : value;
  }
  if (schema instanceof z.ZodSet) {
    const element: z.ZodTypeAny = schema._def.valueType;
    return Array.isArray(value) ? new Set(value.map((item: unknown) => reviveArguments(element, item))) : value;
  }
  if (schema instanceof z.ZodMap) {
    const keySchema: z.ZodTypeAny = schema.keySchema;
    const valueSchema: z.ZodTypeAny = schema.valueSchema;
    if (!isRecord(value)) {
      return value;
    }
    return new Map(
      Object.entries(value).map(([key, item]): [unknown, unknown] => [reviveKey(keySchema, key), reviveArguments(valueSchema, item)]),
    );
  }
  if (schema instanceof z.ZodArray) {
    const element: z.ZodTypeAny = schema.element;
    return Array.isArray(value) ? value.map((item: unknown) => reviveArguments(element, item)) : value;
  }
  if (schema instanceof z.ZodTuple) {
    const items: readonly z.ZodTypeAny[] = schema.items;
    return Array.isArray(value)
      ? value.map((item: unknown, index) => {
          const member = items[index];
          return member ? reviveArguments(member, item) : item;
        })
      : value;
  }
  if (schema instanceof z.ZodRecord) {
    const valueSchema: z.ZodTypeAny = schema.valueSchema;
    return isRecord(value)
      ? Object.fromEntries(Object.entries(value).map(([key, item]): [string, unknown] => [key, reviveArguments(valueSchema, item)]))
      : value;
  }
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    if (!isRecord(value)) {
      return value;
    }
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, unknown] => {
        const member = shape[key];
        return [key, member ? reviveArguments(member, item) : item];
      }),
    );
  }
  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    const options: readonly z.ZodTypeAny[] = schema.options;
    for (const option of options) {
      const candidate = reviveArguments(option, value);
      if (option.safeParse(candidate).success) {
        return candidate;
      }
    }
  }
  return value;
}
