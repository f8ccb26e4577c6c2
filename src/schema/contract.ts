/**
 * Call contracts are the JSON-Schema-like trees advertised to clients and used
 * to validate arguments before a tool runs. Nodes are plain JSON objects so a
 * contract can be sent over the wire as-is; the guards below recover the
 * variant from its shape.
 */
export type PrimitiveType = "string" | "number" | "integer" | "boolean";

export type JsonPrimitive = string | number | boolean | null;

/** Annotations any node may carry. */
export interface ContractAnnotations {
  readonly description?: string;
  readonly default?: unknown;
  readonly nullable?: true;
  /** Set when no converter understood the declared type and a string was used instead. */
  readonly "x-degraded"?: true;
}

export interface PrimitiveContract extends ContractAnnotations {
  readonly type: PrimitiveType;
}

export interface ArrayContract extends ContractAnnotations {
  readonly type: "array";
  readonly items: ContractNode;
}

export interface ObjectContract extends ContractAnnotations {
  readonly type: "object";
  readonly properties: Readonly<Record<string, ContractNode>>;
  readonly required: readonly string[];
  readonly additionalProperties: false;
}

/** Keyed mapping with arbitrary string keys and homogeneous values. */
export interface MapContract extends ContractAnnotations {
  readonly type: "object";
  readonly additionalProperties: ContractNode;
}

export interface OneOfContract extends ContractAnnotations {
  readonly oneOf: readonly ContractNode[];
}

export interface EnumContract extends ContractAnnotations {
  readonly type?: PrimitiveType;
  readonly enum: readonly JsonPrimitive[];
}

export type ContractNode =
  | PrimitiveContract
  | ArrayContract
  | ObjectContract
  | MapContract
  | OneOfContract
  | EnumContract;

/** Contract describing the argument object of a tool. */
export type CallContract = ObjectContract;

export function isEnumContract(node: ContractNode): node is EnumContract {
  return "enum" in node;
}

export function isOneOfContract(node: ContractNode): node is OneOfContract {
  return "oneOf" in node;
}

export function isArrayContract(node: ContractNode): node is ArrayContract {
  return "items" in node;
}

export function isObjectContract(node: ContractNode): node is ObjectContract {
  return "properties" in node;
}

export function isMapContract(node: ContractNode): node is MapContract {
  return !("properties" in node) && "additionalProperties" in node;
}

/** Recursively freezes a derived contract so consumers cannot mutate the shared tree. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}
