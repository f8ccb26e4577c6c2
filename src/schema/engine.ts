import type { z } from "zod";

import { SchemaDegradedWarning } from "../catalog/errors.js";
import type { CallContract, ContractNode, ObjectContract } from "./contract.js";
import { deepFreeze } from "./contract.js";
import { type ContractConverter, type ContractVisitor, DEFAULT_CONVERTERS } from "./converters.js";

/** Result of a derivation: the frozen contract plus the degradations encountered. */
export interface Derivation<T extends ContractNode> {
  readonly contract: T;
  readonly warnings: readonly SchemaDegradedWarning[];
}

export interface SchemaEngineOptions {
  /**
   * Converter table consulted in order. Custom converters are usually
   * prepended to {@link DEFAULT_CONVERTERS} so they win over built-ins.
   */
  readonly converters?: readonly ContractConverter[];
}

/**
 * Derives call contracts from zod schemas. The engine is a pure function of
 * the schema's static shape: deriving twice yields structurally identical,
 * deeply frozen trees with the same key order.
 */
export class SchemaEngine {
  private readonly converters: readonly ContractConverter[];

  constructor(options: SchemaEngineOptions = {}) {
    this.converters = options.converters ?? DEFAULT_CONVERTERS;
  }

  /** Derives the argument contract for a parameter shape such as `{ a: z.number().int() }`. */
  deriveContract(shape: z.ZodRawShape): Derivation<CallContract> {
    const warnings: SchemaDegradedWarning[] = [];
    const contract = this.createVisitor(warnings).convertShape(shape, []);
    return { contract: deepFreeze(contract), warnings };
  }

  /** Derives the contract of a single value, used for declared return types. */
  deriveValueContract(schema: z.ZodTypeAny): Derivation<ContractNode> {
    const warnings: SchemaDegradedWarning[] = [];
    const contract = this.createVisitor(warnings).convert(schema, []);
    return { contract: deepFreeze(contract), warnings };
  }

  private createVisitor(warnings: SchemaDegradedWarning[]): ContractVisitor {
    const converters = this.converters;
    const visitor: ContractVisitor = {
      convert(schema, path) {
        let node: ContractNode | undefined;
        for (const converter of converters) {
          node = converter.tryConvert(schema, path, visitor);
          if (node) {
            break;
          }
        }
        if (!node) {
          warnings.push(new SchemaDegradedWarning(path, schema.constructor.name));
          node = { type: "string", "x-degraded": true };
        }
        if (schema.description !== undefined && node.description === undefined) {
          node = { ...node, description: schema.description };
        }
        return node;
      },
      convertShape(shape, path) {
        const properties: Record<string, ContractNode> = {};
        const required: string[] = [];
        for (const [key, member] of Object.entries(shape)) {
          properties[key] = visitor.convert(member, [...path, key]);
          if (!member.isOptional()) {
            required.push(key);
          }
        }
        const contract: ObjectContract = {
          type: "object",
          properties,
          required,
          additionalProperties: false,
        };
        return contract;
      },
    };
    return visitor;
  }
}

const defaultEngine = new SchemaEngine();

/** Derives an argument contract with the built-in converter table. */
export function deriveContract(shape: z.ZodRawShape): Derivation<CallContract> {
  return defaultEngine.deriveContract(shape);
}

export function deriveValueContract(schema: z.ZodTypeAny): Derivation<ContractNode> {
  return defaultEngine.deriveValueContract(schema);
}
