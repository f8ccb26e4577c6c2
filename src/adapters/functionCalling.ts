import { z } from "zod";

import type { Catalog, CatalogSpec, ExecuteOptions } from "../catalog/catalog.js";
import { InvalidArgumentsError, NotFoundError } from "../catalog/errors.js";
import type { CallContract } from "../schema/contract.js";

/**
 * Tool definition in the JSON-Schema function-calling convention. Function
 * names may not contain dots there, so `weather.query` is exported as
 * `weather__query`.
 */
export interface FunctionTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: CallContract;
  };
}

export const FunctionCallSchema = z.object({
  name: z.string().min(1),
  /** JSON-encoded argument object, as emitted by function-calling models. */
  arguments: z.union([z.string(), z.record(z.unknown())]).default("{}"),
});

export type FunctionCall = z.input<typeof FunctionCallSchema>;

export interface FunctionCallOutput {
  name: string;
  tool: string;
  result: unknown;
}

const NAME_SEPARATOR = "__";

export function toFunctionName(toolName: string): string {
  return toolName.split(".").join(NAME_SEPARATOR);
}

export function toFunctionTool(spec: CatalogSpec): FunctionTool {
  return {
    type: "function",
    function: {
      name: toFunctionName(spec.name),
      description: spec.description,
      parameters: spec.inputContract,
    },
  };
}

/** Exports every catalog entry as a function-calling tool definition. */
export function toFunctionTools(catalog: Catalog): FunctionTool[] {
  return catalog.list().map(toFunctionTool);
}

/**
 * Resolves an exported function name back to its catalog entry. The lookup
 * goes through the catalog listing rather than reversing the separator so
 * names containing `__` themselves still resolve.
 */
export function resolveFunctionName(catalog: Catalog, functionName: string): string {
  if (catalog.has(functionName)) {
    return functionName;
  }
  const match = catalog.list().find((spec) => toFunctionName(spec.name) === functionName);
  if (!match) {
    throw new NotFoundError(functionName);
  }
  return match.name;
}

function decodeArguments(tool: string, raw: string | Record<string, unknown>): unknown {
  if (typeof raw !== "string") {
    return raw;
  }
  try {
    return JSON.parse(raw.trim() === "" ? "{}" : raw);
  } catch (error) {
    throw new InvalidArgumentsError(tool, [
      { path: "", message: `arguments are not valid JSON (${error instanceof Error ? error.message : String(error)})` },
    ]);
  }
}

/** Executes a function call emitted by a model against the catalog. */
export async function invokeFunctionCall(
  catalog: Catalog,
  call: FunctionCall,
  options: ExecuteOptions = {},
): Promise<FunctionCallOutput> {
  const parsed = FunctionCallSchema.parse(call);
  const tool = resolveFunctionName(catalog, parsed.name);
  const result = await catalog.execute(tool, decodeArguments(tool, parsed.arguments), options);
  return { name: parsed.name, tool, result: result.value };
}
