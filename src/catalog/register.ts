import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { PipelineContext } from "../pipeline/context.js";
import type { ContractNode } from "../schema/contract.js";
import { SchemaEngine } from "../schema/engine.js";
import { reviveArguments } from "../schema/revive.js";
import { type Catalog, type CatalogSpec, type Invocable, type InvocationExtras, getDefaultCatalog } from "./catalog.js";
import { InvalidArgumentsError, type SchemaDegradedWarning } from "./errors.js";
import { normaliseMetadata, type ToolMetadataInput } from "./metadata.js";

/** Declarative description of a tool or pipeline. */
export interface ToolDefinition<Shape extends z.ZodRawShape> {
  readonly name: string;
  readonly description: string;
  /** Parameter declarations; the handler's argument type is inferred from them. */
  readonly params: Shape;
  /** Optional declaration of the returned value, advertised as the output contract. */
  readonly returns?: z.ZodTypeAny;
  readonly metadata?: ToolMetadataInput;
  readonly tags?: readonly string[];
}

export type ToolArgs<Shape extends z.ZodRawShape> = z.output<z.ZodObject<Shape, "strip">>;

export type ToolHandler<Shape extends z.ZodRawShape, R> = (args: ToolArgs<Shape>, extras: InvocationExtras) => R;

export type PipelineBody<Shape extends z.ZodRawShape, R> = (context: PipelineContext, args: ToolArgs<Shape>) => R;

export interface RegistrationOptions {
  /** Target catalog; the process-wide default when omitted. */
  readonly catalog?: Catalog;
  readonly engine?: SchemaEngine;
  /** Receives schema degradation warnings. Without one they go to `process.emitWarning`. */
  readonly logger?: Pick<StructuredLogger, "warn">;
}

const sharedEngine = new SchemaEngine();

/** Derives contracts and normalises metadata for a definition without registering it. */
export function buildSpec<Shape extends z.ZodRawShape>(
  kind: CatalogSpec["kind"],
  definition: ToolDefinition<Shape>,
  engine: SchemaEngine = sharedEngine,
): { spec: CatalogSpec; warnings: readonly SchemaDegradedWarning[] } {
  const input = engine.deriveContract(definition.params);
  const output = definition.returns ? engine.deriveValueContract(definition.returns) : undefined;
  const outputContract: ContractNode | undefined = output?.contract;
  const spec: CatalogSpec = {
    kind,
    name: definition.name,
    description: definition.description,
    inputContract: input.contract,
    ...(outputContract ? { outputContract } : {}),
    metadata: normaliseMetadata(definition.metadata, definition.tags),
  };
  return { spec, warnings: [...input.warnings, ...(output?.warnings ?? [])] };
}

function reportWarnings(name: string, warnings: readonly SchemaDegradedWarning[], options: RegistrationOptions): void {
  for (const warning of warnings) {
    if (options.logger) {
      options.logger.warn("schema_degraded", { tool: name, path: warning.path.join("."), type: warning.declaredType });
    } else {
      process.emitWarning(warning);
    }
  }
}

/**
 * Parses contract-valid arguments with the declared zod shape so handlers
 * receive defaults and transforms applied. JSON forms of sets, maps, dates and
 * bigints are revived first. Refinements the contract cannot express surface
 * as {@link InvalidArgumentsError}.
 */
function parseArguments<Shape extends z.ZodRawShape>(
  name: string,
  schema: z.ZodObject<Shape, "strip">,
  args: Record<string, unknown>,
): ToolArgs<Shape> {
  const parsed = schema.safeParse(reviveArguments(schema, args));
  if (!parsed.success) {
    throw new InvalidArgumentsError(
      name,
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  return parsed.data;
}

function registerDefinition<Shape extends z.ZodRawShape>(
  kind: CatalogSpec["kind"],
  definition: ToolDefinition<Shape>,
  options: RegistrationOptions,
  createInvocable: (catalog: Catalog, schema: z.ZodObject<Shape, "strip">) => Invocable,
): void {
  const catalog = options.catalog ?? getDefaultCatalog();
  const { spec, warnings } = buildSpec(kind, definition, options.engine);
  reportWarnings(definition.name, warnings, options);
  catalog.register(spec, createInvocable(catalog, z.object(definition.params)));
}

/**
 * Registers `handler` as a tool and returns it unchanged, so the function
 * stays directly callable:
 *
 * ```ts
 * export const add = defineTool(
 *   { name: "calculator.add", description: "Adds two integers", params: { a: z.number().int(), b: z.number().int() } },
 *   ({ a, b }) => a + b,
 * );
 * ```
 */
export function defineTool<Shape extends z.ZodRawShape, R>(
  definition: ToolDefinition<Shape>,
  handler: ToolHandler<Shape, R>,
  options: RegistrationOptions = {},
): ToolHandler<Shape, R> {
  registerDefinition("tool", definition, options, (_catalog, schema) => (args, extras) =>
    handler(parseArguments(definition.name, schema, args), extras),
  );
  return handler;
}

/**
 * Registers a composite flow. Each run gets a fresh {@link PipelineContext}
 * through which the body calls other catalog entries and shares state.
 */
export function definePipeline<Shape extends z.ZodRawShape, R>(
  definition: ToolDefinition<Shape>,
  body: PipelineBody<Shape, R>,
  options: RegistrationOptions = {},
): PipelineBody<Shape, R> {
  registerDefinition("pipeline", definition, options, (catalog, schema) => (args, extras) => {
    const context = new PipelineContext({ catalog, sessionStore: catalog.sessionStore, extras });
    return body(context, parseArguments(definition.name, schema, args));
  });
  return body;
}
