import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { DEFAULT_CONVERTERS, defineConverter } from "../src/schema/converters.js";
import { SchemaEngine, deriveContract, deriveValueContract } from "../src/schema/engine.js";

describe("schema engine", () => {
  it("derives integer properties and the required set for calculator.add", () => {
    const { contract, warnings } = deriveContract({ a: z.number().int(), b: z.number().int() });

    expect(warnings).to.have.length(0);
    expect(contract).to.deep.equal({
      type: "object",
      properties: { a: { type: "integer" }, b: { type: "integer" } },
      required: ["a", "b"],
      additionalProperties: false,
    });
  });

  it("is deterministic and returns frozen trees", () => {
    const shape = {
      city: z.string().describe("City name"),
      units: z.enum(["metric", "imperial"]).default("metric"),
      days: z.array(z.number().int()).optional(),
    };
    const first = deriveContract(shape).contract;
    const second = deriveContract(shape).contract;

    expect(JSON.stringify(first)).to.equal(JSON.stringify(second));
    expect(first).to.deep.equal(second);
    expect(Object.isFrozen(first)).to.equal(true);
    expect(Object.isFrozen(first.properties)).to.equal(true);
  });

  it("maps optional, defaulted and described members", () => {
    const { contract } = deriveContract({
      city: z.string().describe("City name"),
      units: z.enum(["metric", "imperial"]).default("metric"),
      note: z.string().optional(),
    });

    expect(contract.required).to.deep.equal(["city"]);
    expect(contract.properties.city).to.deep.equal({ type: "string", description: "City name" });
    expect(contract.properties.units).to.deep.equal({ type: "string", enum: ["metric", "imperial"], default: "metric" });
    expect(contract.properties.note).to.deep.equal({ type: "string" });
  });

  it("maps sequences and keyed mappings", () => {
    const { contract } = deriveContract({
      values: z.array(z.number()),
      unique: z.set(z.string()),
      flags: z.record(z.boolean()),
      point: z.object({ lat: z.number(), lon: z.number() }),
    });

    expect(contract.properties.values).to.deep.equal({ type: "array", items: { type: "number" } });
    expect(contract.properties.unique).to.deep.equal({ type: "array", items: { type: "string" } });
    expect(contract.properties.flags).to.deep.equal({ type: "object", additionalProperties: { type: "boolean" } });
    expect(contract.properties.point).to.deep.equal({
      type: "object",
      properties: { lat: { type: "number" }, lon: { type: "number" } },
      required: ["lat", "lon"],
      additionalProperties: false,
    });
  });

  it("keeps nullability separate from the typed branch", () => {
    const { contract } = deriveContract({
      label: z.string().nullable(),
      maybe: z.union([z.number(), z.null()]),
    });

    expect(contract.properties.label).to.deep.equal({ type: "string", nullable: true });
    expect(contract.properties.maybe).to.deep.equal({ type: "number", nullable: true });
    expect(contract.required).to.deep.equal(["label", "maybe"]);
  });

  it("builds one-of compositions for heterogeneous unions", () => {
    const { contract } = deriveValueContract(z.union([z.string(), z.number().int()]));

    expect(contract).to.deep.equal({ oneOf: [{ type: "string" }, { type: "integer" }] });
  });

  it("collapses literal unions into a typed enumeration", () => {
    expect(deriveValueContract(z.union([z.literal(1), z.literal(2)])).contract).to.deep.equal({
      type: "integer",
      enum: [1, 2],
    });
    expect(deriveValueContract(z.union([z.literal("a"), z.literal(1)])).contract).to.deep.equal({
      enum: ["a", 1],
    });
  });

  it("reads native enum objects", () => {
    const Priority = { Low: "low", High: "high" } as const;

    expect(deriveValueContract(z.nativeEnum(Priority)).contract).to.deep.equal({
      type: "string",
      enum: ["low", "high"],
    });
  });

  it("converts discriminated unions branch by branch", () => {
    const schema = z.discriminatedUnion("kind", [
      z.object({ kind: z.literal("circle"), radius: z.number() }),
      z.object({ kind: z.literal("square"), side: z.number() }),
    ]);

    expect(deriveValueContract(schema).contract).to.deep.equal({
      oneOf: [
        {
          type: "object",
          properties: { kind: { type: "string", enum: ["circle"] }, radius: { type: "number" } },
          required: ["kind", "radius"],
          additionalProperties: false,
        },
        {
          type: "object",
          properties: { kind: { type: "string", enum: ["square"] }, side: { type: "number" } },
          required: ["kind", "side"],
          additionalProperties: false,
        },
      ],
    });
  });

  it("falls back to a flagged string for types without a rule", () => {
    const { contract, warnings } = deriveContract({ when: z.date(), big: z.literal(10n) });

    expect(contract.properties.when).to.deep.equal({ type: "string", "x-degraded": true });
    expect(contract.properties.big).to.deep.equal({ type: "string", "x-degraded": true });
    expect(warnings.map((warning) => warning.path)).to.deep.equal([["when"], ["big"]]);
    expect(warnings.map((warning) => warning.declaredType)).to.deep.equal(["ZodDate", "ZodLiteral"]);
    expect(warnings[0]?.message).to.equal("no contract rule for ZodDate at when; using string");
  });

  it("lets custom converters take precedence over the fallback", () => {
    const dates = defineConverter(
      "date",
      (schema): schema is z.ZodDate => schema instanceof z.ZodDate,
      () => ({ type: "string", description: "ISO-8601 timestamp" }),
    );
    const engine = new SchemaEngine({ converters: [dates, ...DEFAULT_CONVERTERS] });

    const { contract, warnings } = engine.deriveContract({ when: z.date() });

    expect(warnings).to.have.length(0);
    expect(contract.properties.when).to.deep.equal({ type: "string", description: "ISO-8601 timestamp" });
  });
});
