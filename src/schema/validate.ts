import type { ContractIssue } from "../catalog/errors.js";
import {
  type CallContract,
  type ContractNode,
  isArrayContract,
  isEnumContract,
  isMapContract,
  isObjectContract,
  isOneOfContract,
} from "./contract.js";

function joinPath(base: string, segment: string | number): string {
  if (typeof segment === "number") {
    return `${base}[${segment}]`;
  }
  return base ? `${base}.${segment}` : segment;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  if (typeof value === "number" && Number.isFinite(value) && !Number.isInteger(value)) {
    return "number";
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    return "integer";
  }
  return typeof value;
}

function describeNode(node: ContractNode): string {
  if (isEnumContract(node)) {
    return `one of ${node.enum.map((value) => JSON.stringify(value)).join(", ")}`;
  }
  if (isOneOfContract(node)) {
    return "one of the allowed variants";
  }
  return node.type;
}

function checkObject(
  contract: CallContract,
  value: Record<string, unknown>,
  path: string,
  issues: ContractIssue[],
): void {
  for (const key of contract.required) {
    if (value[key] === undefined) {
      issues.push({ path: joinPath(path, key), message: "is required" });
    }
  }
  for (const [key, entry] of Object.entries(value)) {
    const property = contract.properties[key];
    if (!property) {
      issues.push({ path: joinPath(path, key), message: "is not an accepted property" });
      continue;
    }
    if (entry !== undefined) {
      checkNode(property, entry, joinPath(path, key), issues);
    }
  }
}

function checkNode(node: ContractNode, value: unknown, path: string, issues: ContractIssue[]): void {
  // Degraded nodes describe types the engine could not express; the handler's
  // own schema parse is the authority for them.
  if (node["x-degraded"]) {
    return;
  }
  if (value === null && node.nullable) {
    return;
  }
  if (isEnumContract(node)) {
    if (!node.enum.some((candidate) => candidate === value)) {
      issues.push({ path, message: `must be ${describeNode(node)}` });
    }
    return;
  }
  if (isOneOfContract(node)) {
    const matches = node.oneOf.some((branch) => collectIssues(branch, value, path).length === 0);
    if (!matches) {
      issues.push({ path, message: `does not match any allowed variant (received ${describeValue(value)})` });
    }
    return;
  }
  if (isArrayContract(node)) {
    if (!Array.isArray(value)) {
      issues.push({ path, message: `expected array, received ${describeValue(value)}` });
      return;
    }
    for (let index = 0; index < value.length; index += 1) {
      checkNode(node.items, value[index], joinPath(path, index), issues);
    }
    return;
  }
  if (isObjectContract(node) || isMapContract(node)) {
    if (!isPlainObject(value)) {
      issues.push({ path, message: `expected object, received ${describeValue(value)}` });
      return;
    }
    if (isObjectContract(node)) {
      checkObject(node, value, path, issues);
      return;
    }
    for (const [key, entry] of Object.entries(value)) {
      checkNode(node.additionalProperties, entry, joinPath(path, key), issues);
    }
    return;
  }

  const accepted =
    node.type === "integer"
      ? typeof value === "number" && Number.isSafeInteger(value)
      : node.type === "number"
        ? typeof value === "number" && Number.isFinite(value)
        : typeof value === node.type;
  if (!accepted) {
    issues.push({ path, message: `expected ${node.type}, received ${describeValue(value)}` });
  }
}

function collectIssues(node: ContractNode, value: unknown, path: string): ContractIssue[] {
  const issues: ContractIssue[] = [];
  checkNode(node, value, path, issues);
  return issues;
}

/**
 * Checks an argument object against a call contract and returns every
 * violation found: missing required members, wrong primitive types, values
 * outside an enumeration, unmatched unions and unknown properties. An empty
 * list means the arguments are acceptable.
 */
export function validateArguments(contract: CallContract, args: unknown): ContractIssue[] {
  if (!isPlainObject(args)) {
    return [{ path: "", message: `arguments must be an object, received ${describeValue(args)}` }];
  }
  const issues: ContractIssue[] = [];
  checkObject(contract, args, "", issues);
  return issues;
}

/** Validates a single value against any contract node. */
export function validateValue(node: ContractNode, value: unknown): ContractIssue[] {
  return collectIssues(node, value, "");
}
