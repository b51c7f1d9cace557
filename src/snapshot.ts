/**
 * Snapshot value model
 *
 * Every traversal goes through classifyNode and switches on its kind, so a new
 * kind of node fails to compile until each walker handles it.
 */

import type { NodeMap, NodeValue, ScalarValue } from "./types.js";

export type ClassifiedNode =
  | { kind: "map"; value: NodeMap }
  | { kind: "sequence"; value: NodeValue[] }
  | { kind: "scalar"; value: ScalarValue };

export function classifyNode(value: NodeValue): ClassifiedNode {
  if (Array.isArray(value)) {
    return { kind: "sequence", value };
  }
  if (value !== null && typeof value === "object") {
    return { kind: "map", value };
  }
  return { kind: "scalar", value };
}

export function isNodeMap(value: NodeValue): value is NodeMap {
  return classifyNode(value).kind === "map";
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected node: ${JSON.stringify(value)}`);
}

/**
 * Define `key` as an own enumerable property. Plain assignment would hand a
 * `__proto__` key to the prototype setter and lose the entry.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function assignEntries<T>(target: Record<string, T>, source: Record<string, T>): void {
  for (const [key, value] of Object.entries(source)) {
    setEntry(target, key, value);
  }
}

/**
 * Narrow untrusted input (parsed JSON, collector output) into a NodeValue
 */
export function toNodeValue(input: unknown): NodeValue {
  if (input === null || input === undefined) {
    return null;
  }

  if (typeof input === "string" || typeof input === "boolean") {
    return input;
  }

  if (typeof input === "number") {
    return Number.isFinite(input) ? input : String(input);
  }

  if (Array.isArray(input)) {
    return input.map((item) => toNodeValue(item));
  }

  if (typeof input === "object") {
    const map: NodeMap = {};
    for (const [key, value] of Object.entries(input)) {
      setEntry(map, key, toNodeValue(value));
    }
    return map;
  }

  return String(input);
}

/**
 * Structural equality. Sequences compare by position, maps by key set.
 */
export function nodesEqual(a: NodeValue, b: NodeValue): boolean {
  const left = classifyNode(a);
  const right = classifyNode(b);

  switch (left.kind) {
    case "scalar":
      return right.kind === "scalar" && left.value === right.value;
    case "sequence":
      return (
        right.kind === "sequence" &&
        left.value.length === right.value.length &&
        left.value.every((item, index) => nodesEqual(item, right.value[index]))
      );
    case "map": {
      if (right.kind !== "map") return false;
      const leftKeys = Object.keys(left.value);
      if (leftKeys.length !== Object.keys(right.value).length) return false;
      return leftKeys.every(
        (key) => Object.hasOwn(right.value, key) && nodesEqual(left.value[key], right.value[key])
      );
    }
    default:
      return assertNever(left);
  }
}
