/**
 * packages/core/src/ring/savedState.ts — Persisted progress ring state.
 */

import { RingError } from "../errors.js";

export type RingSavedState = Readonly<{
  progress: number;
  indeterminate: boolean;
}>;

function invalidState(detail: string): never {
  throw new RingError("RING_INVALID_STATE", detail);
}

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

export function serializeRingState(state: RingSavedState): string {
  return JSON.stringify({ progress: state.progress, indeterminate: state.indeterminate });
}

/** Validate an unknown value as saved state. */
export function readRingState(value: unknown): RingSavedState {
  if (!isRecord(value)) invalidState("saved state must be an object");
  const { progress, indeterminate } = value;
  if (typeof progress !== "number" || !Number.isInteger(progress)) {
    invalidState("saved state progress must be an integer");
  }
  if (typeof indeterminate !== "boolean") {
    invalidState("saved state indeterminate must be a boolean");
  }
  return Object.freeze({ progress, indeterminate });
}

export function parseRingState(text: string): RingSavedState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e: unknown) {
    invalidState(`saved state is not valid JSON: ${describeThrown(e)}`);
  }
  return readRingState(parsed);
}
