import type { CoercedValue, RawParameters } from '../types/geometry';
import { evaluateExpression } from './expressionParser';

function describe(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function coerceScalar(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }

  try {
    return evaluateExpression(value.trim());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️ Parameter evaluation failed: ${describe(value)} -> ${reason}`);
    return null;
  }
}

/**
 * Best-effort conversion of an untrusted parameter value into a number, or a
 * list of numbers for the `angles` hint. Never throws; anything that cannot be
 * converted yields `null`.
 */
export function coerceValue(value: unknown): CoercedValue | null {
  if (Array.isArray(value)) {
    const numbers: number[] = [];
    for (const item of value) {
      const coerced = Array.isArray(item) ? null : coerceScalar(item);
      if (coerced === null) {
        console.warn(`⚠️ Dropping list parameter ${describe(value)}: element ${describe(item)} is not numeric`);
        return null;
      }
      numbers.push(coerced);
    }
    return numbers;
  }

  if (value !== null && value !== undefined && typeof value !== 'number' && typeof value !== 'string') {
    console.warn(`⚠️ Unsupported parameter type ${typeof value}: ${describe(value)}`);
  }

  return coerceScalar(value);
}

export interface CoercedParameters {
  values: Record<string, CoercedValue>;
  /** Reserved textual parameter (`function`), trimmed and lowercased. */
  text: Record<string, string>;
  dropped: string[];
}

const TEXT_PARAMETERS = new Set(['function']);

/** Applies `coerceValue` to every entry; `null`/`undefined` entries count as not provided. */
export function coerceParameters(raw: RawParameters): CoercedParameters {
  const result: CoercedParameters = { values: {}, text: {}, dropped: [] };

  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) {
      continue;
    }

    if (TEXT_PARAMETERS.has(key)) {
      if (typeof value === 'string' && value.trim()) {
        result.text[key] = value.trim().toLowerCase();
      } else {
        console.warn(`⚠️ Parameter ${key} must be a string, got ${describe(value)}`);
        result.dropped.push(key);
      }
      continue;
    }

    const coerced = coerceValue(value);
    if (coerced === null) {
      result.dropped.push(key);
    } else {
      result.values[key] = coerced;
    }
  }

  return result;
}
