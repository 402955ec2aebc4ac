import type {
  AngleTriple,
  CanonicalParameters,
  NormalizationResult,
  ParameterMap,
  ParameterName,
  RawParameters,
} from '../types/geometry';
import { isTrigFunction } from '../types/geometry';
import { coerceParameters } from '../utils/coercion';
import { MAX_DERIVATION_PASSES } from './constants';
import { MissingParameterError } from './errors';
import { preprocess } from './preprocessors';
import type { DerivationRule, ShapeRules } from './registry';
import { isKnownShape, measurementTargets, rulesFor } from './registry';
import { validateAngleHint, validateShape, withinTolerance } from './validation';

const SHAPE_ALIASES: Record<string, string> = {
  square: 'rectangle',
  triangle: 'general_triangle',
  scalene_triangle: 'general_triangle',
};

/** "Right Triangle", "right-triangle" and "right_triangle" name the same shape. */
export function parseShapeKey(shape: string): string {
  const key = shape.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return SHAPE_ALIASES[key] ?? key;
}

export interface DerivationOutcome {
  /** Passes actually run; an unsatisfiable request always spends the full budget. */
  passes: number;
  unresolved: ParameterName[];
}

function evaluateRule(target: ParameterName, rule: DerivationRule, working: ParameterMap): number | null {
  const inputs: number[] = [];
  for (const source of rule.sources) {
    const value = working.get(source);
    if (value === undefined) {
      return null;
    }
    inputs.push(value);
  }

  try {
    const value = rule.formula(...inputs);
    if (Number.isFinite(value)) {
      return value;
    }
    console.warn(`⚠️ Formula for ${target} from [${rule.sources.join(', ')}] produced ${value}`);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️ Formula failed for ${target} from [${rule.sources.join(', ')}]: ${reason}`);
  }
  return null;
}

/**
 * Fills in `targets` from the shape's derivation rules, in place.
 *
 * Each pass visits the targets still missing, in order, and applies the first
 * alternative (declaration order) whose sources are all known and whose formula
 * succeeds. Values found earlier in a pass are visible to later targets of the
 * same pass. Iteration stops once nothing is pending or the pass budget is spent.
 */
export function deriveParameters(
  working: ParameterMap,
  targets: readonly ParameterName[],
  rules: ShapeRules,
  isKnown: (name: ParameterName) => boolean = (name) => working.has(name),
  maxPasses: number = MAX_DERIVATION_PASSES,
): DerivationOutcome {
  let passes = 0;

  while (passes < maxPasses) {
    const pending = targets.filter((target) => !isKnown(target));
    if (pending.length === 0) {
      break;
    }
    passes++;

    for (const target of pending) {
      for (const rule of rules.derived.get(target) ?? []) {
        const value = evaluateRule(target, rule, working);
        if (value !== null) {
          working.set(target, value);
          break;
        }
      }
    }
  }

  return { passes, unresolved: targets.filter((target) => !isKnown(target)) };
}

function collectMeasurements(rules: ShapeRules, canonical: ParameterMap): Record<ParameterName, number> {
  const seed: ParameterMap = new Map(canonical);
  const targets = measurementTargets(rules);
  deriveParameters(seed, targets, rules);

  const measurements: Record<ParameterName, number> = {};
  for (const target of targets) {
    const value = seed.get(target);
    if (value !== undefined) {
      measurements[target] = value;
    }
  }
  return measurements;
}

/** Supplied measurements play no part once the shape is resolved; flag the ones it contradicts. */
function warnOnContradictions(shape: string, supplied: ParameterMap, measurements: Record<ParameterName, number>): void {
  for (const [name, derived] of Object.entries(measurements)) {
    const given = supplied.get(name);
    if (given !== undefined && !withinTolerance(given, derived)) {
      console.warn(`⚠️ Ignoring ${name}=${given} for ${shape}; the resolved shape gives ${name}=${derived}`);
    }
  }
}

/**
 * Resolves a shape's canonical parameters from untrusted input.
 *
 * raw values -> coercion -> shape pre-processing -> bounded derivation ->
 * geometric validation -> canonical values + secondary measurements.
 *
 * Throws MissingParameterError when required values cannot be derived and
 * InvalidGeometryError when the resolved values describe an impossible shape.
 */
export function normalizeParameters(shape: string, raw: RawParameters): NormalizationResult {
  const key = parseShapeKey(shape);
  const coerced = coerceParameters(raw);
  const rules = rulesFor(key);

  const values: ParameterMap = new Map();
  const text = new Map(Object.entries(coerced.text));
  const dropped = [...coerced.dropped];
  let angles: AngleTriple | undefined;

  for (const [name, value] of Object.entries(coerced.values)) {
    if (typeof value === 'number') {
      values.set(name, value);
    } else if (name === 'angles') {
      angles = validateAngleHint(value);
    } else {
      console.warn(`⚠️ Dropping list value for ${name}; only "angles" may be a list`);
      dropped.push(name);
    }
  }

  if (!isKnownShape(key)) {
    const parameters: CanonicalParameters = Object.fromEntries(values);
    return { shape: key, known: false, parameters, measurements: {}, angles, dropped };
  }

  preprocess(key, { values, text, angles });

  const isKnown = (name: ParameterName) => values.has(name) || text.has(name);
  const outcome = deriveParameters(values, rules.required, rules, isKnown);
  if (outcome.unresolved.length > 0) {
    throw new MissingParameterError(key, outcome.unresolved, outcome.passes);
  }

  validateShape(key, rules.required, values);

  const parameters: CanonicalParameters = {};
  const canonical: ParameterMap = new Map();
  for (const name of rules.required) {
    const value = values.get(name);
    const label = text.get(name);
    if (value !== undefined) {
      parameters[name] = value;
      canonical.set(name, value);
    } else if (label !== undefined && isTrigFunction(label)) {
      parameters[name] = label;
    }
  }

  const measurements = collectMeasurements(rules, canonical);
  warnOnContradictions(key, values, measurements);

  return {
    shape: key,
    known: true,
    parameters,
    measurements,
    angles,
    dropped,
  };
}
