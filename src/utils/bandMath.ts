/**
 * Band Math
 * Builders for image expressions and a single-pixel evaluator for the
 * band-level subset (select, constant, arithmetic, normalized difference,
 * rename, cat). Collection and terrain operators only run remotely.
 * Location: src/utils/bandMath.ts
 */

import type { AoiGeometry } from '@/types/geo';
import type { BinaryOperator, ImageExpr, Visualization } from '@/types/compute';

/** Band name -> value for one pixel */
export type Pixel = Record<string, number>;

// ============================================================================
// BUILDERS
// ============================================================================

export function select(source: ImageExpr, ...bands: string[]): ImageExpr {
  return { kind: 'select', source, bands };
}

export function constant(value: number): ImageExpr {
  return { kind: 'constant', value };
}

function operand(value: ImageExpr | number): ImageExpr {
  return typeof value === 'number' ? constant(value) : value;
}

export function binary(op: BinaryOperator, left: ImageExpr, right: ImageExpr | number): ImageExpr {
  return { kind: 'binary', op, left, right: operand(right) };
}

export const add = (left: ImageExpr, right: ImageExpr | number) => binary('add', left, right);
export const subtract = (left: ImageExpr, right: ImageExpr | number) => binary('subtract', left, right);
export const multiply = (left: ImageExpr, right: ImageExpr | number) => binary('multiply', left, right);
export const divide = (left: ImageExpr, right: ImageExpr | number) => binary('divide', left, right);

export function normalizedDifference(source: ImageExpr, bands: [string, string]): ImageExpr {
  return { kind: 'normalizedDifference', source, bands };
}

export function rename(source: ImageExpr, name: string): ImageExpr {
  return { kind: 'rename', source, name };
}

export function clip(source: ImageExpr, geometry: AoiGeometry): ImageExpr {
  return { kind: 'clip', source, geometry };
}

export function cat(sources: ImageExpr[]): ImageExpr {
  return { kind: 'cat', sources };
}

export function visualize(source: ImageExpr, visualization: Visualization): ImageExpr {
  return { kind: 'visualize', source, visualization };
}

// ============================================================================
// LOCAL EVALUATION
// ============================================================================

function apply(op: BinaryOperator, a: number, b: number): number {
  switch (op) {
    case 'add':
      return a + b;
    case 'subtract':
      return a - b;
    case 'multiply':
      return a * b;
    case 'divide':
      return a / b;
  }
}

function evaluateBinary(op: BinaryOperator, left: Pixel, right: Pixel): Pixel {
  const leftBands = Object.keys(left);
  const rightValues = Object.values(right);

  if (rightValues.length !== 1 && rightValues.length !== leftBands.length) {
    throw new Error(`Cannot ${op} images with ${leftBands.length} and ${rightValues.length} bands`);
  }

  const out: Pixel = {};
  leftBands.forEach((name, i) => {
    const b = rightValues.length === 1 ? rightValues[0] : rightValues[i];
    out[name] = apply(op, left[name], b);
  });
  return out;
}

/**
 * Evaluate a band-level expression for one pixel, `pixel` holding the input
 * composite's band values. Output band names follow
 * the compute service: arithmetic keeps the left operand's names,
 * normalizedDifference yields "nd", constants yield "constant".
 */
export function evaluatePixel(expr: ImageExpr, pixel: Pixel): Pixel {
  switch (expr.kind) {
    case 'select': {
      const source = evaluatePixel(expr.source, pixel);
      const out: Pixel = {};
      for (const band of expr.bands) {
        if (!(band in source)) {
          throw new Error(`Band "${band}" not found`);
        }
        out[band] = source[band];
      }
      return out;
    }

    case 'constant':
      return { constant: expr.value };

    case 'binary':
      return evaluateBinary(expr.op, evaluatePixel(expr.left, pixel), evaluatePixel(expr.right, pixel));

    case 'normalizedDifference': {
      const source = evaluatePixel(expr.source, pixel);
      const [first, second] = expr.bands;
      if (!(first in source) || !(second in source)) {
        throw new Error(`Bands ${first}/${second} not found`);
      }
      const a = source[first];
      const b = source[second];
      return { nd: (a - b) / (a + b) };
    }

    case 'rename': {
      const values = Object.values(evaluatePixel(expr.source, pixel));
      if (values.length !== 1) {
        throw new Error(`Cannot rename ${values.length} bands to "${expr.name}"`);
      }
      return { [expr.name]: values[0] };
    }

    case 'cat': {
      const out: Pixel = {};
      for (const source of expr.sources) {
        for (const [name, value] of Object.entries(evaluatePixel(source, pixel))) {
          if (name in out) {
            throw new Error(`Duplicate band "${name}" in cat`);
          }
          out[name] = value;
        }
      }
      return out;
    }

    case 'clip':
      return evaluatePixel(expr.source, pixel);

    // the pixel stands for the composite's values at one location
    case 'composite':
      return { ...pixel };

    default:
      throw new Error(`"${expr.kind}" is evaluated by the compute service only`);
  }
}
