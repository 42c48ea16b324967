/**
 * Rate model dispatch.
 *
 * The pool holds a tagged `RateModel`; these helpers route each call to the curve
 * for its kind so callers never handle the constants directly.
 */

import { linearRateCurve } from './linear';
import type { RateBounds, RateModel, RateUpdateInput } from './types';
import { variableRateCurve } from './variable';

export type {
  LinearRateConstants,
  RateBounds,
  RateCurve,
  RateModel,
  RateModelKind,
  RateUpdateInput,
  VariableRateConstants,
} from './types';
export { DEFAULT_VARIABLE_RATE_CONSTANTS, updateVariableRate, variableRateCurve } from './variable';
export { DEFAULT_LINEAR_RATE_CONSTANTS, linearRateCurve, updateLinearRate } from './linear';

export function validateRateModel(model: RateModel): void {
  switch (model.kind) {
    case 'variable':
      variableRateCurve.validate(model.constants);
      return;
    case 'linear':
      linearRateCurve.validate(model.constants);
      return;
  }
}

export function getRateBounds(model: RateModel): RateBounds {
  switch (model.kind) {
    case 'variable':
      return variableRateCurve.bounds(model.constants);
    case 'linear':
      return linearRateCurve.bounds(model.constants);
  }
}

export function getUtilizationPrecision(model: RateModel): bigint {
  switch (model.kind) {
    case 'variable':
      return variableRateCurve.utilizationPrecision(model.constants);
    case 'linear':
      return linearRateCurve.utilizationPrecision(model.constants);
  }
}

export function getInitialRate(model: RateModel): bigint {
  switch (model.kind) {
    case 'variable':
      return variableRateCurve.initialRate(model.constants);
    case 'linear':
      return linearRateCurve.initialRate(model.constants);
  }
}

export function getNewRate(model: RateModel, input: RateUpdateInput): bigint {
  switch (model.kind) {
    case 'variable':
      return variableRateCurve.updateRate(model.constants, input);
    case 'linear':
      return linearRateCurve.updateRate(model.constants, input);
  }
}
