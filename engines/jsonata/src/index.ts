/**
 * @canonizer/engine-jsonata — registration entry point.
 */

import type { EvaluatorRegistration } from '@canonizer/sdk';
import { TRANSFORM_ENGINE } from '@canonizer/sdk';
import { JsonataEvaluator } from './jsonata.js';

export function register(): EvaluatorRegistration {
	return {
		engine: TRANSFORM_ENGINE,
		evaluator: JsonataEvaluator,
	};
}

export { JsonataEvaluator, describeEngineError, toPlainJson } from './jsonata.js';
