/**
 * Evaluator interface — the contract for transform engines.
 *
 * The validation core never interprets transform logic itself. It hands the
 * verified script and a parsed fixture to an evaluator and compares what
 * comes back, so the core can be exercised with a fake engine.
 */

/** Outcome of evaluating a script against one input document */
export type EvaluationOutcome =
	| {
			status: 'ok';
			/** Plain JSON result; undefined when the expression matched nothing */
			output: unknown;
	  }
	| {
			status: 'error';
			message: string;
	  };

export interface Evaluator {
	/** Engine tag this evaluator implements, e.g. `jsonata` */
	readonly engine: string;

	/**
	 * Evaluate `script` against `input`.
	 * Engine failures are returned as `status: 'error'`, never thrown.
	 */
	evaluate(script: string, input: unknown): Promise<EvaluationOutcome>;
}

/**
 * Evaluator registration — what an engine package exports.
 */
export interface EvaluatorRegistration {
	engine: string;
	evaluator: new () => Evaluator;
}
