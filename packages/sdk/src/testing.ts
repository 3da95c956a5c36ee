/**
 * Test harness for registry tooling and engine authors.
 *
 * Provides fake implementations and helpers for exercising the validation
 * core without a real transform engine.
 */

import type { EvaluationOutcome, Evaluator } from './evaluator.js';
import type { Logger } from './logger.js';
import type { LogEntry, TransformMetadata } from './types.js';

// ─── Fake Evaluator ───────────────────────────────────────────────────────────

export type FakeHandler = (script: string, input: unknown) => unknown;

/**
 * Fake evaluator for testing.
 * Runs a plain function instead of a transform engine and records every call.
 * A handler that throws produces an `error` outcome.
 */
export class FakeEvaluator implements Evaluator {
	readonly engine: string;
	readonly calls: Array<{ script: string; input: unknown }> = [];
	private handler: FakeHandler;

	constructor(handler: FakeHandler = (_script, input) => input, engine = 'jsonata') {
		this.handler = handler;
		this.engine = engine;
	}

	/** Replace the function used for subsequent evaluations */
	setHandler(handler: FakeHandler): void {
		this.handler = handler;
	}

	async evaluate(script: string, input: unknown): Promise<EvaluationOutcome> {
		this.calls.push({ script, input });
		try {
			return { status: 'ok', output: this.handler(script, input) };
		} catch (err) {
			return { status: 'error', message: err instanceof Error ? err.message : String(err) };
		}
	}

	get totalCalls(): number {
		return this.calls.length;
	}
}

// ─── Mock Logger ──────────────────────────────────────────────────────────────

/**
 * Mock logger for testing.
 * Records all log entries for assertion.
 */
export class MockLogger implements Logger {
	readonly id: string;
	readonly entries: LogEntry[] = [];
	initialized = false;
	flushed = false;
	shutdownCalled = false;

	constructor(id = 'mock-logger') {
		this.id = id;
	}

	async init(_config: Record<string, unknown>): Promise<void> {
		this.initialized = true;
	}

	async log(entry: LogEntry): Promise<void> {
		this.entries.push(entry);
	}

	async flush(): Promise<void> {
		this.flushed = true;
	}

	async shutdown(): Promise<void> {
		this.flushed = true;
		this.shutdownCalled = true;
	}

	/** Get entries for a specific phase */
	entriesForPhase(phase: LogEntry['phase']): LogEntry[] {
		return this.entries.filter((e) => e.phase === phase);
	}

	/** Get entries for a specific unit */
	entriesForUnit(unit: string): LogEntry[] {
		return this.entries.filter((e) => e.unit === unit);
	}
}

// ─── Test Metadata Factory ────────────────────────────────────────────────────

/**
 * Create transform metadata with sensible defaults.
 */
export function createTestMetadata(overrides?: Partial<TransformMetadata>): TransformMetadata {
	return {
		id: 'email/gmail_to_canonical',
		version: '1.0.0',
		engine: 'jsonata',
		from_schema: 'iglu:com.google/gmail_email/jsonschema/1-0-0',
		to_schema: 'iglu:org.canonical/email/jsonschema/1-0-0',
		tests: [{ input: 'tests/input.json', expect: 'tests/expected.json' }],
		checksum: { jsonata_sha256: '0'.repeat(64) },
		provenance: { author: 'Test Author', created_utc: '2025-01-01T00:00:00Z' },
		status: 'draft',
		...overrides,
	};
}
