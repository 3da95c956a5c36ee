import { describe, expect, it } from 'vitest';
import { computeSha256, verifyChecksum } from '../checksum.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('computeSha256', () => {
	it('hashes the exact bytes', () => {
		expect(computeSha256('abc')).toBe(ABC_SHA256);
		expect(computeSha256(Buffer.from('abc'))).toBe(ABC_SHA256);
	});

	it('is sensitive to trailing newlines', () => {
		expect(computeSha256('abc\n')).not.toBe(ABC_SHA256);
	});
});

describe('verifyChecksum', () => {
	it('accepts a matching digest in any case', () => {
		expect(verifyChecksum('abc', ABC_SHA256)).toBeNull();
		expect(verifyChecksum('abc', ABC_SHA256.toUpperCase())).toBeNull();
	});

	it('reports both digests on mismatch', () => {
		const declared = '0'.repeat(64);
		const err = verifyChecksum('abc', declared);
		expect(err?.kind).toBe('checksum');
		expect(err?.expected).toBe(declared);
		expect(err?.actual).toBe(ABC_SHA256);
	});
});
