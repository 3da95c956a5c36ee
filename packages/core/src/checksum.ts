/**
 * Checksum verifier — SHA-256 gate in front of transform evaluation.
 *
 * Golden tests never run against logic whose bytes do not match the digest
 * declared in metadata.
 */

import { createHash } from 'node:crypto';
import { ChecksumError } from '@canonizer/sdk';

/** Lowercase hex SHA-256 of the exact bytes given */
export function computeSha256(content: Uint8Array | string): string {
	return createHash('sha256').update(content).digest('hex');
}

/**
 * Compare the digest of `content` against `declared` (case-insensitive).
 * Returns null when they match.
 */
export function verifyChecksum(content: Uint8Array | string, declared: string): ChecksumError | null {
	const actual = computeSha256(content);
	if (declared.toLowerCase() === actual) return null;
	return new ChecksumError(declared, actual);
}
