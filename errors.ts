/**
 * Error and outcome types for board mutations.
 *
 * Two failure classes:
 * 1. Caller errors (bad index, committing onto a non-placeholder slot) throw
 *    BoardPreconditionError, or surface as an 'invalid' outcome when the board
 *    runs with `strict: false`
 * 2. Lookup misses (unknown group, vanished item) are 'not-found' / 'skipped'
 *    outcomes and leave the board untouched
 */

export type PreconditionCode =
	| 'index-out-of-range'
	| 'duplicate-item'
	| 'duplicate-group'
	| 'not-a-placeholder'
	| 'placeholder-exists'
	| 'same-group'
	| 'unknown-group'
	| 'disposed';

export class BoardPreconditionError extends Error {
	readonly code: PreconditionCode;

	constructor(code: PreconditionCode, message: string) {
		super(message);
		this.name = 'BoardPreconditionError';
		this.code = code;
	}
}

export type MutationOutcome =
	| { status: 'applied' }
	| { status: 'skipped'; reason: string }
	| { status: 'not-found'; groupId: string }
	| { status: 'invalid'; code: PreconditionCode; reason: string };

export const APPLIED: MutationOutcome = { status: 'applied' };

export function skipped(reason: string): MutationOutcome {
	return { status: 'skipped', reason };
}

export function notFound(groupId: string): MutationOutcome {
	return { status: 'not-found', groupId };
}

export function invalid(code: PreconditionCode, reason: string): MutationOutcome {
	return { status: 'invalid', code, reason };
}

export function isApplied(outcome: MutationOutcome): boolean {
	return outcome.status === 'applied';
}
