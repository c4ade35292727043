/**
 * Tests for the drag lifecycle state machine
 *
 * These tests verify the state machine enforces correct transitions
 * and keeps the single-drag invariant.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
	createStateMachine,
	createInitialState,
	reducer,
	canTransition,
	isDragging,
	getDragTarget,
	isCrossGroupTarget,
	type DragState,
	type DragStateMachine,
	type DragTransition,
} from './state-machine';

// ============================================================================
// Test Helpers
// ============================================================================

const START: DragTransition = { type: 'START_DRAG', sourceGroupId: 'A', sourceIndex: 1, itemId: 'card-2' };

function dragging(): DragState {
	return reducer(createInitialState(), START);
}

// ============================================================================
// Initial State Tests
// ============================================================================

describe('Initial State', () => {
	it('should start in idle phase', () => {
		expect(createInitialState().phase).toBe('idle');
	});

	it('should have no active drag', () => {
		const state = createInitialState();
		expect(state.drag).toBeNull();
		expect(isDragging(state)).toBe(false);
		expect(getDragTarget(state)).toBeNull();
	});
});

// ============================================================================
// Start Tests
// ============================================================================

describe('Start', () => {
	it('should capture the source and target the source slot', () => {
		const state = dragging();

		expect(state.phase).toBe('dragging');
		expect(state.drag).toEqual({
			sourceGroupId: 'A',
			sourceIndex: 1,
			itemId: 'card-2',
			target: { groupId: 'A', index: 1 },
			placeholderGroupId: null,
		});
	});

	it('should NOT allow a second drag while one is active', () => {
		const state = dragging();
		const next = reducer(state, { type: 'START_DRAG', sourceGroupId: 'B', sourceIndex: 0, itemId: 'other' });

		expect(next).toBe(state); // State unchanged
	});
});

// ============================================================================
// Target Updates
// ============================================================================

describe('Target updates', () => {
	it('should move the target into another group', () => {
		const state = reducer(dragging(), {
			type: 'UPDATE_TARGET',
			target: { groupId: 'B', index: 0 },
			placeholderGroupId: 'B',
		});

		expect(getDragTarget(state)).toEqual({ groupId: 'B', index: 0 });
		expect(state.drag?.placeholderGroupId).toBe('B');
		expect(isCrossGroupTarget(state)).toBe(true);
	});

	it('should return the same state for an identical target', () => {
		const state = dragging();
		const next = reducer(state, {
			type: 'UPDATE_TARGET',
			target: { groupId: 'A', index: 1 },
			placeholderGroupId: null,
		});

		expect(next).toBe(state);
	});

	it('should keep the source immutable', () => {
		const state = reducer(dragging(), {
			type: 'UPDATE_TARGET',
			target: { groupId: 'A', index: 0 },
			placeholderGroupId: null,
		});

		expect(state.drag?.sourceIndex).toBe(1);
		expect(isCrossGroupTarget(state)).toBe(false);
	});

	it('should ignore updates while idle', () => {
		const state = createInitialState();
		const next = reducer(state, {
			type: 'UPDATE_TARGET',
			target: { groupId: 'A', index: 0 },
			placeholderGroupId: null,
		});

		expect(next).toBe(state);
	});
});

// ============================================================================
// Commit / Cancel
// ============================================================================

describe('Commit and cancel', () => {
	it('should go dragging → committing → idle', () => {
		let state = dragging();
		state = reducer(state, { type: 'COMMIT_DRAG' });
		expect(state.phase).toBe('committing');
		expect(isDragging(state)).toBe(true);

		state = reducer(state, { type: 'FINISH_COMMIT' });
		expect(state).toEqual(createInitialState());
	});

	it('should cancel back to idle', () => {
		const state = reducer(dragging(), { type: 'CANCEL_DRAG' });
		expect(state).toEqual(createInitialState());
	});

	it('should NOT cancel while committing', () => {
		const committing = reducer(dragging(), { type: 'COMMIT_DRAG' });
		expect(reducer(committing, { type: 'CANCEL_DRAG' })).toBe(committing);
	});

	it('should NOT finish a commit that never started', () => {
		const state = dragging();
		expect(reducer(state, { type: 'FINISH_COMMIT' })).toBe(state);
	});
});

// ============================================================================
// canTransition
// ============================================================================

describe('canTransition', () => {
	it('should mirror the reducer guards', () => {
		const idle = createInitialState();
		const active = dragging();
		const committing = reducer(active, { type: 'COMMIT_DRAG' });

		expect(canTransition(idle, START)).toBe(true);
		expect(canTransition(active, START)).toBe(false);
		expect(canTransition(idle, { type: 'COMMIT_DRAG' })).toBe(false);
		expect(canTransition(active, { type: 'COMMIT_DRAG' })).toBe(true);
		expect(canTransition(active, { type: 'CANCEL_DRAG' })).toBe(true);
		expect(canTransition(committing, { type: 'FINISH_COMMIT' })).toBe(true);
		expect(canTransition(committing, { type: 'CANCEL_DRAG' })).toBe(false);
	});
});

// ============================================================================
// State Machine Instance
// ============================================================================

describe('State machine instance', () => {
	let machine: DragStateMachine;

	beforeEach(() => {
		machine = createStateMachine();
	});

	it('should notify listeners with the new state, the transition and the previous state', () => {
		const listener = vi.fn();
		machine.subscribe(listener);

		expect(machine.transition(START)).toBe(true);

		expect(listener).toHaveBeenCalledTimes(1);
		expect(listener).toHaveBeenCalledWith(machine.getState(), START, createInitialState());
	});

	it('should report and not notify a rejected transition', () => {
		const listener = vi.fn();
		machine.subscribe(listener);

		expect(machine.transition({ type: 'COMMIT_DRAG' })).toBe(false);

		expect(listener).not.toHaveBeenCalled();
		expect(machine.getState().phase).toBe('idle');
	});

	it('should report a target update that changes nothing', () => {
		machine.transition(START);
		const listener = vi.fn();
		machine.subscribe(listener);

		const moved = machine.transition({ type: 'UPDATE_TARGET', target: { groupId: 'A', index: 1 }, placeholderGroupId: null });

		expect(moved).toBe(false);
		expect(listener).not.toHaveBeenCalled();
	});

	it('should stop notifying after unsubscribe', () => {
		const listener = vi.fn();
		const unsubscribe = machine.subscribe(listener);
		unsubscribe();

		machine.transition(START);
		expect(listener).not.toHaveBeenCalled();
	});

	it('should accept an initial state', () => {
		const resumed = createStateMachine(dragging());
		expect(resumed.canTransition({ type: 'CANCEL_DRAG' })).toBe(true);
	});
});
