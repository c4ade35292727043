/**
 * Drag lifecycle state machine
 *
 * Single source of truth for the card drag in progress.
 *
 * Key invariants:
 * 1. Only ONE card drag can be active at a time
 * 2. The source group and index are captured at drag start and immutable during the drag
 * 3. placeholderGroupId names the only group that may hold a placeholder
 * 4. Phases: idle → dragging → committing → idle (or dragging → idle on cancel)
 */

// ============================================================================
// State Types
// ============================================================================

export type DragPhase =
	| 'idle'
	| 'dragging'   // Placeholder follows the pointer
	| 'committing'; // Durable move being applied

export interface DragTarget {
	groupId: string;
	index: number;
}

export interface DragContext {
	/** Group the card was picked up from */
	sourceGroupId: string;
	/** Index the card was picked up from */
	sourceIndex: number;
	/** Id of the dragged card */
	itemId: string;
	/** Where the card would land if dropped now */
	target: DragTarget;
	/** Group currently holding the placeholder, if the target is a foreign group */
	placeholderGroupId: string | null;
}

export interface DragState {
	phase: DragPhase;
	drag: DragContext | null;
}

// ============================================================================
// State Machine
// ============================================================================

export type DragTransition =
	| { type: 'START_DRAG'; sourceGroupId: string; sourceIndex: number; itemId: string }
	| { type: 'UPDATE_TARGET'; target: DragTarget; placeholderGroupId: string | null }
	| { type: 'COMMIT_DRAG' }
	| { type: 'CANCEL_DRAG' }
	| { type: 'FINISH_COMMIT' };

export type DragStateListener = (state: DragState, transition: DragTransition, previous: DragState) => void;

export interface DragStateMachine {
	getState(): DragState;
	/** Apply a transition. Returns false when the guards rejected it or it changed nothing. */
	transition(action: DragTransition): boolean;
	subscribe(listener: DragStateListener): () => void;
	/** Check if a transition is valid from current state */
	canTransition(action: DragTransition): boolean;
}

export function createInitialState(): DragState {
	return {
		phase: 'idle',
		drag: null,
	};
}

/**
 * Pure state reducer - computes next state from current state and action
 */
export function reducer(state: DragState, action: DragTransition): DragState {
	switch (action.type) {
		case 'START_DRAG': {
			if (state.phase !== 'idle') {
				return state; // One drag at a time
			}
			const { sourceGroupId, sourceIndex, itemId } = action;
			return {
				phase: 'dragging',
				drag: {
					sourceGroupId,
					sourceIndex,
					itemId,
					target: { groupId: sourceGroupId, index: sourceIndex },
					placeholderGroupId: null,
				},
			};
		}

		case 'UPDATE_TARGET': {
			if (state.phase !== 'dragging' || !state.drag) {
				return state;
			}
			const { target, placeholderGroupId } = action;
			const current = state.drag;
			if (
				current.target.groupId === target.groupId &&
				current.target.index === target.index &&
				current.placeholderGroupId === placeholderGroupId
			) {
				return state;
			}
			return {
				...state,
				drag: { ...current, target: { ...target }, placeholderGroupId },
			};
		}

		case 'COMMIT_DRAG': {
			if (state.phase !== 'dragging') {
				return state;
			}
			return {
				...state,
				phase: 'committing',
			};
		}

		case 'CANCEL_DRAG': {
			if (state.phase !== 'dragging') {
				return state;
			}
			return createInitialState();
		}

		case 'FINISH_COMMIT': {
			if (state.phase !== 'committing') {
				return state;
			}
			return createInitialState();
		}

		default:
			return state;
	}
}

export function canTransition(state: DragState, action: DragTransition): boolean {
	switch (action.type) {
		case 'START_DRAG':
			return state.phase === 'idle';
		case 'UPDATE_TARGET':
			return state.phase === 'dragging' && state.drag !== null;
		case 'COMMIT_DRAG':
		case 'CANCEL_DRAG':
			return state.phase === 'dragging';
		case 'FINISH_COMMIT':
			return state.phase === 'committing';
		default:
			return false;
	}
}

export function createStateMachine(initialState: DragState = createInitialState()): DragStateMachine {
	let current = initialState;
	const listeners = new Set<DragStateListener>();

	return {
		getState: () => current,

		transition(action: DragTransition): boolean {
			const previous = current;
			current = reducer(previous, action);
			if (current === previous) return false;

			listeners.forEach((listener) => listener(current, action, previous));
			return true;
		},

		subscribe(listener: DragStateListener) {
			listeners.add(listener);
			return () => {
				listeners.delete(listener);
			};
		},

		canTransition: (action: DragTransition) => canTransition(current, action),
	};
}

// ============================================================================
// Derived State Helpers
// ============================================================================

export function isDragging(state: DragState): boolean {
	return state.phase === 'dragging' || state.phase === 'committing';
}

export function getDragTarget(state: DragState): DragTarget | null {
	return state.drag?.target ?? null;
}

/**
 * True when the current target lies in a group other than the source
 */
export function isCrossGroupTarget(state: DragState): boolean {
	const drag = state.drag;
	return drag !== null && drag.target.groupId !== drag.sourceGroupId;
}
