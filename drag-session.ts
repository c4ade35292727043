/**
 * Drag session
 *
 * Translates drag lifecycle events from the gesture layer (start, hover,
 * leave, end, cancel) into placeholder and commit calls on the board.
 * Depends only on the delegate contracts, never on the concrete board.
 *
 * Within the source group the card's landing index is tracked without a
 * placeholder; the renderer reorders that list itself. A foreign group
 * gets the board's single placeholder at the hovered index.
 */

import { createPlaceholderItem } from './items';
import { BoardPreconditionError, invalid, skipped, type MutationOutcome } from './errors';
import {
	createStateMachine,
	type DragContext,
	type DragState,
	type DragStateListener,
	type DragStateMachine,
	type DragTarget,
} from './state-machine';
import type { DragCommitDelegate, PlaceholderDelegate, PlaceholderItem } from './types';

export interface DragSessionOptions {
	/** Builds the placeholder inserted into foreign groups (default: createPlaceholderItem()) */
	createPlaceholder?: (itemId: string) => PlaceholderItem;
	/** Shared state machine, e.g. to observe drags from elsewhere */
	stateMachine?: DragStateMachine;
}

export type DropResult =
	| { type: 'moved-within-group'; groupId: string; fromIndex: number; toIndex: number }
	| {
			type: 'moved-to-group';
			fromGroupId: string;
			fromIndex: number;
			toGroupId: string;
			toIndex: number;
	  }
	| { type: 'unchanged' }
	| { type: 'rejected'; outcome: MutationOutcome };

export interface DragSession {
	readonly state: DragState;
	readonly stateMachine: DragStateMachine;
	/** Pick up the card at index. Returns false if no drag could start. */
	start(groupId: string, index: number): boolean;
	/** Pointer is over groupId at index */
	hover(groupId: string, index: number): void;
	/** Pointer left groupId */
	leave(groupId: string): void;
	/** Drop: commit the move and return to idle */
	end(): DropResult;
	/** Abort: discard the placeholder, no commit */
	cancel(): void;
	subscribe(listener: DragStateListener): () => void;
}

function clamp(value: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, value));
}

export function createDragSession<T>(
	delegate: PlaceholderDelegate<T> & DragCommitDelegate,
	options: DragSessionOptions = {},
): DragSession {
	const { createPlaceholder = () => createPlaceholderItem(), stateMachine = createStateMachine() } = options;

	function setTarget(target: DragTarget, placeholderGroupId: string | null): void {
		stateMachine.transition({ type: 'UPDATE_TARGET', target, placeholderGroupId });
	}

	function commitDrop(drag: DragContext): DropResult {
		const { sourceGroupId, itemId, placeholderGroupId } = drag;

		// The source group may have changed since pickup; follow the card, not the slot
		const fromIndex = delegate.controller(sourceGroupId)?.indexOf(itemId) ?? -1;
		if (fromIndex === -1) {
			return reject(drag, skipped(`Card:[${itemId}] is no longer in Group:[${sourceGroupId}]`));
		}

		if (placeholderGroupId !== null) {
			const toIndex = delegate.controller(placeholderGroupId)?.placeholderIndex() ?? -1;
			if (toIndex === -1) return { type: 'unchanged' };

			const outcome = delegate.moveGroupItemToAnotherGroup(sourceGroupId, fromIndex, placeholderGroupId, toIndex);
			if (outcome.status !== 'applied') return reject(drag, outcome);
			return { type: 'moved-to-group', fromGroupId: sourceGroupId, fromIndex, toGroupId: placeholderGroupId, toIndex };
		}

		const toIndex = drag.target.index;
		if (toIndex === fromIndex) return { type: 'unchanged' };

		const outcome = delegate.moveGroupItem(sourceGroupId, fromIndex, toIndex);
		if (outcome.status !== 'applied') return reject(drag, outcome);
		return { type: 'moved-within-group', groupId: sourceGroupId, fromIndex, toIndex };
	}

	/** Nothing landed: the placeholder must not outlive the drag */
	function reject(drag: DragContext, outcome: MutationOutcome): DropResult {
		if (drag.placeholderGroupId !== null) delegate.removePlaceholder(drag.placeholderGroupId);
		return { type: 'rejected', outcome };
	}

	function clearPlaceholder(): void {
		const groupId = stateMachine.getState().drag?.placeholderGroupId;
		if (groupId) delegate.removePlaceholder(groupId);
	}

	return {
		get state() {
			return stateMachine.getState();
		},
		stateMachine,

		start(groupId: string, index: number): boolean {
			if (stateMachine.getState().phase !== 'idle') return false;
			const controller = delegate.controller(groupId);
			const item = controller?.itemAt(index);
			if (!controller || !controller.isDraggable || item === undefined || item.isPlaceholder) {
				return false;
			}

			if (!stateMachine.transition({ type: 'START_DRAG', sourceGroupId: groupId, sourceIndex: index, itemId: item.id })) {
				return false;
			}
			delegate.notifyDragStart(groupId, index);
			return true;
		},

		hover(groupId: string, index: number): void {
			const drag = stateMachine.getState().drag;
			if (stateMachine.getState().phase !== 'dragging' || !drag) return;

			const controller = delegate.controller(groupId);
			if (!controller) return;

			if (groupId === drag.sourceGroupId) {
				clearPlaceholder();
				setTarget({ groupId, index: clamp(index, 0, controller.length - 1) }, null);
				return;
			}
			if (!controller.isDraggable) return;

			if (drag.placeholderGroupId === groupId) {
				const target = clamp(index, 0, controller.length - 1);
				delegate.updatePlaceholder(groupId, target);
				setTarget({ groupId, index: target }, groupId);
				return;
			}

			clearPlaceholder();
			const target = clamp(index, 0, controller.length);
			const outcome = delegate.insertPlaceholder(groupId, target, createPlaceholder(drag.itemId));
			if (outcome.status === 'applied') {
				setTarget({ groupId, index: target }, groupId);
			} else {
				setTarget({ groupId: drag.sourceGroupId, index: drag.sourceIndex }, null);
			}
		},

		leave(groupId: string): void {
			const drag = stateMachine.getState().drag;
			if (stateMachine.getState().phase !== 'dragging' || !drag) return;
			if (drag.placeholderGroupId !== groupId) return;

			delegate.removePlaceholder(groupId);
			setTarget({ groupId: drag.sourceGroupId, index: drag.sourceIndex }, null);
		},

		end(): DropResult {
			const drag = stateMachine.getState().drag;
			if (stateMachine.getState().phase !== 'dragging' || !drag) return { type: 'unchanged' };

			stateMachine.transition({ type: 'COMMIT_DRAG' });
			try {
				return commitDrop(drag);
			} catch (error) {
				if (!(error instanceof BoardPreconditionError)) throw error;
				return reject(drag, invalid(error.code, error.message));
			} finally {
				stateMachine.transition({ type: 'FINISH_COMMIT' });
			}
		},

		cancel(): void {
			if (stateMachine.getState().phase !== 'dragging') return;
			clearPlaceholder();
			stateMachine.transition({ type: 'CANCEL_DRAG' });
		},

		subscribe(listener: DragStateListener): () => void {
			return stateMachine.subscribe(listener);
		},
	};
}
