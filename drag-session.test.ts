/**
 * Tests for the drag session: drag lifecycle events in, placeholder and
 * commit calls out, driven against a real board.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createBoardController } from './board-controller';
import { createDragSession, type DragSession } from './drag-session';
import { createItem, createPlaceholderItem, PLACEHOLDER_ITEM_ID } from './items';
import { silentLogger } from './log';
import type { BoardController, GroupData } from './types';

// ============================================================================
// Test Helpers
// ============================================================================

function group(id: string, itemIds: string[]): GroupData<string> {
	return { id, items: itemIds.map((itemId) => createItem(itemId, `payload-${itemId}`)) };
}

function itemIds(board: BoardController<string>, groupId: string): string[] {
	return board.controller(groupId)?.items.map((item) => item.id) ?? [];
}

function placeholderCount(board: BoardController<string>): number {
	return board.groups.reduce(
		(count, snapshot) => count + snapshot.items.filter((item) => item.isPlaceholder).length,
		0,
	);
}

const PH = PLACEHOLDER_ITEM_ID;

describe('Drag session', () => {
	let board: BoardController<string>;
	let session: DragSession;
	const onMoveGroupItem = vi.fn();
	const onMoveGroupItemToGroup = vi.fn();
	const onStartDraggingCard = vi.fn();

	beforeEach(() => {
		onMoveGroupItem.mockReset();
		onMoveGroupItemToGroup.mockReset();
		onStartDraggingCard.mockReset();
		board = createBoardController<string>({
			logger: silentLogger,
			onMoveGroupItem,
			onMoveGroupItemToGroup,
			onStartDraggingCard,
		});
		board.addGroups([group('A', ['1', '2', '3']), group('B', ['4', '5'])]);
		session = createDragSession(board);
	});

	// ========================================================================
	// Start
	// ========================================================================

	it('should start on a regular card and report it', () => {
		expect(session.start('A', 0)).toBe(true);

		expect(session.state.phase).toBe('dragging');
		expect(session.state.drag?.itemId).toBe('1');
		expect(onStartDraggingCard).toHaveBeenCalledWith('A', 0);
	});

	it('should refuse to start on a missing card, a disabled group or during a drag', () => {
		expect(session.start('A', 9)).toBe(false);
		expect(session.start('Z', 0)).toBe(false);

		board.controller('B')?.enableDragging(false);
		expect(session.start('B', 0)).toBe(false);

		expect(session.start('A', 0)).toBe(true);
		expect(session.start('A', 1)).toBe(false);
		expect(onStartDraggingCard).toHaveBeenCalledTimes(1);
	});

	// ========================================================================
	// Cross-group drag
	// ========================================================================

	it('should carry the placeholder across a foreign group and commit there', () => {
		session.start('A', 0);

		session.hover('B', 0);
		expect(itemIds(board, 'B')).toEqual([PH, '4', '5']);

		session.hover('B', 5);
		expect(itemIds(board, 'B')).toEqual(['4', '5', PH]);

		const result = session.end();

		expect(result).toEqual({ type: 'moved-to-group', fromGroupId: 'A', fromIndex: 0, toGroupId: 'B', toIndex: 2 });
		expect(itemIds(board, 'A')).toEqual(['2', '3']);
		expect(itemIds(board, 'B')).toEqual(['4', '5', '1']);
		expect(onMoveGroupItemToGroup).toHaveBeenCalledTimes(1);
		expect(onMoveGroupItemToGroup).toHaveBeenCalledWith('A', 0, 'B', 2);
		expect(session.state.phase).toBe('idle');
	});

	it('should keep a single placeholder when hopping between foreign groups', () => {
		board.addGroup(group('C', []));
		session.start('A', 0);

		session.hover('B', 1);
		session.hover('C', 4);

		expect(itemIds(board, 'B')).toEqual(['4', '5']);
		expect(itemIds(board, 'C')).toEqual([PH]);
		expect(placeholderCount(board)).toBe(1);
		expect(session.state.drag?.placeholderGroupId).toBe('C');
	});

	it('should not place a placeholder in a group that refuses drags', () => {
		board.controller('B')?.enableDragging(false);
		session.start('A', 0);

		session.hover('B', 0);

		expect(placeholderCount(board)).toBe(0);
		expect(session.state.drag?.target).toEqual({ groupId: 'A', index: 0 });
	});

	it('should drop the placeholder when the pointer leaves its group', () => {
		session.start('A', 0);
		session.hover('B', 0);

		session.leave('B');

		expect(itemIds(board, 'B')).toEqual(['4', '5']);
		expect(session.state.drag?.target).toEqual({ groupId: 'A', index: 0 });
		expect(session.end()).toEqual({ type: 'unchanged' });
		expect(onMoveGroupItem).not.toHaveBeenCalled();
		expect(onMoveGroupItemToGroup).not.toHaveBeenCalled();
	});

	// ========================================================================
	// Same-group drag
	// ========================================================================

	it('should commit an intra-group move', () => {
		session.start('A', 0);
		session.hover('A', 2);

		const result = session.end();

		expect(result).toEqual({ type: 'moved-within-group', groupId: 'A', fromIndex: 0, toIndex: 2 });
		expect(itemIds(board, 'A')).toEqual(['2', '3', '1']);
		expect(onMoveGroupItem).toHaveBeenCalledWith('A', 0, 2);
		expect(placeholderCount(board)).toBe(0);
	});

	it('should clear a foreign placeholder when returning to the source group', () => {
		session.start('A', 0);
		session.hover('B', 0);
		session.hover('A', 1);

		expect(placeholderCount(board)).toBe(0);
		expect(session.end()).toEqual({ type: 'moved-within-group', groupId: 'A', fromIndex: 0, toIndex: 1 });
		expect(itemIds(board, 'A')).toEqual(['2', '1', '3']);
	});

	// ========================================================================
	// Cancel and failures
	// ========================================================================

	it('should revert to the pre-drag board on cancel', () => {
		session.start('A', 1);
		session.hover('B', 1);

		session.cancel();

		expect(itemIds(board, 'A')).toEqual(['1', '2', '3']);
		expect(itemIds(board, 'B')).toEqual(['4', '5']);
		expect(session.state.phase).toBe('idle');
		expect(onMoveGroupItemToGroup).not.toHaveBeenCalled();
	});

	it('should report unchanged when ending without a drag', () => {
		expect(session.end()).toEqual({ type: 'unchanged' });
	});

	it('should walk the lifecycle phases in order', () => {
		const phases: string[] = [];
		session.subscribe((state) => phases.push(state.phase));

		session.start('A', 0);
		session.hover('B', 0);
		session.end();

		expect(phases).toEqual(['dragging', 'dragging', 'committing', 'idle']);
	});

	// ========================================================================
	// Board changes mid-drag
	// ========================================================================

	it('should clean up the placeholder when the last card vanished mid-drag', () => {
		session.start('A', 2);
		session.hover('B', 0);
		board.removeGroupItem('A', '3');

		const result = session.end();

		expect(result).toMatchObject({ type: 'rejected', outcome: { status: 'skipped' } });
		expect(itemIds(board, 'B')).toEqual(['4', '5']);
		expect(placeholderCount(board)).toBe(0);
		expect(session.state.phase).toBe('idle');
	});

	it('should not move a neighbour when the dragged card was removed', () => {
		session.start('A', 0);
		session.hover('B', 0);
		board.removeGroupItem('A', '1');

		const result = session.end();

		expect(result).toEqual({
			type: 'rejected',
			outcome: { status: 'skipped', reason: 'Card:[1] is no longer in Group:[A]' },
		});
		expect(itemIds(board, 'A')).toEqual(['2', '3']);
		expect(itemIds(board, 'B')).toEqual(['4', '5']);
		expect(onMoveGroupItemToGroup).not.toHaveBeenCalled();
	});

	it('should survive the source group disappearing and allow the next drag', () => {
		board.addGroup(group('C', []));
		session.start('A', 0);
		session.hover('B', 0);
		board.removeGroup('A');

		const result = session.end();

		expect(result).toMatchObject({ type: 'rejected', outcome: { status: 'skipped' } });
		expect(itemIds(board, 'B')).toEqual(['4', '5']);
		expect(session.state.phase).toBe('idle');

		expect(session.start('B', 0)).toBe(true);
		session.hover('C', 0);
		expect(itemIds(board, 'C')).toEqual([PH]);
	});

	it('should follow the dragged card when setGroups shifts the source group', () => {
		session.start('A', 1);
		session.hover('B', 0);
		board.setGroups([group('A', ['2', '3']), group('B', ['4', '5'])]);
		expect(itemIds(board, 'B')).toEqual([PH, '4', '5']);

		const result = session.end();

		expect(result).toEqual({ type: 'moved-to-group', fromGroupId: 'A', fromIndex: 0, toGroupId: 'B', toIndex: 0 });
		expect(itemIds(board, 'A')).toEqual(['3']);
		expect(itemIds(board, 'B')).toEqual(['2', '4', '5']);
		expect(onMoveGroupItemToGroup).toHaveBeenCalledWith('A', 0, 'B', 0);
	});

	it('should follow the dragged card within its group after an external move', () => {
		session.start('A', 0);
		session.hover('A', 2);
		board.moveGroupItem('A', 0, 1);
		expect(itemIds(board, 'A')).toEqual(['2', '1', '3']);

		const result = session.end();

		expect(result).toEqual({ type: 'moved-within-group', groupId: 'A', fromIndex: 1, toIndex: 2 });
		expect(itemIds(board, 'A')).toEqual(['2', '3', '1']);
		expect(onMoveGroupItem).toHaveBeenLastCalledWith('A', 1, 2);
	});

	it('should turn a rejected commit into a result and remove the placeholder', () => {
		session.start('A', 0);
		session.hover('B', 0);
		board.addGroupItem('B', createItem('1', 'copy'));

		const result = session.end();

		expect(result).toMatchObject({ type: 'rejected', outcome: { status: 'invalid', code: 'duplicate-item' } });
		expect(itemIds(board, 'A')).toEqual(['1', '2', '3']);
		expect(itemIds(board, 'B')).toEqual(['4', '5', '1']);
		expect(placeholderCount(board)).toBe(0);
		expect(session.state.phase).toBe('idle');
	});

	it('should commit onto a placeholder that carries the dragged card id', () => {
		const keyed = createDragSession(board, { createPlaceholder: (itemId) => createPlaceholderItem(itemId) });
		keyed.start('A', 0);
		keyed.hover('B', 0);
		expect(itemIds(board, 'B')).toEqual(['1', '4', '5']);
		expect(placeholderCount(board)).toBe(1);

		const result = keyed.end();

		expect(result).toEqual({ type: 'moved-to-group', fromGroupId: 'A', fromIndex: 0, toGroupId: 'B', toIndex: 0 });
		expect(itemIds(board, 'A')).toEqual(['2', '3']);
		expect(itemIds(board, 'B')).toEqual(['1', '4', '5']);
		expect(placeholderCount(board)).toBe(0);
	});
});
