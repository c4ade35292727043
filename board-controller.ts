/**
 * Board Controller
 *
 * Owns the ordered group-id list and one GroupController per group. This is
 * the public mutation surface: group lifecycle, whole-board reconciliation,
 * item pass-throughs, committed moves and the placeholder protocol used by
 * the drag layer.
 *
 * Board listeners hear about group-level structure (add, remove, reorder,
 * reconcile). Item changes notify the owning group's listeners.
 */

import {
	APPLIED,
	BoardPreconditionError,
	invalid,
	notFound,
	skipped,
	type MutationOutcome,
} from './errors';
import { createGroupController } from './group-controller';
import { isPlaceholderItem } from './items';
import { createConsoleLogger } from './log';
import type {
	BoardController,
	BoardControllerOptions,
	BoardItem,
	ChangeListener,
	GroupController,
	GroupData,
	GroupSnapshot,
	NotifyOptions,
	PlaceholderItem,
} from './types';

interface PlaceholderLocation {
	groupId: string;
	index: number;
}

export function createBoardController<T>(
	options: BoardControllerOptions<T> = {},
): BoardController<T> {
	const {
		onMoveGroup,
		onMoveGroupItem,
		onMoveGroupItemToGroup,
		onStartDraggingCard,
		logLevel = 'warn',
		strict = true,
		itemEquals,
	} = options;
	const logger = options.logger ?? createConsoleLogger({ scope: 'board', level: logLevel });

	const order: string[] = [];
	const controllers = new Map<string, GroupController<T>>();
	const listeners = new Set<ChangeListener>();

	function notifyListeners(): void {
		for (const listener of Array.from(listeners)) {
			listener();
		}
	}

	/**
	 * Log soft failures; throw precondition violations unless running lenient
	 */
	function report(operation: string, outcome: MutationOutcome): MutationOutcome {
		switch (outcome.status) {
			case 'applied':
				break;
			case 'skipped':
				logger.debug(`${operation} skipped: ${outcome.reason}`);
				break;
			case 'not-found':
				logger.warn(`${operation} failed. Group:[${outcome.groupId}] does not exist`);
				break;
			case 'invalid':
				if (strict) {
					throw new BoardPreconditionError(outcome.code, `${operation}: ${outcome.reason}`);
				}
				logger.warn(`${operation} rejected: ${outcome.reason}`);
				break;
		}
		return outcome;
	}

	/**
	 * Run a controller mutation, turning its precondition errors into outcomes
	 */
	function attempt(operation: string, run: () => MutationOutcome): MutationOutcome {
		let outcome: MutationOutcome;
		try {
			outcome = run();
		} catch (error) {
			if (!(error instanceof BoardPreconditionError)) throw error;
			outcome = invalid(error.code, error.message);
		}
		return report(operation, outcome);
	}

	function createController(group: GroupData<T>): GroupController<T> {
		return createGroupController(group, { logger, itemEquals });
	}

	function findPlaceholder(): PlaceholderLocation | null {
		for (const groupId of order) {
			const index = controllers.get(groupId)?.placeholderIndex() ?? -1;
			if (index !== -1) return { groupId, index };
		}
		return null;
	}

	/**
	 * A placeholder may only enter the board when none is present, unless it
	 * is the same placeholder being replaced in place.
	 */
	function placeholderConflict(
		groupId: string,
		item: BoardItem<T>,
	): MutationOutcome | null {
		if (!item.isPlaceholder) return null;
		const existing = findPlaceholder();
		if (existing === null) return null;
		const sameSlot =
			existing.groupId === groupId &&
			controllers.get(groupId)?.itemAt(existing.index)?.id === item.id;
		if (sameSlot) return null;
		return invalid(
			'placeholder-exists',
			`Group:[${existing.groupId}] already holds the board's placeholder`,
		);
	}

	function isGroupIndex(index: number, upperInclusive: boolean): boolean {
		const upper = upperInclusive ? order.length : order.length - 1;
		return Number.isInteger(index) && index >= 0 && index <= upper;
	}

	function snapshots(): GroupSnapshot<T>[] {
		return order.flatMap((groupId) => {
			const controller = controllers.get(groupId);
			return controller ? [controller.snapshot()] : [];
		});
	}

	function disposeGroup(groupId: string): void {
		controllers.get(groupId)?.dispose();
		controllers.delete(groupId);
	}

	const board: BoardController<T> = {
		get identifier() {
			return 'BoardController';
		},
		get groups() {
			return snapshots();
		},
		get items() {
			return snapshots();
		},
		get groupIds() {
			return order.slice();
		},

		// ====================================================================
		// Groups
		// ====================================================================

		addGroup(group: GroupData<T>, options: NotifyOptions = {}): MutationOutcome {
			return board.insertGroup(order.length, group, options);
		},

		insertGroup(index: number, group: GroupData<T>, { notify = true }: NotifyOptions = {}): MutationOutcome {
			const operation = 'insertGroup';
			if (controllers.has(group.id)) {
				return report(operation, skipped(`Group:[${group.id}] already exists`));
			}
			if (!isGroupIndex(index, true)) {
				return report(
					operation,
					invalid('index-out-of-range', `index ${index} outside [0, ${order.length}]`),
				);
			}

			return attempt(operation, () => {
				const controller = createController(group);
				order.splice(index, 0, group.id);
				controllers.set(group.id, controller);
				if (notify) notifyListeners();
				return APPLIED;
			});
		},

		addGroups(groups: readonly GroupData<T>[], { notify = true }: NotifyOptions = {}): void {
			let added = 0;
			for (const group of groups) {
				if (board.addGroup(group, { notify: false }).status === 'applied') added++;
			}
			if (added > 0 && notify) notifyListeners();
		},

		setGroups(groups: readonly GroupData<T>[]): boolean {
			const incomingIds = groups.map((group) => group.id);
			const incoming = new Set(incomingIds);
			if (incoming.size !== incomingIds.length) {
				report('setGroups', invalid('duplicate-group', 'incoming groups repeat an id'));
				return false;
			}
			for (const group of groups) {
				const itemIds = new Set(group.items.map((item) => item.id));
				if (itemIds.size !== group.items.length) {
					report('setGroups', invalid('duplicate-item', `Group:[${group.id}] repeats an item id`));
					return false;
				}
			}

			let didChange = order.length !== groups.length;

			// Drop groups that are no longer present
			for (let i = order.length - 1; i >= 0; i--) {
				const groupId = order[i];
				if (!incoming.has(groupId)) {
					order.splice(i, 1);
					disposeGroup(groupId);
					didChange = true;
				}
			}

			// Append new groups, reconcile the items of existing ones
			for (const group of groups) {
				const existing = controllers.get(group.id);
				if (!existing) {
					controllers.set(group.id, createController(group));
					order.push(group.id);
					didChange = true;
					continue;
				}

				const renamed = group.name !== undefined && existing.rename(group.name, { notify: false });
				const reconciled = existing.replaceOrInsertAll(group.items, { notify: false });
				if (renamed || reconciled) {
					existing.notifyListeners();
					didChange = true;
				}
			}

			// Match the incoming order exactly
			const sameOrder = order.every((groupId, i) => groupId === incomingIds[i]);
			if (!sameOrder) {
				order.splice(0, order.length, ...incomingIds);
				didChange = true;
			}

			if (didChange) {
				logger.debug(`setGroups applied, groups: [${order.join(', ')}]`);
				notifyListeners();
			}
			return didChange;
		},

		removeGroup(groupId: string, { notify = true }: NotifyOptions = {}): MutationOutcome {
			const index = order.indexOf(groupId);
			if (index === -1) {
				return report('removeGroup', notFound(groupId));
			}

			order.splice(index, 1);
			disposeGroup(groupId);
			if (notify) notifyListeners();
			return APPLIED;
		},

		removeGroups(groupIds: readonly string[], { notify = true }: NotifyOptions = {}): void {
			let removed = 0;
			for (const groupId of groupIds) {
				if (board.removeGroup(groupId, { notify: false }).status === 'applied') removed++;
			}
			if (removed > 0 && notify) notifyListeners();
		},

		clear({ notify = true }: NotifyOptions = {}): void {
			for (const controller of controllers.values()) {
				controller.dispose();
			}
			controllers.clear();
			order.length = 0;
			if (notify) notifyListeners();
		},

		getGroupController(groupId: string): GroupController<T> | undefined {
			const controller = controllers.get(groupId);
			if (!controller) {
				logger.warn(`Group:[${groupId}]'s controller does not exist`);
			}
			return controller;
		},

		controller(groupId: string): GroupController<T> | undefined {
			return controllers.get(groupId);
		},

		moveGroup(fromIndex: number, toIndex: number, { notify = true }: NotifyOptions = {}): MutationOutcome {
			const operation = 'moveGroup';
			if (!isGroupIndex(fromIndex, false) || !isGroupIndex(toIndex, false)) {
				return report(
					operation,
					invalid('index-out-of-range', `cannot move ${fromIndex} to ${toIndex} among ${order.length} groups`),
				);
			}
			if (fromIndex === toIndex) {
				return report(operation, skipped(`group already at ${toIndex}`));
			}

			const toGroupId = order[toIndex];
			const [fromGroupId] = order.splice(fromIndex, 1);
			order.splice(toIndex, 0, fromGroupId);

			onMoveGroup?.(fromGroupId, fromIndex, toGroupId, toIndex);
			if (notify) notifyListeners();
			return APPLIED;
		},

		// ====================================================================
		// Items
		// ====================================================================

		moveGroupItem(groupId: string, fromIndex: number, toIndex: number): MutationOutcome {
			const operation = 'moveGroupItem';
			const controller = controllers.get(groupId);
			if (!controller) return report(operation, notFound(groupId));

			if (!controller.move(fromIndex, toIndex)) {
				return report(operation, skipped(`Group:[${groupId}] cannot move ${fromIndex} to ${toIndex}`));
			}
			onMoveGroupItem?.(groupId, fromIndex, toIndex);
			return APPLIED;
		},

		addGroupItem(groupId: string, item: BoardItem<T>, options: NotifyOptions = {}): MutationOutcome {
			const controller = controllers.get(groupId);
			if (!controller) return report('addGroupItem', notFound(groupId));
			return board.insertGroupItem(groupId, controller.length, item, options);
		},

		insertGroupItem(
			groupId: string,
			index: number,
			item: BoardItem<T>,
			options: NotifyOptions = {},
		): MutationOutcome {
			const operation = 'insertGroupItem';
			const controller = controllers.get(groupId);
			if (!controller) return report(operation, notFound(groupId));

			const conflict = placeholderConflict(groupId, item);
			if (conflict) return report(operation, conflict);

			return attempt(operation, () => {
				controller.insert(index, item, options);
				return APPLIED;
			});
		},

		removeGroupItem(groupId: string, itemId: string, options: NotifyOptions = {}): MutationOutcome {
			const operation = 'removeGroupItem';
			const controller = controllers.get(groupId);
			if (!controller) return report(operation, notFound(groupId));

			const removed = controller.removeWhere((item) => item.id === itemId, options);
			if (removed === undefined) {
				logger.warn(`${operation} failed. Item:[${itemId}] is not in Group:[${groupId}]`);
				return skipped(`Item:[${itemId}] is not in Group:[${groupId}]`);
			}
			return APPLIED;
		},

		updateGroupItem(groupId: string, item: BoardItem<T>, options: NotifyOptions = {}): MutationOutcome {
			const operation = 'updateGroupItem';
			const controller = controllers.get(groupId);
			if (!controller) return report(operation, notFound(groupId));

			const conflict = placeholderConflict(groupId, item);
			if (conflict) return report(operation, conflict);

			return attempt(operation, () =>
				controller.replaceOrInsertItem(item, options)
					? APPLIED
					: skipped(`Item:[${item.id}] unchanged`),
			);
		},

		moveGroupItemToAnotherGroup(
			fromGroupId: string,
			fromIndex: number,
			toGroupId: string,
			toIndex: number,
		): MutationOutcome {
			const operation = 'moveGroupItemToAnotherGroup';
			const from = controllers.get(fromGroupId);
			const to = controllers.get(toGroupId);
			if (!from) {
				return report(operation, invalid('unknown-group', `Group:[${fromGroupId}] does not exist`));
			}
			if (!to) {
				return report(operation, invalid('unknown-group', `Group:[${toGroupId}] does not exist`));
			}
			if (fromGroupId === toGroupId) {
				return report(operation, invalid('same-group', `use moveGroupItem within Group:[${fromGroupId}]`));
			}

			const moving = from.itemAt(fromIndex);
			if (moving === undefined) {
				return report(operation, skipped(`Group:[${fromGroupId}] has no item at ${fromIndex}`));
			}

			// Check the destination before touching the source: never a partial move
			const slot = to.itemAt(toIndex);
			if (!isPlaceholderItem(slot)) {
				return report(
					operation,
					invalid('not-a-placeholder', `Group:[${toGroupId}] slot ${toIndex} does not hold a placeholder`),
				);
			}
			const existing = to.indexOf(moving.id);
			if (existing !== -1 && existing !== toIndex) {
				return report(
					operation,
					invalid('duplicate-item', `Group:[${toGroupId}] already contains item:[${moving.id}]`),
				);
			}

			from.removeAt(fromIndex);
			to.replace(toIndex, moving);
			logger.debug(`move ${fromGroupId}:${fromIndex} to ${toGroupId}:${toIndex}`);

			onMoveGroupItemToGroup?.(fromGroupId, fromIndex, toGroupId, toIndex);
			return APPLIED;
		},

		enableGroupDragging(isEnabled: boolean): void {
			for (const controller of controllers.values()) {
				controller.enableDragging(isEnabled);
			}
		},

		itemCount(): number {
			let count = 0;
			for (const controller of controllers.values()) {
				count += controller.length;
			}
			return count;
		},

		// ====================================================================
		// Placeholder protocol
		// ====================================================================

		notifyDragStart(groupId: string, index: number): void {
			if (!controllers.has(groupId)) {
				report('notifyDragStart', notFound(groupId));
				return;
			}
			onStartDraggingCard?.(groupId, index);
		},

		insertPlaceholder(groupId: string, index: number, item: PlaceholderItem): MutationOutcome {
			const operation = 'insertPlaceholder';
			const controller = controllers.get(groupId);
			if (!controller) return report(operation, notFound(groupId));

			const existing = findPlaceholder();
			if (existing !== null) {
				return report(
					operation,
					invalid('placeholder-exists', `Group:[${existing.groupId}] already holds the board's placeholder`),
				);
			}

			return attempt(operation, () => {
				controller.insert(index, item);
				logger.trace(`Group:[${groupId}] insert placeholder at ${index}`);
				return APPLIED;
			});
		},

		removePlaceholder(groupId: string): boolean {
			const controller = board.getGroupController(groupId);
			if (!controller) return false;

			const index = controller.placeholderIndex();
			if (index === -1) return false;

			controller.removeAt(index);
			logger.debug(`Group:[${groupId}] remove placeholder, current count: ${controller.length}`);
			return true;
		},

		updatePlaceholder(groupId: string, newIndex: number): void {
			const operation = 'updatePlaceholder';
			const controller = controllers.get(groupId);
			if (!controller) {
				report(operation, notFound(groupId));
				return;
			}

			const index = controller.placeholderIndex();
			if (index === -1 || index === newIndex) return;

			if (!Number.isInteger(newIndex) || newIndex < 0 || newIndex >= controller.length) {
				report(
					operation,
					invalid('index-out-of-range', `Group:[${groupId}] index ${newIndex} outside [0, ${controller.length})`),
				);
				return;
			}

			logger.trace(`update ${groupId}:${index} to ${groupId}:${newIndex}`);
			const placeholder = controller.removeAt(index, { notify: false });
			if (placeholder) {
				controller.insert(newIndex, placeholder, { notify: false });
				controller.notifyListeners();
			}
		},

		// ====================================================================
		// Observation
		// ====================================================================

		subscribe(listener: ChangeListener): () => void {
			listeners.add(listener);
			return () => listeners.delete(listener);
		},

		notifyListeners,
	};

	return board;
}
