/**
 * Group Controller
 *
 * Sole owner of one column's ordered item sequence. Every mutation goes
 * through here so the at-most-one-placeholder and unique-id rules hold
 * for the group, and listeners hear about a change only after it is applied.
 */

import { BoardPreconditionError } from './errors';
import { defaultItemEquals } from './items';
import { silentLogger } from './log';
import type {
	BoardItem,
	ChangeListener,
	GroupController,
	GroupControllerOptions,
	GroupData,
	GroupSnapshot,
	ItemPredicate,
	NotifyOptions,
} from './types';

export function createGroupController<T>(
	group: GroupData<T>,
	options: GroupControllerOptions<T> = {},
): GroupController<T> {
	const { logger = silentLogger, itemEquals = defaultItemEquals } = options;

	const id = group.id;
	let name = group.name ?? '';
	const items: BoardItem<T>[] = [];
	let isDraggable = true;
	let isDisposed = false;

	const listeners = new Set<ChangeListener>();

	for (const item of group.items) {
		assertUniqueId(item);
		assertSinglePlaceholder(item);
		items.push(item);
	}

	function assertUsable(): void {
		if (isDisposed) {
			throw new BoardPreconditionError('disposed', `Group:[${id}] controller used after dispose`);
		}
	}

	function assertSinglePlaceholder(item: BoardItem<T>): void {
		if (item.isPlaceholder && items.some((it) => it.isPlaceholder)) {
			throw new BoardPreconditionError('placeholder-exists', `Group:[${id}] already holds a placeholder`);
		}
	}

	function assertUniqueId(item: BoardItem<T>, ignoreIndex = -1): void {
		const existing = items.findIndex((it) => it.id === item.id);
		if (existing !== -1 && existing !== ignoreIndex) {
			throw new BoardPreconditionError(
				'duplicate-item',
				`Group:[${id}] already contains item:[${item.id}]`,
			);
		}
	}

	function isValidIndex(index: number): boolean {
		return Number.isInteger(index) && index >= 0 && index < items.length;
	}

	function notifyListeners(): void {
		for (const listener of Array.from(listeners)) {
			listener();
		}
	}

	function changed({ notify = true }: NotifyOptions): void {
		if (notify) notifyListeners();
	}

	const controller: GroupController<T> = {
		get id() {
			return id;
		},
		get name() {
			return name;
		},
		get items() {
			return items.slice();
		},
		get length() {
			return items.length;
		},
		get isDraggable() {
			return isDraggable;
		},
		get isDisposed() {
			return isDisposed;
		},

		snapshot(): GroupSnapshot<T> {
			return { id, name, items: items.slice(), isDraggable };
		},

		itemAt(index: number): BoardItem<T> | undefined {
			return isValidIndex(index) ? items[index] : undefined;
		},

		indexOf(itemId: string): number {
			return items.findIndex((item) => item.id === itemId);
		},

		placeholderIndex(): number {
			return items.findIndex((item) => item.isPlaceholder);
		},

		move(fromIndex: number, toIndex: number, options: NotifyOptions = {}): boolean {
			assertUsable();
			if (!isValidIndex(fromIndex) || !isValidIndex(toIndex)) return false;
			if (fromIndex === toIndex) return false;

			logger.debug(`Group:[${id}] move item from ${fromIndex} to ${toIndex}`);
			const [item] = items.splice(fromIndex, 1);
			items.splice(toIndex, 0, item);
			changed(options);
			return true;
		},

		add(item: BoardItem<T>, options: NotifyOptions = {}): void {
			controller.insert(items.length, item, options);
		},

		insert(index: number, item: BoardItem<T>, options: NotifyOptions = {}): void {
			assertUsable();
			if (!Number.isInteger(index) || index < 0 || index > items.length) {
				throw new BoardPreconditionError(
					'index-out-of-range',
					`Group:[${id}] insert index ${index} outside [0, ${items.length}]`,
				);
			}
			assertUniqueId(item);
			assertSinglePlaceholder(item);

			items.splice(index, 0, item);
			changed(options);
		},

		removeAt(index: number, options: NotifyOptions = {}): BoardItem<T> | undefined {
			assertUsable();
			if (!isValidIndex(index)) return undefined;

			const [item] = items.splice(index, 1);
			changed(options);
			return item;
		},

		removeWhere(predicate: ItemPredicate<T>, options: NotifyOptions = {}): BoardItem<T> | undefined {
			assertUsable();
			const index = items.findIndex(predicate);
			if (index === -1) return undefined;
			return controller.removeAt(index, options);
		},

		replace(index: number, item: BoardItem<T>, options: NotifyOptions = {}): void {
			assertUsable();
			const current = isValidIndex(index) ? items[index] : undefined;
			if (current === undefined) {
				throw new BoardPreconditionError(
					'index-out-of-range',
					`Group:[${id}] replace index ${index} outside [0, ${items.length})`,
				);
			}
			if (!current.isPlaceholder) {
				throw new BoardPreconditionError(
					'not-a-placeholder',
					`Group:[${id}] slot ${index} holds item:[${current.id}], not a placeholder`,
				);
			}
			assertUniqueId(item, index);

			items[index] = item;
			changed(options);
		},

		replaceOrInsertItem(item: BoardItem<T>, options: NotifyOptions = {}): boolean {
			assertUsable();
			const index = items.findIndex((it) => it.id === item.id);
			if (index === -1) {
				controller.insert(items.length, item, options);
				return true;
			}
			if (itemEquals(items[index], item)) return false;

			items[index] = item;
			changed(options);
			return true;
		},

		replaceOrInsertAll(incoming: readonly BoardItem<T>[], options: NotifyOptions = {}): boolean {
			assertUsable();
			const incomingById = new Map<string, BoardItem<T>>();
			for (const item of incoming) {
				if (incomingById.has(item.id)) {
					throw new BoardPreconditionError(
						'duplicate-item',
						`Group:[${id}] incoming items repeat id:[${item.id}]`,
					);
				}
				incomingById.set(item.id, item);
			}

			const next: BoardItem<T>[] = [];
			const kept = new Set<string>();
			let didChange = false;

			// Existing order wins; the live placeholder stays where the drag put it
			for (const existing of items) {
				if (existing.isPlaceholder && !incomingById.has(existing.id)) {
					next.push(existing);
					kept.add(existing.id);
					continue;
				}
				const replacement = incomingById.get(existing.id);
				if (replacement === undefined) {
					didChange = true;
					continue;
				}
				if (!itemEquals(existing, replacement)) didChange = true;
				next.push(replacement);
				kept.add(existing.id);
			}

			for (const item of incoming) {
				if (kept.has(item.id)) continue;
				next.push(item);
				didChange = true;
			}

			if (!didChange) return false;

			items.splice(0, items.length, ...next);
			changed(options);
			return true;
		},

		rename(nextName: string, options: NotifyOptions = {}): boolean {
			assertUsable();
			if (nextName === name) return false;
			name = nextName;
			changed(options);
			return true;
		},

		enableDragging(isEnabled: boolean): void {
			assertUsable();
			isDraggable = isEnabled;
		},

		subscribe(listener: ChangeListener): () => void {
			assertUsable();
			listeners.add(listener);
			return () => listeners.delete(listener);
		},

		notifyListeners(): void {
			assertUsable();
			notifyListeners();
		},

		dispose(): void {
			listeners.clear();
			isDisposed = true;
		},
	};

	return controller;
}
