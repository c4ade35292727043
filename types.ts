import type { BoardLogger, LogLevel } from './log';
import type { MutationOutcome } from './errors';

// ============================================================================
// Item Types
// ============================================================================

/**
 * A card owned by the caller. The payload is opaque to the board.
 */
export interface RegularItem<T> {
	readonly id: string;
	readonly isPlaceholder: false;
	readonly payload: T;
}

/**
 * Marker for the slot a dragged card would land in. Carries no payload.
 */
export interface PlaceholderItem {
	readonly id: string;
	readonly isPlaceholder: true;
}

export type BoardItem<T> = RegularItem<T> | PlaceholderItem;

export type ItemPredicate<T> = (item: BoardItem<T>, index: number) => boolean;

export type ItemEquals<T> = (a: BoardItem<T>, b: BoardItem<T>) => boolean;

// ============================================================================
// Group Types
// ============================================================================

/**
 * Caller-supplied column description. Items are copied into the
 * controller; later changes to this array are not observed.
 */
export interface GroupData<T> {
	id: string;
	name?: string;
	items: readonly BoardItem<T>[];
}

/**
 * Anything a reorderable list can be built from
 */
export interface ReorderSourceItem {
	readonly id: string;
}

export interface ReorderSource<I extends ReorderSourceItem = ReorderSourceItem> {
	readonly identifier: string;
	readonly items: readonly I[];
}

export interface GroupSnapshot<T> extends ReorderSourceItem {
	readonly id: string;
	readonly name: string;
	readonly items: readonly BoardItem<T>[];
	readonly isDraggable: boolean;
}

export type ChangeListener = () => void;

export interface NotifyOptions {
	/** Set to false to batch several calls and notify once (default: true) */
	notify?: boolean;
}

export interface GroupControllerOptions<T> {
	logger?: BoardLogger;
	itemEquals?: ItemEquals<T>;
}

export interface GroupController<T> {
	readonly id: string;
	readonly name: string;
	/** Fresh copy of the ordered items */
	readonly items: readonly BoardItem<T>[];
	readonly length: number;
	readonly isDraggable: boolean;
	readonly isDisposed: boolean;

	snapshot(): GroupSnapshot<T>;
	itemAt(index: number): BoardItem<T> | undefined;
	indexOf(itemId: string): number;
	placeholderIndex(): number;

	/**
	 * Move the item at fromIndex to toIndex.
	 * Returns false for out-of-range indices or when fromIndex === toIndex.
	 */
	move(fromIndex: number, toIndex: number, options?: NotifyOptions): boolean;

	add(item: BoardItem<T>, options?: NotifyOptions): void;

	/**
	 * Insert at index in [0, length]. Throws on a bad index or a duplicate id.
	 */
	insert(index: number, item: BoardItem<T>, options?: NotifyOptions): void;

	removeAt(index: number, options?: NotifyOptions): BoardItem<T> | undefined;

	removeWhere(predicate: ItemPredicate<T>, options?: NotifyOptions): BoardItem<T> | undefined;

	/**
	 * Overwrite a placeholder slot with the real item. Throws if the slot
	 * does not hold a placeholder.
	 */
	replace(index: number, item: BoardItem<T>, options?: NotifyOptions): void;

	replaceOrInsertItem(item: BoardItem<T>, options?: NotifyOptions): boolean;

	/**
	 * Reconcile against an incoming item list. Returns whether anything changed.
	 */
	replaceOrInsertAll(items: readonly BoardItem<T>[], options?: NotifyOptions): boolean;

	rename(name: string, options?: NotifyOptions): boolean;

	enableDragging(isEnabled: boolean): void;

	subscribe(listener: ChangeListener): () => void;
	notifyListeners(): void;
	dispose(): void;
}

// ============================================================================
// Board Callbacks
// ============================================================================

export type OnMoveGroup = (
	fromGroupId: string,
	fromIndex: number,
	toGroupId: string,
	toIndex: number,
) => void;

export type OnMoveGroupItem = (groupId: string, fromIndex: number, toIndex: number) => void;

export type OnMoveGroupItemToGroup = (
	fromGroupId: string,
	fromIndex: number,
	toGroupId: string,
	toIndex: number,
) => void;

export type OnStartDraggingCard = (groupId: string, index: number) => void;

// ============================================================================
// Coordinator Contracts
// ============================================================================

/**
 * What the drag layer needs to move the single placeholder around while a
 * gesture is live.
 */
export interface PlaceholderDelegate<T> {
	/** Data-source side: the ordered groups as reorder-source items */
	readonly groups: readonly GroupSnapshot<T>[];
	controller(groupId: string): GroupController<T> | undefined;
	insertPlaceholder(groupId: string, index: number, item: PlaceholderItem): MutationOutcome;
	removePlaceholder(groupId: string): boolean;
	updatePlaceholder(groupId: string, newIndex: number): void;
}

/**
 * What the drag layer calls once the gesture ends.
 */
export interface DragCommitDelegate {
	notifyDragStart(groupId: string, index: number): void;
	moveGroupItem(groupId: string, fromIndex: number, toIndex: number): MutationOutcome;
	moveGroupItemToAnotherGroup(
		fromGroupId: string,
		fromIndex: number,
		toGroupId: string,
		toIndex: number,
	): MutationOutcome;
}

// ============================================================================
// Board Controller
// ============================================================================

export interface BoardControllerOptions<T> {
	/** Called when a group moves from one position to another */
	onMoveGroup?: OnMoveGroup;
	/** Called when an item moves within its group */
	onMoveGroupItem?: OnMoveGroupItem;
	/** Called when an item moves to another group */
	onMoveGroupItemToGroup?: OnMoveGroupItemToGroup;
	/** Called when a drag gesture begins on a card */
	onStartDraggingCard?: OnStartDraggingCard;

	/** Diagnostics sink. Defaults to a console logger at `logLevel` */
	logger?: BoardLogger;
	/** Level for the default console logger (default: 'warn') */
	logLevel?: LogLevel;

	/**
	 * When true (default), precondition violations throw
	 * BoardPreconditionError. When false they are logged and returned as an
	 * 'invalid' outcome.
	 */
	strict?: boolean;

	/** Item equality used by reconciliation (default: id, kind and payload identity) */
	itemEquals?: ItemEquals<T>;
}

export interface BoardController<T>
	extends PlaceholderDelegate<T>,
		DragCommitDelegate,
		ReorderSource<GroupSnapshot<T>> {
	readonly groupIds: string[];

	addGroup(group: GroupData<T>, options?: NotifyOptions): MutationOutcome;
	insertGroup(index: number, group: GroupData<T>, options?: NotifyOptions): MutationOutcome;
	addGroups(groups: readonly GroupData<T>[], options?: NotifyOptions): void;
	setGroups(groups: readonly GroupData<T>[]): boolean;
	removeGroup(groupId: string, options?: NotifyOptions): MutationOutcome;
	removeGroups(groupIds: readonly string[], options?: NotifyOptions): void;
	clear(options?: NotifyOptions): void;

	getGroupController(groupId: string): GroupController<T> | undefined;

	moveGroup(fromIndex: number, toIndex: number, options?: NotifyOptions): MutationOutcome;

	addGroupItem(groupId: string, item: BoardItem<T>, options?: NotifyOptions): MutationOutcome;
	insertGroupItem(
		groupId: string,
		index: number,
		item: BoardItem<T>,
		options?: NotifyOptions,
	): MutationOutcome;
	removeGroupItem(groupId: string, itemId: string, options?: NotifyOptions): MutationOutcome;
	updateGroupItem(groupId: string, item: BoardItem<T>, options?: NotifyOptions): MutationOutcome;

	enableGroupDragging(isEnabled: boolean): void;

	/** Total items across all groups, placeholders included */
	itemCount(): number;

	subscribe(listener: ChangeListener): () => void;
	notifyListeners(): void;
}

// Re-export drag types for convenience
import type { DragPhase, DragState, DragTarget, DragTransition } from './state-machine';
export type { DragPhase, DragState, DragTarget, DragTransition };
