import type { BoardItem, PlaceholderItem, RegularItem } from './types';

export const PLACEHOLDER_ITEM_ID = '__board-placeholder__';

export function createItem<T>(id: string, payload: T): RegularItem<T> {
	return { id, isPlaceholder: false, payload };
}

export function createPlaceholderItem(id: string = PLACEHOLDER_ITEM_ID): PlaceholderItem {
	return { id, isPlaceholder: true };
}

export function isPlaceholderItem<T>(item: BoardItem<T> | undefined): item is PlaceholderItem {
	return item !== undefined && item.isPlaceholder;
}

/**
 * Same id, same kind and, for regular items, the same payload reference
 */
export function defaultItemEquals<T>(a: BoardItem<T>, b: BoardItem<T>): boolean {
	if (a === b) return true;
	if (a.id !== b.id) return false;
	if (a.isPlaceholder || b.isPlaceholder) return a.isPlaceholder === b.isPlaceholder;
	return Object.is(a.payload, b.payload);
}
