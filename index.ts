// Core exports
export { createBoardController } from './board-controller';
export { createGroupController } from './group-controller';
export type * from './types';

// Items
export { createItem, createPlaceholderItem, defaultItemEquals, isPlaceholderItem, PLACEHOLDER_ITEM_ID } from './items';

// Errors and outcomes
export {
	APPLIED,
	BoardPreconditionError,
	invalid,
	isApplied,
	notFound,
	skipped,
	type MutationOutcome,
	type PreconditionCode,
} from './errors';

// Diagnostics
export { createConsoleLogger, silentLogger, type BoardLogger, type ConsoleLoggerOptions, type LogLevel } from './log';

// Drag lifecycle
export {
	canTransition,
	createInitialState,
	createStateMachine,
	getDragTarget,
	isCrossGroupTarget,
	isDragging,
	reducer,
	type DragContext,
	type DragStateListener,
	type DragStateMachine,
} from './state-machine';
export { createDragSession, type DragSession, type DragSessionOptions, type DropResult } from './drag-session';
