/**
 * @hunkwise/diff - parsing, locating, applying and converting diff hunks
 */

export * from './errors.js';

export * from './engine/text.js';
export * from './engine/lineKind.js';
export * from './engine/hunkParser.js';
export * from './engine/document.js';
export * from './engine/formatConverter.js';
export * from './engine/sourceLocator.js';
export * from './engine/hunkApplier.js';
export * from './engine/headerFixup.js';
export * from './engine/refinement.js';
export * from './engine/hunkEditing.js';

export * from './workspace/pathGuard.js';
export * from './workspace/fileStore.js';
export * from './workspace/Workspace.js';
