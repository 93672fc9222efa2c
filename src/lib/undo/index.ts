/**
 * Undo/Redo System Module Exports
 */

export * from './transaction';
