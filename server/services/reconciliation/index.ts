// ============================================================================
// RECONCILIATION LAYER - Module Index
// ============================================================================

export * from './reconciliation.types.js';
export * from './normalizer.js';
export * from './comparator.js';
export * from './scanner.js';
export * from './selection.js';
export * from './updater.js';
