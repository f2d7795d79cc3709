/**
 * WOPI Library
 *
 * Re-exports all WOPI-related modules for clean imports.
 */

export * from './token.js';
export * from './lockManager.js';
export * from './officeLock.js';
export * from './conflict.js';
