/**
 * Models layer exports.
 */

export * from './firmware';
export * from './session';
