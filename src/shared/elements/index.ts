/**
 * Elements Module
 *
 * Path tokens, metadata normalization, the element kind registry and the
 * editable element file.
 */

export * from './pathCodec';
export * from './metadata';
export * from './basename';
export * from './kinds';
export * from './element';
export * from './elementFile';
