/**
 * File System - Primitives behind the file tasks
 */

export { type FileSystemAdapter } from './types.js';

export { NodeFileSystemAdapter, isErrnoException } from './node-adapter.js';
