/**
 * @groundwave/zk-core
 *
 * Leaf library of the zettelkasten cache: WebDAV access, Org parsing and
 * rendering, configuration and the shared error types.
 */

export * from './errors.js';
export * from './ids.js';
export * from './config.js';
export * from './webdav.js';
export * from './org.js';
export * from './render.js';
