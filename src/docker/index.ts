/**
 * @module
 * Build container images with a choice of backends.
 */
export * from './backend';
export * from './buildx';
export * from './image-builder';
export * from './kaniko';
export * from './native';
export * from './tasks';
export * from './util';
