export * from './columns';
export * from './errors';
export * from './field-grammar';
export * from './fields';
export * from './lazy';
export * from './loader';
export * from './orbital-element-record';
export * from './orbital-math';
export * from './partition';
export * from './serializer';
export * from './tle-epoch';
export * from './tle-record';
export * from './unit-tagged-record';
export * from './units';
