export type * from './primitives';
export type * from './declaration';
export type * from './registry';
export { PLACEHOLDER } from './declaration';
