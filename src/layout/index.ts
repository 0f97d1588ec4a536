export { solve } from './solve';
export { monospaceMeasurer } from './measure';
export { pointOf } from './position';
export type * from './types';
