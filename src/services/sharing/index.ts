export { SharePropagator } from './propagator';
export type { SharePropagatorOptions } from './propagator';
