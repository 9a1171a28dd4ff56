/**
 * Engine exports.
 */

export * from './executor';
export * from './failure';
export * from './retry-policy';
export * from './stage-runner';
export * from './state-machine';
