// @whatif/core — barrel export

// 타입
export type { Scope } from './types.js';
export type { Guard } from './scene.js';
export type { ReadonlyCursor } from './cursor.js';
export type { Equatable } from './equality.js';
export type { Imaginable, ImaginableApi, ImaginableOptions } from './imaginable.js';
export type { BootstrapOptions, EngineDefaults } from './runtime.js';

// 에러
export { IncomparablePointError, UnbalancedActivationError } from './errors.js';

// 엔진
export { imaginable } from './imaginable.js';
export { Activation, PointBuilder } from './activation.js';
export { CompositeActivation } from './composite.js';
export { Scene, chainOf, chainLength } from './scene.js';
export { combineAll, imagining } from './combinators.js';
export { pointEquals } from './equality.js';
export {
  bootstrapEngine,
  configureEngine,
  getEngineDefaults,
  resetEngineDefaults,
} from './runtime.js';
