/**
 * Token Estimator - Public API
 */

export { TokenEstimator, createTokenEstimator, DEFAULT_ENCODING } from './TokenEstimator';
export type { TokenEstimatorOptions, TailWindow } from './TokenEstimator';
