import { createEnum } from '../utils/create-enum.js';

/**
 * How the tool is invoked for a request:
 * - `per-item`: the playlist is enumerated first, then one subprocess runs per entry
 * - `playlist`: one subprocess handles the whole URL and enumerates by itself
 */
const runMode = createEnum(['per-item', 'playlist'] as const);

export const RunMode = runMode.object;

export type RunMode = typeof runMode.type;

export const RunModeSchema = runMode.schema;

export const RunModeValues = runMode.values;

/**
 * What the session does after an item fails
 */
const failurePolicy = createEnum(['continue', 'abort'] as const);

export const FailurePolicy = failurePolicy.object;

export type FailurePolicy = typeof failurePolicy.type;

export const FailurePolicySchema = failurePolicy.schema;

export const FailurePolicyValues = failurePolicy.values;
