import { createEnum } from '../utils/create-enum.js';

const progressKind = createEnum([
  'started',
  'downloading',
  'postprocessing',
  'item-complete',
  'item-skipped',
  'item-failed',
  'session-complete',
  'cancelled',
] as const);

export const ProgressKind = progressKind.object;

export type ProgressKind = typeof progressKind.type;

