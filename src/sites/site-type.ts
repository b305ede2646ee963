import { createEnum } from '../utils/create-enum.js';

const siteType = createEnum(['auto', 'linkedin', 'udemy', 'youtube', 'vimeo', 'soundcloud', 'bandcamp'] as const);

export const SiteType = siteType.object;

export type SiteType = typeof siteType.type;

export const SiteTypeSchema = siteType.schema;

export const SiteTypeValues = siteType.values;
