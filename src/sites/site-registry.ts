import { extractDomain } from '../utils/url-utils.js';
import { SiteType } from './site-type.js';

/**
 * Layout and option hints for one family of sites
 */
export type SiteProfile = {
  siteType: SiteType;
  label: string;
  /** Domains the profile is picked for when the request says `auto` */
  domains: string[];
  /** Items are grouped in chapters, laid out as section folders */
  sectioned: boolean;
  /** Audio-only sites publish no subtitles */
  audioOnly: boolean;
};

const GENERIC_PROFILE: SiteProfile = {
  siteType: SiteType.AUTO,
  label: 'Any site',
  domains: [],
  sectioned: false,
  audioOnly: false,
};

const BUILTIN_PROFILES: SiteProfile[] = [
  {
    siteType: SiteType.LINKEDIN,
    label: 'LinkedIn Learning',
    domains: ['linkedin.com'],
    sectioned: true,
    audioOnly: false,
  },
  { siteType: SiteType.UDEMY, label: 'Udemy', domains: ['udemy.com'], sectioned: true, audioOnly: false },
  {
    siteType: SiteType.YOUTUBE,
    label: 'YouTube',
    domains: ['youtube.com', 'youtu.be'],
    sectioned: false,
    audioOnly: false,
  },
  { siteType: SiteType.VIMEO, label: 'Vimeo', domains: ['vimeo.com'], sectioned: false, audioOnly: false },
  {
    siteType: SiteType.SOUNDCLOUD,
    label: 'SoundCloud',
    domains: ['soundcloud.com'],
    sectioned: false,
    audioOnly: true,
  },
  { siteType: SiteType.BANDCAMP, label: 'Bandcamp', domains: ['bandcamp.com'], sectioned: false, audioOnly: true },
];

/**
 * Resolves the site-type hint of a request to a profile
 */
export class SiteRegistry {
  private profiles: Map<SiteType, SiteProfile> = new Map();

  constructor(profiles: SiteProfile[] = BUILTIN_PROFILES) {
    for (const profile of profiles) {
      this.register(profile);
    }
  }

  register(profile: SiteProfile): void {
    this.profiles.set(profile.siteType, profile);
  }

  /**
   * Pick the profile for a request. An explicit hint wins; `auto` matches the
   * URL's domain (subdomains included) and falls back to the generic profile.
   */
  resolve(siteType: SiteType, url: string): SiteProfile {
    if (siteType !== SiteType.AUTO) {
      return this.profiles.get(siteType) ?? GENERIC_PROFILE;
    }

    let domain: string;
    try {
      domain = extractDomain(url);
    } catch {
      return GENERIC_PROFILE;
    }

    for (const profile of this.profiles.values()) {
      if (profile.domains.some((d) => domain === d || domain.endsWith(`.${d}`))) {
        return profile;
      }
    }

    return GENERIC_PROFILE;
  }
}

export const siteRegistry: SiteRegistry = new SiteRegistry();
