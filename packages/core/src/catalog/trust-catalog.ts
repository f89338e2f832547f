import type { TrustCatalogData, TrustCatalogSection } from '@newscheck/schemas/src/trust-catalog.schema.js';
import type { DomainCategory, RecencyCategory } from '@newscheck/shared/src/types/fact-check.types.js';
import { DOMAIN_CATEGORIES } from '@newscheck/shared/src/types/fact-check.types.js';

export interface TrustCatalog {
  /**
   * Trusted hostnames for a domain and recency. Unknown or unlisted domains
   * resolve to the General list.
   */
  trustedHosts(domainCategory: string, recencyCategory: RecencyCategory): readonly string[];
}

function isDomainCategory(value: string): value is DomainCategory {
  return (DOMAIN_CATEGORIES as readonly string[]).includes(value);
}

function freezeSection(section: TrustCatalogSection): ReadonlyMap<DomainCategory, readonly string[]> {
  const entries = new Map<DomainCategory, readonly string[]>();
  for (const domain of DOMAIN_CATEGORIES) {
    const hosts = section[domain];
    if (hosts) {
      entries.set(domain, Object.freeze([...hosts]));
    }
  }
  return entries;
}

export function createTrustCatalog(data: TrustCatalogData): TrustCatalog {
  const sections: Readonly<Record<RecencyCategory, ReadonlyMap<DomainCategory, readonly string[]>>> =
    Object.freeze({
      Evergreen: freezeSection(data.evergreen),
      Realtime: freezeSection(data.realtime),
    });

  return {
    trustedHosts(domainCategory: string, recencyCategory: RecencyCategory): readonly string[] {
      const section = sections[recencyCategory];
      const general = section.get('General') ?? [];
      if (!isDomainCategory(domainCategory)) {
        return general;
      }
      return section.get(domainCategory) ?? general;
    },
  };
}
