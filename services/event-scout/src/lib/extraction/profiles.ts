import type { Profile } from '../../types/events.js';
import { profileItemSchema } from '../ai/schemas.js';
import { ContentValidator } from '../scraping/sanitizer.js';

/**
 * Validate raw profile items one at a time. Items without a usable name are
 * dropped; image and website values that are not http(s) URLs are cleared.
 * Names are unique case-insensitively, first occurrence kept.
 */
export function sanitizeProfiles(items: readonly unknown[]): Profile[] {
  const profiles: Profile[] = [];
  const seen = new Set<string>();

  for (const item of items) {
    const parsed = profileItemSchema.safeParse(item);
    if (!parsed.success) {
      continue;
    }

    const { name, title, company, bio, image, website } = parsed.data;
    const key = profileKey(name);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);

    profiles.push(compactProfile({
      name,
      title,
      company,
      bio,
      image: image && ContentValidator.isValidUrl(image) ? image : undefined,
      website: website && ContentValidator.isValidUrl(website) ? website : undefined
    }));
  }

  return profiles;
}

/**
 * Merge model-extracted profiles into DOM-extracted ones. Matching is by
 * case-insensitive name; DOM values win and the model only fills gaps.
 * Unmatched model profiles are appended in their original order.
 */
export function mergeProfiles(primary: readonly Profile[], extra: readonly Profile[]): Profile[] {
  const merged = primary.map(profile => ({ ...profile }));
  const index = new Map(merged.map((profile, position) => [profileKey(profile.name), position]));

  for (const profile of extra) {
    const key = profileKey(profile.name);
    const position = index.get(key);
    if (position === undefined) {
      index.set(key, merged.length);
      merged.push({ ...profile });
      continue;
    }

    const existing = merged[position];
    merged[position] = compactProfile({
      name: existing.name,
      title: existing.title ?? profile.title,
      company: existing.company ?? profile.company,
      bio: existing.bio ?? profile.bio,
      image: existing.image ?? profile.image,
      website: existing.website ?? profile.website
    });
  }

  return merged;
}

function profileKey(name: string): string {
  return name.trim().toLowerCase();
}

function compactProfile(profile: Profile): Profile {
  const result: Profile = { name: profile.name };
  if (profile.title) result.title = profile.title;
  if (profile.company) result.company = profile.company;
  if (profile.bio) result.bio = profile.bio;
  if (profile.image) result.image = profile.image;
  if (profile.website) result.website = profile.website;
  return result;
}
