import { ServiceUnavailableError } from '@huddle/shared';

export const USERNAME_MIN = 3;
export const USERNAME_MAX = 32;
// Leaves room for a six character suffix.
const BASE_MAX = 24;

const SUFFIX_ALPHABET = 'bcdfghjklmnpqrstvwxyz0123456789';

export type UserMetadata = {
  preferred_username?: string | null;
  user_name?: string | null;
  email?: string | null;
};

export const slugify = (s: string | null | undefined, fallback: string): string => {
  if (!s) return fallback;
  const slug = s
    .trim()
    .toLowerCase()
    .replace(/-/g, '_')
    .replace(/[^a-z0-9_]/g, '')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || fallback;
};

export const randomSuffix = (n = 3, random: () => number = Math.random): string => {
  let out = '';
  for (let i = 0; i < n; i += 1) {
    out += SUFFIX_ALPHABET[Math.floor(random() * SUFFIX_ALPHABET.length) % SUFFIX_ALPHABET.length];
  }
  return out;
};

export const baseUsername = (meta: UserMetadata, userId: string): string => {
  const handle = meta.preferred_username || meta.user_name;
  const emailLocal = meta.email ? meta.email.split('@')[0] : '';
  const compactId = userId.replace(/-/g, '');
  let base = slugify(handle || emailLocal || '', `user_${compactId.slice(0, 8)}`);
  base = base.slice(0, BASE_MAX).replace(/_+$/, '');
  if (base.length < USERNAME_MIN) {
    base = `user_${compactId.slice(0, 6)}`;
  }
  return base;
};

export const isValidUsername = (username: string): boolean =>
  username.length >= USERNAME_MIN && username.length <= USERNAME_MAX && slugify(username, '') === username;

/**
 * First free handle derived from `base`: the base itself, then numbered
 * variants 2 through 19, then random three and six character suffixes.
 */
export const nextAvailableUsername = async (
  base: string,
  isAvailable: (candidate: string) => Promise<boolean>,
  random: () => number = Math.random,
): Promise<string> => {
  if (await isAvailable(base)) return base;
  for (let i = 2; i < 20; i += 1) {
    const candidate = `${base}${i}`;
    if (await isAvailable(candidate)) return candidate;
  }
  for (let i = 0; i < 50; i += 1) {
    const candidate = `${base}${randomSuffix(3, random)}`;
    if (await isAvailable(candidate)) return candidate;
  }
  for (let i = 0; i < 200; i += 1) {
    const candidate = `${base}${randomSuffix(6, random)}`;
    if (await isAvailable(candidate)) return candidate;
  }
  throw new ServiceUnavailableError('username_exhausted', `no free username for base ${base}`);
};
