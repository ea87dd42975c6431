import { z } from 'zod';
import { ServiceUnavailableError } from './errors';

export const profileSchema = z.object({
  id: z.string(),
  username: z.string(),
  full_name: z.string().nullable(),
  avatar_url: z.string().nullable(),
});

export type Profile = z.infer<typeof profileSchema>;

// Cross-service lookups. Services never read each other's tables.
export interface Directory {
  getProfiles(ids: string[]): Promise<Profile[]>;
  findByUsername(username: string): Promise<Profile | null>;
  areFriends(a: string, b: string): Promise<boolean>;
}

type FetchLike = typeof fetch;

const profilesResponse = z.object({ profiles: z.array(profileSchema) });
const profileResponse = z.object({ profile: profileSchema });
const friendsResponse = z.object({ friends: z.boolean() });

export const createHttpDirectory = (options: {
  identityUrl: string;
  socialUrl: string;
  correlationId?: string;
  fetch?: FetchLike;
}): Directory => {
  const doFetch = options.fetch ?? fetch;
  const headers = { 'x-internal-call': 'true', 'x-correlation-id': options.correlationId ?? '' };

  const getJson = async (url: string): Promise<{ status: number; json: unknown }> => {
    let res: Response;
    try {
      res = await doFetch(url, { headers, signal: AbortSignal.timeout(5000) });
    } catch (err) {
      throw new ServiceUnavailableError('directory_unavailable', err instanceof Error ? err.message : undefined);
    }
    if (res.status >= 500) throw new ServiceUnavailableError('directory_unavailable', `upstream_${res.status}`);
    return { status: res.status, json: res.status === 404 ? null : await res.json() };
  };

  return {
    async getProfiles(ids) {
      const unique = [...new Set(ids)];
      if (!unique.length) return [];
      const { json } = await getJson(`${options.identityUrl}/internal/profiles?ids=${unique.map(encodeURIComponent).join(',')}`);
      return profilesResponse.parse(json).profiles;
    },
    async findByUsername(username) {
      const { status, json } = await getJson(
        `${options.identityUrl}/internal/profiles/by-username/${encodeURIComponent(username)}`,
      );
      if (status === 404) return null;
      return profileResponse.parse(json).profile;
    },
    async areFriends(a, b) {
      const { json } = await getJson(
        `${options.socialUrl}/internal/friendships/check?a=${encodeURIComponent(a)}&b=${encodeURIComponent(b)}`,
      );
      return friendsResponse.parse(json).friends;
    },
  };
};

export const indexProfiles = (profiles: Profile[]): Map<string, Profile> => new Map(profiles.map((p) => [p.id, p]));
