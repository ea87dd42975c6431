export interface SessionStore {
  getAccessToken(): Promise<string | null>;
  getRefreshToken(): Promise<string | null>;
  save(accessToken: string, refreshToken: string): Promise<void>;
  clear(): Promise<void>;
}

// Process-local session; platforms with persistent storage provide their own SessionStore.
export const memorySessionStore = (initial?: { accessToken: string; refreshToken: string }): SessionStore => {
  let access = initial?.accessToken ?? null;
  let refresh = initial?.refreshToken ?? null;
  return {
    async getAccessToken() {
      return access;
    },
    async getRefreshToken() {
      return refresh;
    },
    async save(accessToken, refreshToken) {
      access = accessToken;
      refresh = refreshToken;
    },
    async clear() {
      access = null;
      refresh = null;
    },
  };
};
