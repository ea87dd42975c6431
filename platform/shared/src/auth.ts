import { createHash } from 'node:crypto';
import jwt from 'jsonwebtoken';
import bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import { readConfig } from './config';

const ACCESS_TOKEN_TTL = '15m';
const REFRESH_TOKEN_TTL = '30d';
export const REFRESH_TOKEN_TTL_MS = 30 * 24 * 60 * 60 * 1000;

export type JwtPayload = {
  sub: string;
  username: string;
  // session id, set by identity
  sid?: string;
};

export type TokenSecrets = { access: string; refresh: string };

const defaultSecrets = (): TokenSecrets => {
  const config = readConfig();
  return { access: config.ACCESS_TOKEN_SECRET, refresh: config.REFRESH_TOKEN_SECRET };
};

const toPayload = (decoded: string | jwt.JwtPayload): JwtPayload | null => {
  if (typeof decoded === 'string') return null;
  const { sub, username, sid } = decoded;
  if (typeof sub !== 'string' || typeof username !== 'string') return null;
  return typeof sid === 'string' ? { sub, username, sid } : { sub, username };
};

export const signTokens = (payload: JwtPayload, secrets: TokenSecrets = defaultSecrets()) => {
  const claims = payload.sid ? { sub: payload.sub, username: payload.username, sid: payload.sid } : { sub: payload.sub, username: payload.username };
  // a fresh jwtid keeps tokens issued within the same second distinct
  const accessToken = jwt.sign(claims, secrets.access, { expiresIn: ACCESS_TOKEN_TTL, jwtid: uuidv4() });
  const refreshToken = jwt.sign(claims, secrets.refresh, { expiresIn: REFRESH_TOKEN_TTL, jwtid: uuidv4() });
  return { accessToken, refreshToken };
};

export const verifyAccess = (token: string, secrets: TokenSecrets = defaultSecrets()): JwtPayload | null => {
  try {
    return toPayload(jwt.verify(token, secrets.access));
  } catch {
    return null;
  }
};

export const verifyRefresh = (token: string, secrets: TokenSecrets = defaultSecrets()): JwtPayload | null => {
  try {
    return toPayload(jwt.verify(token, secrets.refresh));
  } catch {
    return null;
  }
};

export const bearerToken = (header: string | undefined): string | null => {
  if (!header || !header.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token || null;
};

export const hashValue = async (value: string): Promise<string> => bcrypt.hash(value, 10);
export const compareHash = async (value: string, hash: string): Promise<boolean> => bcrypt.compare(value, hash);

// bcrypt reads only the first 72 bytes, so long tokens are digested before hashing.
const digest = (token: string) => createHash('sha256').update(token).digest('base64');
export const hashToken = async (token: string): Promise<string> => hashValue(digest(token));
export const compareToken = async (token: string, hash: string): Promise<boolean> => compareHash(digest(token), hash);
