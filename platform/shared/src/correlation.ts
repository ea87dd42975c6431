import { v4 as uuidv4 } from 'uuid';

export const ensureCorrelationId = (existing?: string | string[]): string => {
  if (Array.isArray(existing)) {
    return existing[0] || uuidv4();
  }
  return existing || uuidv4();
};
