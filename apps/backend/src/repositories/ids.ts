import { z } from 'zod';

const uuidSchema = z.string().uuid();

/** Ids from chat or from membership lists can be stale or foreign; uuid columns reject them outright. */
export function isUuid(value: string): boolean {
  return uuidSchema.safeParse(value).success;
}
