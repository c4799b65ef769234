import { NotFoundError } from "./errors";

/** Path ids are positive integers; anything else cannot name a row. */
export function parseId(raw: string | undefined, notFound: string): number {
  if (!raw || !/^\d+$/.test(raw)) throw new NotFoundError(notFound);
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) throw new NotFoundError(notFound);
  return id;
}
