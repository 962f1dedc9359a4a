import type { Rng } from './rng.service.js';

/** `${prefix}_${6자리}` — taken 에 있으면 다시 뽑는다 */
export function makeInstanceId(
  prefix: string,
  rng: Rng,
  taken: ReadonlySet<string> = new Set(),
): string {
  let id = `${prefix}_${rng.range(100000, 999999)}`;
  while (taken.has(id)) {
    id = `${prefix}_${rng.range(100000, 999999)}`;
  }
  return id;
}
