import { setTimeout as delay } from 'node:timers/promises';

import { toCancelled } from '../core/errors.js';

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw toCancelled(signal);
    throw err;
  }
}
