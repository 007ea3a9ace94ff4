import { InvalidEventError, PublishError } from '../domain/index.js';
import type { EventInput, EventRegister, PublishAck } from '../domain/index.js';

export type RegisterEventResult =
  | { ok: true; ack: PublishAck }
  | { ok: false; error: InvalidEventError | PublishError };

/**
 * Publishes through whichever register was injected and folds the
 * expected failures into a result. Anything else is rethrown.
 */
export async function registerEvent(register: EventRegister, input: EventInput): Promise<RegisterEventResult> {
  try {
    const ack = await register.registerEvent(input);
    return { ok: true, ack };
  } catch (err: unknown) {
    if (err instanceof InvalidEventError || err instanceof PublishError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
