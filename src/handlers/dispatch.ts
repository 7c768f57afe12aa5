import type { DispatchResult } from "../core/session/session-router";
import type { TransportEvent } from "../types/transport";

export interface EventDispatcher {
  dispatch(event: TransportEvent): Promise<DispatchResult>;
}

/**
 * Forward a mapped event and answer any callback the session left open.
 * Dropped callbacks (no session) would otherwise leave the client spinner up.
 */
export async function forwardEvent(
  dispatcher: EventDispatcher,
  event: TransportEvent
): Promise<DispatchResult> {
  const result = await dispatcher.dispatch(event);
  if (event.kind === "callback") {
    await event.reply.acknowledge();
  }
  if (result === "dropped") {
    console.log(`[Dispatch] Dropped ${event.kind} from ${event.userId}: no session`);
  }
  return result;
}
