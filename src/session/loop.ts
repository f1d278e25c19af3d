import { describeError } from "../errors.js";
import type { Logger } from "../log.js";
import type { Channel } from "./channel.js";
import type { SessionController } from "./controller.js";
import type { SessionEvent } from "./state.js";

/**
 * Takes events off the channel one at a time, redrawing after each, until
 * the controller asks to quit or the channel closes. Progress is persisted
 * on the way out either way.
 */
export async function runSession(
  controller: SessionController,
  events: Channel<SessionEvent>,
  redraw: () => void,
  log: Logger,
): Promise<void> {
  redraw();
  try {
    for await (const event of events) {
      try {
        await controller.handle(event);
      } catch (err) {
        log.error("event failed", { event: event.type, error: describeError(err) });
        controller.report(err);
      }
      redraw();
      if (controller.finished) break;
    }
  } finally {
    events.close();
    await controller.shutdown();
  }
}
