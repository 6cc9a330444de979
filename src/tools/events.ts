/**
 * deliver_event tool: feed a control event into the engine by hand.
 */

import type { ActionReport } from "../actions/types.js";
import type { Session } from "../runtime/session.js";
import type { DeliverEventInput } from "../schemas/bindings.js";
import { formatDispatch } from "./format.js";

export const TOOL_SOURCE_ID = "mcp";

export async function executeDeliverEvent(session: Session, input: DeliverEventInput): Promise<string> {
  const reports: ActionReport[] = [];
  const stop = session.diagnostics.on("action", (report) => reports.push(report));
  try {
    const result = await session.engine.deliver({
      device: input.device,
      channel: input.channel,
      controlId: input.controlId,
      rawValue: input.rawValue,
      kind: input.kind,
      timestamp: input.timestamp ?? Date.now(),
      sourceId: TOOL_SOURCE_ID,
    });
    if (input.wait && result.activations.length > 0) await session.engine.settle();
    const own = new Set(result.activations.map((a) => a.node));
    return formatDispatch(
      result,
      reports.filter((r) => own.has(r.node)),
    );
  } finally {
    stop();
  }
}
