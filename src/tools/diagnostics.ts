/**
 * get_diagnostics tool: recent action outcomes and engine state.
 */

import type { Session } from "../runtime/session.js";
import { formatLearnState } from "./bindings.js";
import { formatReport } from "./format.js";

export function executeGetDiagnostics(session: Session, limit: number, failuresOnly: boolean): string {
  const reports = failuresOnly ? session.diagnostics.failures(limit) : session.diagnostics.recent(limit);
  const sources = session.engine.attachedSources();
  const lines = [
    `Sources: ${sources.length > 0 ? sources.join(", ") : "none"}`,
    `Queued events: ${session.engine.pending}`,
    formatLearnState(session.learner.status),
    "",
    reports.length > 0
      ? `${failuresOnly ? "Failed actions" : "Recent actions"} (${reports.length}):`
      : "No action reports.",
    ...reports.map(formatReport),
  ];
  return lines.join("\n");
}
