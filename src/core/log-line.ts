/*
Purpose: classify one Lambda log line for report rendering.
Assumptions: platform markers (START/END/REPORT) are prefixes; application lines use
  the runtime's "[LEVEL]\t<timestamp>\t<request id>\t<detail>" layout.
Usage: const line = classifyLine(event.message); switch (line.kind) { ... }
*/

export type LogLine =
  | { kind: "start" }
  | { kind: "end" }
  | { kind: "report" }
  | { kind: "tagged"; level: string; detail: string }
  | { kind: "plain"; message: string };

// Two discarded tokens (timestamp, request id) sit between the tag and the detail.
const TAGGED_LINE = /^\s*\[([A-Z]+)\]\s+\S+\s+\S+\s+([\s\S]+)/;

export function classifyLine(message: string): LogLine {
  if (message.startsWith("START")) return { kind: "start" };
  if (message.startsWith("END")) return { kind: "end" };
  if (message.startsWith("REPORT")) return { kind: "report" };

  const match = TAGGED_LINE.exec(message);
  if (match) {
    const [, level = "", detail = ""] = match;
    return { kind: "tagged", level, detail };
  }

  return { kind: "plain", message };
}
