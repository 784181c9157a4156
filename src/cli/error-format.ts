/*
Purpose: render thrown values for the terminal.
Assumptions: output goes to stderr; color only when that stream is a TTY.
Usage: console.error(renderCliError(err, { debug: true }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = {
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  block?: boolean;
};

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  request: { label: "Request:", labelStyles: ["cyan"], textStyles: [] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style.label) return format(line.text, style.textStyles);

  const label = format(style.label, style.labelStyles);
  if (style.block) {
    const indented = line.text
      .split("\n")
      .map((row) => `  ${row}`)
      .join("\n");
    return `${label}\n${format(indented, style.textStyles)}`;
  }
  return `${label} ${format(line.text, style.textStyles)}`;
}
