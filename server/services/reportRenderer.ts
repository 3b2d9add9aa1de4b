import type { RcaReport } from "@shared/rca";

export const BOX_WIDTH = 86;
export const BOX_CONTENT_WIDTH = BOX_WIDTH - 2;
export const TITLE_MAX_LENGTH = 76;
export const CONFIDENCE_FIELD_WIDTH = 60;
export const MAX_WORD_LENGTH = BOX_CONTENT_WIDTH - 2;

const LEFT_MARGIN = "║ ";
// Column of the right border glyph
const RIGHT_BORDER_AT = BOX_WIDTH - 1;

/**
 * Report fields as they may arrive from a validator or a JSON body: any of
 * them can be missing or null.
 */
export type RenderableReport = {
  [K in keyof RcaReport]?: RcaReport[K] | null;
};

// Columns are counted in code points so astral characters take one column.
function width(value: string): number {
  return Array.from(value).length;
}

function padToWidth(value: string, columns: number): string {
  return `${value}${" ".repeat(Math.max(0, columns - width(value)))}`;
}

function rule(left: string, right: string): string {
  return `${left}${"═".repeat(BOX_CONTENT_WIDTH)}${right}`;
}

function closeLine(buffer: string): string {
  return `${padToWidth(buffer, RIGHT_BORDER_AT)}║`;
}

function labelLine(label: string): string {
  return closeLine(`${LEFT_MARGIN}${label}`);
}

export function truncate(value: string | null | undefined, maxLength: number): string {
  if (!value) return "";
  const chars = Array.from(value);
  return chars.length > maxLength ? `${chars.slice(0, maxLength - 3).join("")}...` : value;
}

/**
 * Word-wraps `text` into bordered lines exactly BOX_WIDTH columns wide.
 * Tokens longer than MAX_WORD_LENGTH are split into fixed-size chunks.
 */
export function wrapParagraph(text: string | null | undefined): string[] {
  const tokens = (text ?? "").split(/\s+/).filter(Boolean);
  if (tokens.length === 0) {
    return [closeLine(`${LEFT_MARGIN}N/A`)];
  }

  const lines: string[] = [];
  let buffer = LEFT_MARGIN;
  const hasContent = () => width(buffer) > LEFT_MARGIN.length;
  const flush = () => {
    lines.push(closeLine(buffer));
    buffer = LEFT_MARGIN;
  };

  for (const token of tokens) {
    const chars = Array.from(token);
    if (chars.length > MAX_WORD_LENGTH) {
      if (hasContent()) flush();
      for (let pos = 0; pos < chars.length; pos += MAX_WORD_LENGTH) {
        lines.push(closeLine(`${LEFT_MARGIN}${chars.slice(pos, pos + MAX_WORD_LENGTH).join("")}`));
      }
      continue;
    }

    if (hasContent() && width(buffer) + chars.length + 1 >= RIGHT_BORDER_AT) {
      flush();
    }
    buffer += `${token} `;
  }

  if (hasContent()) flush();
  return lines;
}

function formatConfidence(value: number | null | undefined): string {
  const confidence = typeof value === "number" && Number.isFinite(value) ? value : 0;
  return confidence.toFixed(2).padEnd(CONFIDENCE_FIELD_WIDTH).slice(0, CONFIDENCE_FIELD_WIDTH);
}

export function renderReportLines(report: RenderableReport): readonly string[] {
  const divider = rule("╠", "╣");
  // A title is a single line of the box.
  const title = truncate((report.title ?? "").replace(/\s+/g, " ").trim(), TITLE_MAX_LENGTH);
  const logs = report.supportedLogs ?? [];

  const lines: string[] = [
    rule("╔", "╗"),
    closeLine(`║${" ".repeat(27)}RCA REPORT`),
    divider,
    `${LEFT_MARGIN}Title: ${padToWidth(title, TITLE_MAX_LENGTH)}║`,
    divider,
    labelLine("Issue Description:"),
    ...wrapParagraph(report.issue),
    divider,
    labelLine("Evidence:"),
    ...wrapParagraph(report.evidence),
    divider,
    labelLine("Proposed Solution:"),
    ...wrapParagraph(report.proposedSolution),
  ];

  if (logs.length > 0) {
    lines.push(divider, labelLine("Supported Logs:"));
    for (const log of logs) {
      lines.push(...wrapParagraph(`• ${log}`));
    }
  }

  lines.push(
    divider,
    `${LEFT_MARGIN}Validation Confidence: ${formatConfidence(report.validationConfidence)}║`,
    rule("╚", "╝"),
  );

  return Object.freeze(lines);
}

export function renderReport(report: RenderableReport): string {
  return `${renderReportLines(report).join("\n")}\n`;
}
