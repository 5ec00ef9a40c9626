import type { ClipOverlay } from "../types";

export const TITLE_LINE_CHARS = 28;
export const TITLE_MAX_LINES = 3;

export interface FrameSize {
  width: number;
  height: number;
}

/**
 * Escapes a value for a filter option inside an `-vf` graph. Two levels
 * apply: the option parser (`\`, `'`, `:`) and then the graph parser
 * (`\`, `'`, `[`, `]`, `,`, `;`).
 */
export const escapeFilterValue = (value: string) => {
  const optionLevel = value.replace(/[\\':]/g, (c) => `\\${c}`);
  return optionLevel.replace(/[\\'[\],;]/g, (c) => `\\${c}`);
};

/**
 * Word-wraps a title for the bottom overlay. Overlong words are hard-split;
 * text beyond the last line is cut and marked with an ellipsis.
 */
export function wrapTitle(
  title: string,
  lineChars = TITLE_LINE_CHARS,
  maxLines = TITLE_MAX_LINES,
): string {
  const words = title
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .flatMap((word) => {
      const chars = Array.from(word);
      const parts: string[] = [];
      for (let i = 0; i < chars.length; i += lineChars) {
        parts.push(chars.slice(i, i + lineChars).join(""));
      }
      return parts;
    });

  const lines: string[] = [];
  let current = "";
  let truncated = false;

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (codePoints(candidate) <= lineChars) {
      current = candidate;
      continue;
    }
    lines.push(current);
    current = word;
    if (lines.length === maxLines) {
      truncated = true;
      break;
    }
  }
  if (!truncated && current) lines.push(current);

  if (truncated) {
    const last = Array.from(lines[maxLines - 1] ?? "");
    lines[maxLines - 1] = `${last.slice(0, lineChars - 1).join("")}…`;
  }

  return lines.join("\n");
}

const codePoints = (text: string) => Array.from(text).length;

export const counterText = ({ index, total }: ClipOverlay) => `${index}/${total}`;

/**
 * Filter chain for one clip: fit into the reels frame, pad with black, then
 * draw the counter (top right) and the title (bottom centre). The title is
 * read from `titleFile` with expansion off.
 */
export function buildClipFilter(
  overlay: ClipOverlay,
  frame: FrameSize,
  fontFile: string,
  titleFile: string,
): string {
  const { width, height } = frame;
  const font = escapeFilterValue(fontFile);

  const counter = [
    `drawtext=text=${escapeFilterValue(counterText(overlay))}`,
    `fontfile=${font}`,
    "fontsize=60",
    "fontcolor=white",
    "x=w-tw-40",
    "y=40",
    "box=1",
    "boxcolor=black@0.6",
    "boxborderw=10",
  ].join(":");

  const title = [
    `drawtext=textfile=${escapeFilterValue(titleFile)}`,
    "expansion=none",
    `fontfile=${font}`,
    "fontsize=48",
    "fontcolor=white",
    "line_spacing=8",
    "x=(w-text_w)/2",
    "y=h-text_h-150",
    "box=1",
    "boxcolor=black@0.7",
    "boxborderw=15",
  ].join(":");

  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:black`,
    "setsar=1",
    counter,
    title,
  ].join(",");
}
