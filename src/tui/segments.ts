import terminalKit from 'terminal-kit';

export type StyleName = 'text' | 'bold' | 'dim' | 'inverse' | 'red' | 'yellow' | 'green' | 'cyan' | 'magenta';

export interface Segment {
  text: string;
  style: StyleName;
}

export type Line = Segment[];

export function seg(text: string, style: StyleName = 'text'): Segment {
  return { text, style };
}

export function textWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

export function lineWidth(line: Line): number {
  return line.reduce((sum, s) => sum + textWidth(s.text), 0);
}

export function lineText(line: Line): string {
  return line.map((s) => s.text).join('');
}

export function truncateByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (textWidth(text) <= maxWidth) return text;
  if (maxWidth === 1) return terminalKit.truncateString(text, 1);
  return `${terminalKit.truncateString(text, maxWidth - 1)}…`;
}

/** Truncates or right-pads to exactly `width` columns. */
export function fit(text: string, width: number): string {
  const cut = truncateByWidth(text, width);
  return cut + ' '.repeat(Math.max(0, width - textWidth(cut)));
}

/** Clips a styled line to `width` columns and pads the rest with blanks. */
export function fitLine(line: Line, width: number): Line {
  const out: Line = [];
  let remaining = width;
  for (const segment of line) {
    if (remaining <= 0) break;
    if (segment.text === '') continue;
    const w = textWidth(segment.text);
    if (w <= remaining) {
      out.push(segment);
      remaining -= w;
    } else {
      const cut = terminalKit.truncateString(segment.text, remaining);
      out.push({ text: cut, style: segment.style });
      remaining -= textWidth(cut);
      break;
    }
  }
  if (remaining > 0) out.push(seg(' '.repeat(remaining)));
  return out;
}
