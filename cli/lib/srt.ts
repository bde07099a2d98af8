/**
 * SRT helpers: writing cues, reading plain text and cue start times back out
 */

export interface TranscriptSegment {
  start: number; // seconds
  end: number; // seconds
  text: string;
}

const TIME_LINE = /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})\s*-->/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function splitMs(totalMs: number): { h: number; m: number; s: number; ms: number } {
  let rest = Math.max(0, totalMs);
  const h = Math.floor(rest / 3_600_000);
  rest -= h * 3_600_000;
  const m = Math.floor(rest / 60_000);
  rest -= m * 60_000;
  const s = Math.floor(rest / 1000);
  return { h, m, s, ms: rest - s * 1000 };
}

/**
 * Seconds → `HH:MM:SS,mmm`
 */
export function formatSrtTime(seconds: number): string {
  const { h, m, s, ms } = splitMs(Math.round(seconds * 1000));
  return `${pad(h, 2)}:${pad(m, 2)}:${pad(s, 2)},${pad(ms, 3)}`;
}

export function segmentsToSrt(segments: TranscriptSegment[]): string {
  return segments
    .map((seg, i) => `${i + 1}\n${formatSrtTime(seg.start)} --> ${formatSrtTime(seg.end)}\n${seg.text.trim()}\n`)
    .join('\n');
}

/**
 * Strip indices, timing lines and blanks; join the remaining lines with spaces
 */
export function srtToText(srt: string): string {
  const lines: string[] = [];
  for (const raw of srt.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    if (/^\d+$/.test(line)) continue;
    if (line.includes('-->')) continue;
    lines.push(line);
  }
  return lines.join(' ');
}

/**
 * Cue start times as filename-safe `HH-MM-SS-mmm`, in file order
 */
export function extractSrtTimestamps(srt: string): string[] {
  const out: string[] = [];
  for (const raw of srt.split(/\r?\n/)) {
    const match = raw.trim().match(TIME_LINE);
    if (!match) continue;
    const [, h, m, s, ms] = match;
    out.push(`${pad(Number(h), 2)}-${m}-${s}-${ms}`);
  }
  return out;
}
