import type { Backend } from '../types.js';

// Added to every parsed reset time so we wake after the quota window, not at its edge
export const RESET_SAFETY_MARGIN_SECONDS = 300;

export const DEFAULT_COOLDOWN_SECONDS: Readonly<Record<Backend, number>> = {
  claude: 5 * 3600 + RESET_SAFETY_MARGIN_SECONDS,
  codex: 3600,
};

const UNIT_SECONDS: Record<string, number> = {
  second: 1,
  minute: 60,
  hour: 3600,
};

const RELATIVE_RESET = /resets in (\d+) (second|minute|hour)s?\b/i;
// "resets 5pm", "resets at 11:30am (PST)"
const MERIDIEM_RESET = /resets(?: at)? (\d{1,2})(?::(\d{2}))?\s*(am|pm)\b/i;
// "resets at 17:45"
const CLOCK_RESET = /resets(?: at)? (\d{1,2}):(\d{2})\b/i;

function secondsUntilLocalTime(hour: number, minute: number, now: Date): number {
  const target = new Date(now.getTime());
  target.setHours(hour, minute, 0, 0);
  let diff = Math.floor((target.getTime() - now.getTime()) / 1000);
  if (diff < 0) {
    diff += 86400;
  }
  return diff;
}

function parseMeridiem(text: string, now: Date): number | null {
  const match = MERIDIEM_RESET.exec(text);
  if (!match) return null;

  let hour = Number.parseInt(match[1], 10);
  const minute = match[2] === undefined ? 0 : Number.parseInt(match[2], 10);
  if (hour < 1 || hour > 12 || minute > 59) return null;

  const pm = match[3].toLowerCase() === 'pm';
  if (pm && hour !== 12) hour += 12;
  if (!pm && hour === 12) hour = 0;

  return secondsUntilLocalTime(hour, minute, now);
}

function parseClock(text: string, now: Date): number | null {
  const match = CLOCK_RESET.exec(text);
  if (!match) return null;

  const hour = Number.parseInt(match[1], 10);
  const minute = Number.parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return null;

  return secondsUntilLocalTime(hour, minute, now);
}

/**
 * Estimate how long to wait before a quota-limited backend is usable again.
 *
 * Reads "resets in N units" or a wall-clock "resets at H[:MM][am|pm]" hint from the
 * backend's output. Absolute times are interpreted in the host's local time zone.
 * Falls back to a per-backend default when the output carries no usable hint.
 */
export function estimateResumeSeconds(
  outputText: string,
  backend: Backend,
  now: Date = new Date(),
  defaults: Readonly<Record<Backend, number>> = DEFAULT_COOLDOWN_SECONDS
): number {
  const relative = RELATIVE_RESET.exec(outputText);
  if (relative) {
    const amount = Number.parseInt(relative[1], 10);
    const unit = UNIT_SECONDS[relative[2].toLowerCase()];
    return amount * unit + RESET_SAFETY_MARGIN_SECONDS;
  }

  const absolute = parseMeridiem(outputText, now) ?? parseClock(outputText, now);
  if (absolute !== null) {
    return absolute + RESET_SAFETY_MARGIN_SECONDS;
  }

  return Math.max(1, Math.floor(defaults[backend]));
}
