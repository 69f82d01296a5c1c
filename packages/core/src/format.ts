/**
 * Telegram HTML markup helpers and the text of the monitor's own messages.
 *
 * Only &, < and > need escaping in Telegram's HTML parse mode.
 */

import type { SessionChange } from "./types.js";

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function bold(text: string): string {
  return `<b>${escapeHtml(text)}</b>`;
}

export function code(text: string): string {
  return `<code>${escapeHtml(text)}</code>`;
}

export const DIGEST_HEADER = "Updates:";

/** One block of the update digest. */
export function formatChange(change: SessionChange): string {
  return `Session: ${escapeHtml(change.title)} (${code(change.id)})\nStatus: ${bold(change.status)}`;
}

/** All changes of one poll cycle as a single HTML message. */
export function formatDigest(changes: readonly SessionChange[]): string {
  return [bold(DIGEST_HEADER), ...changes.map(formatChange)].join("\n");
}

/** 60 -> "1 hour", 90 -> "90 minutes", 1 -> "1 minute". */
export function formatDuration(minutes: number): string {
  if (minutes >= 60 && minutes % 60 === 0) {
    const hours = minutes / 60;
    return hours === 1 ? "1 hour" : `${hours} hours`;
  }
  return minutes === 1 ? "1 minute" : `${minutes} minutes`;
}

export function formatFinishedNotice(durationMinutes: number): string {
  return `Monitoring finished (${formatDuration(durationMinutes)} completed).`;
}

/** Cadence wording for the "monitoring started" reply. */
export function formatInterval(seconds: number): string {
  if (seconds === 60) return "every minute";
  if (seconds % 60 === 0) return `every ${seconds / 60} minutes`;
  return seconds === 1 ? "every second" : `every ${seconds} seconds`;
}
