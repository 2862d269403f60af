/**
 * Deterministic helpers: generation seeds, correlation hashes and ticket
 * numbers. Everything here is a pure function of its inputs (the ticket date
 * falls back to the supplied clock when the timestamp cannot be read).
 */

import { createHash } from 'node:crypto';

/**
 * Derive a reproducible generation seed from the external message id and the
 * prompt text: the first 8 hex digits of SHA-256(id + text), as an unsigned
 * 32-bit integer.
 */
export function deterministicSeed(externalId: string | null | undefined, text: string): number {
  const digest = createHash('sha256')
    .update(externalId ?? '', 'utf8')
    .update(text, 'utf8')
    .digest('hex');
  return parseInt(digest.slice(0, 8), 16);
}

/** Short SHA-256 digest used to correlate log lines without logging text */
export function shortHash(text: string | null | undefined): string {
  return createHash('sha256').update(text ?? '', 'utf8').digest('hex').slice(0, 8);
}

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function formatUtcDate(date: Date): string {
  return `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}`;
}

/**
 * YYYYMMDD for an ISO-8601 timestamp.
 *
 * The calendar date written in the timestamp wins (an offset does not shift
 * it) as long as that day exists; other parseable strings use their UTC
 * date; anything unreadable or impossible falls back to `now`.
 */
export function yyyymmddFromIso(iso: string | null | undefined, now: Date = new Date()): string {
  const value = (iso ?? '').trim();
  const parsed = Date.parse(value);
  if (value === '' || Number.isNaN(parsed)) {
    return formatUtcDate(now);
  }

  const prefix = ISO_DATE_PREFIX.exec(value);
  if (prefix) {
    const [, year, month, day] = prefix;
    const y = Number(year);
    const m = Number(month);
    const d = Number(day);
    const calendar = new Date(Date.UTC(y, m - 1, d));
    // Date.parse rolls 2025-02-30 over; such a day does not exist
    if (calendar.getUTCFullYear() !== y || calendar.getUTCMonth() !== m - 1 || calendar.getUTCDate() !== d) {
      return formatUtcDate(now);
    }
    return `${year}${month}${day}`;
  }
  return formatUtcDate(new Date(parsed));
}

/**
 * Ticket number: `${prefix}${YYYYMMDD}-${suffix}` where suffix is the last six
 * alphanumeric characters of the external id, upper-cased (all of them when
 * the id has fewer than six).
 */
export function computeTicketNumber(dateYyyymmdd: string, externalId: string, prefix = 'REQ-'): string {
  const alnums = externalId.replace(/[^A-Za-z0-9]/g, '').toUpperCase();
  const suffix = alnums.slice(-6);
  return `${prefix}${dateYyyymmdd}-${suffix}`;
}
