/**
 * Announcement Domain Model
 *
 * Announcements are short messages shown to everyone during a visibility
 * window [startDate, endDate], both ends inclusive. startDate is optional
 * (no lower bound); endDate is required when an announcement is created.
 *
 * Dates are kept exactly as the teacher supplied them and compared as
 * strings against today's local "YYYY-MM-DD".
 */

import { InvalidRequestError } from "./errors";

export interface Announcement {
  id: string; // Positive integer as text, e.g. "12"
  message: string;
  startDate: string | null;
  endDate: string;
  createdBy: string; // Teacher username, not checked on read
  createdAt: string; // ISO timestamp
}

/**
 * Input for creating an announcement, as received from the client
 */
export interface CreateAnnouncementInput {
  message: string;
  startDate?: string | null;
  endDate?: string | null;
}

/**
 * A single field of a partial update: either left alone or replaced.
 * An omitted field and an explicit null both mean "keep".
 */
export type FieldUpdate<T> = { kind: "keep" } | { kind: "set"; value: T };

export interface AnnouncementUpdate {
  message: FieldUpdate<string>;
  startDate: FieldUpdate<string>;
  endDate: FieldUpdate<string>;
}

export const INVALID_DATE_MESSAGE = "Invalid date format. Use YYYY-MM-DD";

const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function fieldFromOptional<T>(value: T | null | undefined): FieldUpdate<T> {
  return value === null || value === undefined ? { kind: "keep" } : { kind: "set", value };
}

/**
 * Parse an ISO date (optionally followed by a time) and return its
 * calendar date as "YYYY-MM-DD", or null if it is not a real date.
 */
export function parseIsoDate(value: string): string | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const maxDay = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
  if (day > maxDay) {
    return null;
  }

  if (match[4] !== undefined) {
    const hours = Number(match[4]);
    const minutes = Number(match[5]);
    const seconds = match[6] === undefined ? 0 : Number(match[6]);
    if (hours > 23 || minutes > 59 || seconds > 59) {
      return null;
    }
  }

  return `${match[1]}-${match[2]}-${match[3]}`;
}

function requireIsoDate(value: string): string {
  const parsed = parseIsoDate(value);
  if (parsed === null) {
    throw new InvalidRequestError(INVALID_DATE_MESSAGE);
  }
  return parsed;
}

/**
 * Local calendar date of a moment, as "YYYY-MM-DD"
 */
export function toLocalIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Whether an announcement is visible on the given "YYYY-MM-DD" date
 */
export function isActiveOn(announcement: Announcement, today: string): boolean {
  if (announcement.startDate && today < announcement.startDate) {
    return false;
  }

  if (announcement.endDate && today > announcement.endDate) {
    return false;
  }

  return true;
}

/**
 * Newest first by createdAt. Ties keep their existing order.
 */
export function sortByNewest(announcements: Announcement[]): Announcement[] {
  return [...announcements].sort((a, b) => {
    if (a.createdAt === b.createdAt) return 0;
    return a.createdAt < b.createdAt ? 1 : -1;
  });
}

/**
 * Validate the dates of a new announcement and return them as supplied
 * (an empty startDate becomes null).
 * Throws InvalidRequestError with the first problem found.
 */
export function validateNewAnnouncement(
  input: CreateAnnouncementInput,
  today: string
): { startDate: string | null; endDate: string } {
  if (!input.endDate) {
    throw new InvalidRequestError("Expiration date is required");
  }

  const endDate = requireIsoDate(input.endDate);
  if (endDate < today) {
    throw new InvalidRequestError("Expiration date must be in the future");
  }

  if (input.startDate) {
    const startDate = requireIsoDate(input.startDate);
    if (startDate > endDate) {
      throw new InvalidRequestError("Start date must be before expiration date");
    }
  }

  return { startDate: input.startDate || null, endDate: input.endDate };
}

/**
 * Apply a partial update and return the updated record.
 *
 * Only a supplied endDate is validated: it must parse, and it must not be
 * before the effective startDate (the one supplied in this update if any,
 * otherwise the stored one). A startDate supplied on its own is taken as is,
 * and endDate is not checked against today here.
 */
export function applyAnnouncementUpdate(
  existing: Announcement,
  update: AnnouncementUpdate
): Announcement {
  const updated: Announcement = { ...existing };

  if (update.message.kind === "set") {
    updated.message = update.message.value;
  }

  if (update.startDate.kind === "set") {
    updated.startDate = update.startDate.value;
  }

  if (update.endDate.kind === "set") {
    const endDate = requireIsoDate(update.endDate.value);

    if (updated.startDate) {
      const startDate = requireIsoDate(updated.startDate);
      if (startDate > endDate) {
        throw new InvalidRequestError("Start date must be before expiration date");
      }
    }

    updated.endDate = update.endDate.value;
  }

  return updated;
}
