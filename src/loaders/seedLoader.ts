import fs from "fs";
import { Activity } from "../domain/activity";
import { Announcement } from "../domain/announcement";
import { TeacherCredential } from "../domain/teacher";
import { PasswordHasher } from "../services/passwordHasher";
import { SeedData } from "../stores/appStore";

/**
 * Seed Loader - builds the initial in-memory state from a JSON file
 *
 * The file uses the same snake_case layout as the API:
 *
 *   {
 *     "activities":    { "<name>": { description, schedule, schedule_details, max_participants, participants } },
 *     "teachers":      { "<username>": { display_name | name, role?, password | password_hash } },
 *     "announcements": { "<id>": { message, start_date?, end_date, created_by, created_at } }
 *   }
 *
 * Teachers given a plain `password` get it hashed here; `password_hash`
 * is taken as an existing bcrypt hash.
 */

type JsonObject = Record<string, unknown>;

export class SeedError extends Error {
  constructor(message: string) {
    super(`Invalid seed data: ${message}`);
    this.name = "SeedError";
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, where: string): JsonObject {
  if (!isObject(value)) {
    throw new SeedError(`${where} must be an object`);
  }
  return value;
}

function requireString(obj: JsonObject, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    throw new SeedError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalString(obj: JsonObject, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new SeedError(`${where}.${key} must be a string`);
  }
  return value;
}

function requireStringArray(obj: JsonObject, key: string, where: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new SeedError(`${where}.${key} must be an array of strings`);
  }
  return [...value];
}

function parseActivity(name: string, raw: unknown): Activity {
  const where = `activities["${name}"]`;
  const obj = requireObject(raw, where);
  const details = requireObject(obj.schedule_details, `${where}.schedule_details`);
  const maxParticipants = obj.max_participants;

  if (typeof maxParticipants !== "number") {
    throw new SeedError(`${where}.max_participants must be a number`);
  }

  const participants = requireStringArray(obj, "participants", where);
  if (new Set(participants).size !== participants.length) {
    throw new SeedError(`${where}.participants contains duplicates`);
  }

  return {
    name,
    description: requireString(obj, "description", where),
    schedule: requireString(obj, "schedule", where),
    scheduleDetails: {
      days: requireStringArray(details, "days", `${where}.schedule_details`),
      startTime: requireString(details, "start_time", `${where}.schedule_details`),
      endTime: requireString(details, "end_time", `${where}.schedule_details`),
    },
    maxParticipants,
    participants,
  };
}

async function parseTeacher(username: string, raw: unknown, hasher: PasswordHasher): Promise<TeacherCredential> {
  const where = `teachers["${username}"]`;
  const obj = requireObject(raw, where);

  const existingHash = optionalString(obj, "password_hash", where);
  const passwordHash = existingHash ?? (await hasher.hash(requireString(obj, "password", where)));

  return {
    username,
    passwordHash,
    displayName: optionalString(obj, "display_name", where),
    name: optionalString(obj, "name", where),
    role: optionalString(obj, "role", where),
  };
}

function parseAnnouncement(id: string, raw: unknown): Announcement {
  const where = `announcements["${id}"]`;
  const obj = requireObject(raw, where);

  if (!/^[1-9]\d*$/.test(id)) {
    throw new SeedError(`${where} id must be a positive integer`);
  }

  return {
    id,
    message: requireString(obj, "message", where),
    startDate: optionalString(obj, "start_date", where) ?? null,
    endDate: requireString(obj, "end_date", where),
    createdBy: requireString(obj, "created_by", where),
    createdAt: requireString(obj, "created_at", where),
  };
}

/**
 * Turn parsed seed JSON into store records
 */
export async function parseSeed(raw: unknown, hasher: PasswordHasher): Promise<SeedData> {
  const root = requireObject(raw, "seed");
  const activities = requireObject(root.activities ?? {}, "activities");
  const teachers = requireObject(root.teachers ?? {}, "teachers");
  const announcements = requireObject(root.announcements ?? {}, "announcements");

  return {
    activities: Object.entries(activities).map(([name, a]) => parseActivity(name, a)),
    teachers: await Promise.all(
      Object.entries(teachers).map(([username, t]) => parseTeacher(username, t, hasher))
    ),
    announcements: Object.entries(announcements).map(([id, a]) => parseAnnouncement(id, a)),
  };
}

/**
 * Load and parse a seed file
 */
export async function loadSeedFile(filePath: string, hasher: PasswordHasher): Promise<SeedData> {
  const rawData = fs.readFileSync(filePath, "utf-8");
  let parsed: unknown;

  try {
    parsed = JSON.parse(rawData);
  } catch (err) {
    throw new SeedError(`${filePath} is not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  return parseSeed(parsed, hasher);
}
