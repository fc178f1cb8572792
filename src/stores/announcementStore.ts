import { Announcement } from "../domain/announcement";

export type NewAnnouncement = Omit<Announcement, "id">;

/**
 * Highest positive integer id among the given records (0 if none)
 */
function maxNumericId(announcements: Announcement[]): number {
  let max = 0;
  for (const a of announcements) {
    const n = Number(a.id);
    if (Number.isInteger(n) && n > max) {
      max = n;
    }
  }
  return max;
}

/**
 * AnnouncementStore - in-memory announcement board keyed by id
 *
 * Ids come from a counter owned by the store, starting after the highest
 * seeded id. Deleting the newest announcement does not free its id.
 */
export class AnnouncementStore {
  private announcements: Map<string, Announcement> = new Map();
  private lastId = 0;

  constructor(private readonly seed: Announcement[] = []) {
    this.reset();
  }

  /**
   * Store a new announcement under the next id
   */
  create(input: NewAnnouncement): Announcement {
    this.lastId += 1;
    const announcement: Announcement = { id: String(this.lastId), ...input };
    this.announcements.set(announcement.id, announcement);
    return announcement;
  }

  /**
   * Get an announcement by id
   */
  load(id: string): Announcement | null {
    return this.announcements.get(id) || null;
  }

  /**
   * Get all announcements in insertion order
   */
  getAll(): Announcement[] {
    return Array.from(this.announcements.values());
  }

  /**
   * Replace an existing announcement. Returns false for an unknown id.
   */
  save(announcement: Announcement): boolean {
    if (!this.announcements.has(announcement.id)) {
      return false;
    }
    this.announcements.set(announcement.id, announcement);
    return true;
  }

  delete(id: string): boolean {
    return this.announcements.delete(id);
  }

  reset(): void {
    this.announcements = new Map(this.seed.map((a) => [a.id, { ...a }]));
    this.lastId = maxNumericId(this.seed);
  }
}
