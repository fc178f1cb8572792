/**
 * Announcement Service
 *
 * Handles the announcement board:
 * - Active listing for everyone (window contains today)
 * - Full listing, create, update and delete for teachers
 *
 * "Today" is the local calendar date of the injected clock.
 */

import {
  Announcement,
  AnnouncementUpdate,
  CreateAnnouncementInput,
  applyAnnouncementUpdate,
  isActiveOn,
  sortByNewest,
  toLocalIsoDate,
  validateNewAnnouncement,
} from "../domain/announcement";
import { NotFoundError } from "../domain/errors";
import { AnnouncementStore } from "../stores/announcementStore";

export type Clock = () => Date;

export class AnnouncementService {
  constructor(
    private readonly announcements: AnnouncementStore,
    private readonly now: Clock = () => new Date()
  ) {}

  private today(): string {
    return toLocalIsoDate(this.now());
  }

  /**
   * Announcements visible today, newest first
   */
  listActive(): Announcement[] {
    const today = this.today();
    return sortByNewest(this.announcements.getAll().filter((a) => isActiveOn(a, today)));
  }

  /**
   * Every announcement including expired and upcoming ones, newest first
   */
  listAll(): Announcement[] {
    return sortByNewest(this.announcements.getAll());
  }

  create(input: CreateAnnouncementInput, createdBy: string): Announcement {
    const { startDate, endDate } = validateNewAnnouncement(input, this.today());

    return this.announcements.create({
      message: input.message,
      startDate,
      endDate,
      createdBy,
      createdAt: this.now().toISOString(),
    });
  }

  /**
   * Apply a partial update. Nothing changes if validation fails.
   */
  update(id: string, update: AnnouncementUpdate): Announcement {
    const existing = this.requireAnnouncement(id);
    const updated = applyAnnouncementUpdate(existing, update);
    this.announcements.save(updated);
    return updated;
  }

  delete(id: string): void {
    if (!this.announcements.delete(id)) {
      throw new NotFoundError("Announcement not found");
    }
  }

  private requireAnnouncement(id: string): Announcement {
    const announcement = this.announcements.load(id);
    if (!announcement) {
      throw new NotFoundError("Announcement not found");
    }
    return announcement;
  }
}
