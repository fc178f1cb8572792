/**
 * AppStore - the process-wide state, constructed once from seed data
 *
 * Routers and services receive this object instead of importing module
 * singletons. Every operation is synchronous and runs to completion on the
 * event loop, so mutations never interleave.
 */

import { Activity } from "../domain/activity";
import { Announcement } from "../domain/announcement";
import { TeacherCredential } from "../domain/teacher";
import { ActivityStore } from "./activityStore";
import { AnnouncementStore } from "./announcementStore";
import { TeacherStore } from "./teacherStore";

export interface SeedData {
  activities: Activity[];
  announcements: Announcement[];
  teachers: TeacherCredential[];
}

export class AppStore {
  readonly activities: ActivityStore;
  readonly announcements: AnnouncementStore;
  readonly teachers: TeacherStore;

  constructor(seed: SeedData) {
    this.activities = new ActivityStore(seed.activities);
    this.announcements = new AnnouncementStore(seed.announcements);
    this.teachers = new TeacherStore(seed.teachers);
  }

  /**
   * Restore activities and announcements to their seeded state.
   * Teachers are read-only and need no reset.
   */
  reset(): void {
    this.activities.reset();
    this.announcements.reset();
  }
}
