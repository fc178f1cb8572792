/**
 * Activity Service
 *
 * Listing, filtering and participant changes for the activity directory.
 * Callers are expected to have authenticated the teacher already.
 */

import {
  Activity,
  ActivityFilter,
  filterActivities,
  getAvailableDays,
  isParticipant,
} from "../domain/activity";
import { InvalidRequestError, NotFoundError } from "../domain/errors";
import { ActivityStore } from "../stores/activityStore";

export class ActivityService {
  constructor(private readonly activities: ActivityStore) {}

  list(filter: ActivityFilter = {}): Activity[] {
    return filterActivities(this.activities.getAll(), filter);
  }

  availableDays(): string[] {
    return getAvailableDays(this.activities.getAll());
  }

  /**
   * Sign a student up. Returns the confirmation message.
   */
  signup(activityName: string, email: string): string {
    const activity = this.requireActivity(activityName);

    if (isParticipant(activity, email)) {
      throw new InvalidRequestError("Already signed up for this activity");
    }

    this.activities.addParticipant(activityName, email);
    return `Signed up ${email} for ${activityName}`;
  }

  /**
   * Remove a student. Returns the confirmation message.
   */
  unregister(activityName: string, email: string): string {
    const activity = this.requireActivity(activityName);

    if (!isParticipant(activity, email)) {
      throw new InvalidRequestError("Not registered for this activity");
    }

    this.activities.removeParticipant(activityName, email);
    return `Unregistered ${email} from ${activityName}`;
  }

  private requireActivity(name: string): Activity {
    const activity = this.activities.load(name);
    if (!activity) {
      throw new NotFoundError("Activity not found");
    }
    return activity;
  }
}
