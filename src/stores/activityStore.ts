import { Activity } from "../domain/activity";

/**
 * ActivityStore - in-memory activity directory keyed by activity name
 *
 * Built from seed records; reset() restores the seed (used by tests).
 * Activities are never created or deleted after startup, only their
 * participant lists change.
 */
export class ActivityStore {
  private activities: Map<string, Activity> = new Map();

  constructor(private readonly seed: Activity[]) {
    this.reset();
  }

  /**
   * Get an activity by name
   */
  load(name: string): Activity | null {
    return this.activities.get(name) || null;
  }

  /**
   * Get all activities in seed order
   */
  getAll(): Activity[] {
    return Array.from(this.activities.values());
  }

  /**
   * Append a participant. Returns false if the activity does not exist.
   */
  addParticipant(name: string, email: string): boolean {
    const activity = this.activities.get(name);
    if (!activity) {
      return false;
    }

    activity.participants.push(email);
    return true;
  }

  /**
   * Remove a participant by value. Returns false if nothing was removed.
   */
  removeParticipant(name: string, email: string): boolean {
    const activity = this.activities.get(name);
    if (!activity) {
      return false;
    }

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      return false;
    }

    activity.participants.splice(index, 1);
    return true;
  }

  reset(): void {
    this.activities = new Map(this.seed.map((a) => [a.name, structuredClone(a)]));
  }
}
