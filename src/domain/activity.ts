/**
 * Activity Domain Model
 *
 * An activity is a named extracurricular offering with a weekly schedule
 * and a list of signed-up students (by email).
 *
 * Times are "HH:MM" (24-hour, zero-padded), so plain string comparison
 * orders them correctly. Nothing validates that format.
 */

export interface ScheduleDetails {
  days: string[]; // Weekday names, e.g. ["Monday", "Wednesday"]
  startTime: string; // "HH:MM"
  endTime: string; // "HH:MM"
}

export interface Activity {
  name: string;
  description: string;
  schedule: string; // Human-readable, e.g. "Mondays and Fridays, 3:15 PM - 4:45 PM"
  scheduleDetails: ScheduleDetails;
  maxParticipants: number; // Display only, not enforced
  participants: string[]; // Student emails, each at most once
}

/**
 * Optional filters for listing activities. Empty strings count as unset.
 */
export interface ActivityFilter {
  day?: string;
  startTime?: string; // Keep activities starting at or after this time
  endTime?: string; // Keep activities ending at or before this time
}

/**
 * Check an activity against a filter
 */
export function matchesFilter(activity: Activity, filter: ActivityFilter): boolean {
  const { days, startTime, endTime } = activity.scheduleDetails;

  if (filter.day && !days.includes(filter.day)) {
    return false;
  }

  if (filter.startTime && startTime < filter.startTime) {
    return false;
  }

  if (filter.endTime && endTime > filter.endTime) {
    return false;
  }

  return true;
}

/**
 * Apply a filter, keeping the activities that match
 */
export function filterActivities(activities: Activity[], filter: ActivityFilter): Activity[] {
  return activities.filter((a) => matchesFilter(a, filter));
}

/**
 * Every day any activity runs on, deduplicated and sorted alphabetically.
 * Alphabetical, not calendar order: "Friday" comes before "Monday".
 */
export function getAvailableDays(activities: Activity[]): string[] {
  const days = new Set<string>();

  for (const activity of activities) {
    for (const day of activity.scheduleDetails.days) {
      days.add(day);
    }
  }

  return [...days].sort();
}

export function isParticipant(activity: Activity, email: string): boolean {
  return activity.participants.includes(email);
}
