/**
 * Wire format - the API speaks snake_case JSON
 */

import { Activity } from "../domain/activity";
import { Announcement } from "../domain/announcement";
import { TeacherSession } from "../domain/teacher";

export interface ActivityResponse {
  description: string;
  schedule: string;
  schedule_details: {
    days: string[];
    start_time: string;
    end_time: string;
  };
  max_participants: number;
  participants: string[];
}

export interface AnnouncementResponse {
  id: string;
  message: string;
  start_date: string | null;
  end_date: string;
  created_by: string;
  created_at: string;
}

export interface TeacherSessionResponse {
  username: string;
  display_name: string;
  role: string;
}

export interface MessageResponse {
  message: string;
}

export function toActivityResponse(activity: Activity): ActivityResponse {
  return {
    description: activity.description,
    schedule: activity.schedule,
    schedule_details: {
      days: [...activity.scheduleDetails.days],
      start_time: activity.scheduleDetails.startTime,
      end_time: activity.scheduleDetails.endTime,
    },
    max_participants: activity.maxParticipants,
    participants: [...activity.participants],
  };
}

/**
 * Activities keyed by name
 */
export function toActivityMap(activities: Activity[]): Record<string, ActivityResponse> {
  const result: Record<string, ActivityResponse> = {};
  for (const activity of activities) {
    result[activity.name] = toActivityResponse(activity);
  }
  return result;
}

export function toAnnouncementResponse(announcement: Announcement): AnnouncementResponse {
  return {
    id: announcement.id,
    message: announcement.message,
    start_date: announcement.startDate,
    end_date: announcement.endDate,
    created_by: announcement.createdBy,
    created_at: announcement.createdAt,
  };
}

export function toTeacherSessionResponse(session: TeacherSession): TeacherSessionResponse {
  return {
    username: session.username,
    display_name: session.displayName,
    role: session.role,
  };
}
