/**
 * Announcements API Routes
 *
 * GET /announcements is public and only shows what is active today.
 * Everything else requires a teacher.
 */

import { RequestHandler, Router } from "express";
import {
  AnnouncementUpdate,
  CreateAnnouncementInput,
  fieldFromOptional,
} from "../../domain/announcement";
import { InvalidRequestError } from "../../domain/errors";
import { AnnouncementService } from "../../services/announcementService";
import { getTeacher } from "../middleware/requireTeacher";
import { readBody, sendError } from "../respond";
import { MessageResponse, toAnnouncementResponse } from "../serializers";

/**
 * A body field that may be absent or null but otherwise must be a string
 */
function optionalStringField(body: Record<string, unknown>, key: string): string | null {
  const value = body[key];
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    throw new InvalidRequestError(`${key} must be a string`);
  }
  return value;
}

function parseCreateBody(raw: unknown): CreateAnnouncementInput {
  const body = readBody(raw);
  if (typeof body.message !== "string") {
    throw new InvalidRequestError("Message is required");
  }

  return {
    message: body.message,
    startDate: optionalStringField(body, "start_date"),
    endDate: optionalStringField(body, "end_date"),
  };
}

function parseUpdateBody(raw: unknown): AnnouncementUpdate {
  const body = readBody(raw);
  return {
    message: fieldFromOptional(optionalStringField(body, "message")),
    startDate: fieldFromOptional(optionalStringField(body, "start_date")),
    endDate: fieldFromOptional(optionalStringField(body, "end_date")),
  };
}

export function createAnnouncementsRouter(
  announcementService: AnnouncementService,
  requireTeacher: RequestHandler
): Router {
  const router = Router();

  /**
   * GET /announcements
   * Announcements whose window contains today, newest first
   */
  router.get("/", (req, res) => {
    try {
      res.json(announcementService.listActive().map(toAnnouncementResponse));
    } catch (error) {
      sendError(res, error, "Failed to fetch announcements");
    }
  });

  /**
   * GET /announcements/all
   * Includes expired and upcoming announcements
   */
  router.get("/all", requireTeacher, (req, res) => {
    try {
      res.json(announcementService.listAll().map(toAnnouncementResponse));
    } catch (error) {
      sendError(res, error, "Failed to fetch announcements");
    }
  });

  /**
   * POST /announcements
   * Body: { message, start_date?, end_date }
   */
  router.post("/", requireTeacher, (req, res) => {
    try {
      const teacher = getTeacher(res);
      const announcement = announcementService.create(parseCreateBody(req.body), teacher.username);
      res.json(toAnnouncementResponse(announcement));
    } catch (error) {
      sendError(res, error, "Failed to create announcement");
    }
  });

  /**
   * PUT /announcements/:id
   * Partial update - omitted or null fields keep their value
   */
  router.put("/:id", requireTeacher, (req, res) => {
    try {
      const announcement = announcementService.update(req.params.id, parseUpdateBody(req.body));
      res.json(toAnnouncementResponse(announcement));
    } catch (error) {
      sendError(res, error, "Failed to update announcement");
    }
  });

  // DELETE /announcements/:id
  router.delete("/:id", requireTeacher, (req, res) => {
    try {
      announcementService.delete(req.params.id);
      const body: MessageResponse = { message: "Announcement deleted successfully" };
      res.json(body);
    } catch (error) {
      sendError(res, error, "Failed to delete announcement");
    }
  });

  return router;
}
