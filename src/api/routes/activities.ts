/**
 * Activities API Routes
 *
 * Public listing of activities and their days, plus teacher-only
 * signup and unregistration of students.
 */

import { Request, RequestHandler, Router } from "express";
import { InvalidRequestError } from "../../domain/errors";
import { ActivityService } from "../../services/activityService";
import { readBody, readString, sendError } from "../respond";
import { MessageResponse, toActivityMap } from "../serializers";

/**
 * Student email from the query string, or from a JSON body
 */
function readEmail(req: Request): string {
  const email = readString(req.query.email) ?? readString(readBody(req.body).email);
  if (!email) {
    throw new InvalidRequestError("Email is required");
  }
  return email;
}

export function createActivitiesRouter(
  activityService: ActivityService,
  requireTeacher: RequestHandler
): Router {
  const router = Router();

  /**
   * GET /activities
   * Optional filters: day, start_time (at or after), end_time (at or before)
   */
  router.get("/", (req, res) => {
    try {
      const activities = activityService.list({
        day: readString(req.query.day),
        startTime: readString(req.query.start_time),
        endTime: readString(req.query.end_time),
      });
      res.json(toActivityMap(activities));
    } catch (error) {
      sendError(res, error, "Failed to fetch activities");
    }
  });

  /**
   * GET /activities/days
   * Every day that has an activity, alphabetical
   */
  router.get("/days", (req, res) => {
    try {
      res.json(activityService.availableDays());
    } catch (error) {
      sendError(res, error, "Failed to fetch activity days");
    }
  });

  // POST /activities/:name/signup?email=...&teacher_username=...
  router.post("/:name/signup", requireTeacher, (req, res) => {
    try {
      const message = activityService.signup(req.params.name, readEmail(req));
      const body: MessageResponse = { message };
      res.json(body);
    } catch (error) {
      sendError(res, error, "Failed to sign up for activity");
    }
  });

  // POST /activities/:name/unregister?email=...&teacher_username=...
  router.post("/:name/unregister", requireTeacher, (req, res) => {
    try {
      const message = activityService.unregister(req.params.name, readEmail(req));
      const body: MessageResponse = { message };
      res.json(body);
    } catch (error) {
      sendError(res, error, "Failed to unregister from activity");
    }
  });

  return router;
}
