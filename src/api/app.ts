import express, { ErrorRequestHandler, Express } from "express";
import cors from "cors";

import { AppStore } from "../stores/appStore";
import { ActivityService } from "../services/activityService";
import { AnnouncementService, Clock } from "../services/announcementService";
import { AuthService } from "../services/authService";
import { PasswordHasher } from "../services/passwordHasher";
import { TeacherAuthenticator, UsernameAuthenticator } from "../services/teacherAuthenticator";
import { requireTeacher } from "./middleware/requireTeacher";
import { ErrorResponse } from "./respond";
import { createActivitiesRouter } from "./routes/activities";
import { createAnnouncementsRouter } from "./routes/announcements";
import { createAuthRouter } from "./routes/auth";

export interface AppOptions {
  hasher: PasswordHasher;
  corsOrigins: string[];
  /** Defaults to a lookup of the teacher_username query parameter */
  authenticator?: TeacherAuthenticator;
  clock?: Clock;
}

/**
 * Body parser failures that carry a 4xx status (413 too large, 415 bad
 * charset) keep it
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

/**
 * Malformed JSON bodies become 400s and other client errors keep their
 * status; anything else that escaped a route is a 500
 */
export const handleUncaughtError: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof SyntaxError) {
    const body: ErrorResponse = { error: "Malformed JSON body" };
    res.status(400).json(body);
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    const body: ErrorResponse = { error: err instanceof Error ? err.message : "Bad request" };
    res.status(status).json(body);
    return;
  }

  console.error("Unhandled error:", err);
  const body: ErrorResponse = { error: "Internal server error" };
  res.status(500).json(body);
};

export async function createApp(store: AppStore, options: AppOptions): Promise<Express> {
  const authenticator = options.authenticator ?? new UsernameAuthenticator(store.teachers);
  const teacherOnly = requireTeacher(authenticator);

  const activityService = new ActivityService(store.activities);
  const announcementService = new AnnouncementService(store.announcements, options.clock);
  const authService = await AuthService.create(store.teachers, options.hasher);

  const app = express();

  // Middleware
  app.use(cors({
    origin: options.corsOrigins,
    credentials: true,
  }));
  app.use(express.json());

  // Routes
  app.use("/activities", createActivitiesRouter(activityService, teacherOnly));
  app.use("/announcements", createAnnouncementsRouter(announcementService, teacherOnly));
  app.use("/auth", createAuthRouter(authService));

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use((req, res) => {
    const body: ErrorResponse = { error: "Not found" };
    res.status(404).json(body);
  });
  app.use(handleUncaughtError);

  return app;
}
