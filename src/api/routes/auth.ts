/**
 * Auth API Routes
 *
 * Credentials are accepted as query parameters (what existing clients
 * send) or as a JSON body.
 */

import { Request, Router } from "express";
import { InvalidRequestError } from "../../domain/errors";
import { AuthService } from "../../services/authService";
import { readBody, readString, sendError } from "../respond";
import { toTeacherSessionResponse } from "../serializers";

function requireParam(req: Request, key: string): string {
  const value = readString(req.query[key]) ?? readString(readBody(req.body)[key]);
  if (value === undefined) {
    throw new InvalidRequestError(`${key} is required`);
  }
  return value;
}

export function createAuthRouter(authService: AuthService): Router {
  const router = Router();

  // POST /auth/login
  router.post("/login", async (req, res) => {
    try {
      const session = await authService.login(requireParam(req, "username"), requireParam(req, "password"));
      res.json(toTeacherSessionResponse(session));
    } catch (error) {
      sendError(res, error, "Failed to login");
    }
  });

  // GET /auth/check-session?username=...
  router.get("/check-session", (req, res) => {
    try {
      const session = authService.checkSession(requireParam(req, "username"));
      res.json(toTeacherSessionResponse(session));
    } catch (error) {
      sendError(res, error, "Failed to check session");
    }
  });

  return router;
}
