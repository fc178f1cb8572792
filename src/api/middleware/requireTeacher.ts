import { Request, RequestHandler, Response } from "express";
import { UnauthenticatedError } from "../../domain/errors";
import { TeacherCredential } from "../../domain/teacher";
import { TeacherAuthenticator } from "../../services/teacherAuthenticator";
import { readString, sendError } from "../respond";

declare global {
  namespace Express {
    interface Locals {
      teacher?: TeacherCredential;
    }
  }
}

export type CredentialReader = (req: Request) => string | undefined;

/**
 * The credential travels as a plain `teacher_username` query parameter.
 */
export const teacherUsernameFromQuery: CredentialReader = (req) =>
  readString(req.query.teacher_username);

/**
 * Reject the request unless the authenticator accepts its credential.
 * The authenticated teacher is left on res.locals.teacher.
 */
export function requireTeacher(
  authenticator: TeacherAuthenticator,
  readCredential: CredentialReader = teacherUsernameFromQuery
): RequestHandler {
  return (req, res, next) => {
    try {
      res.locals.teacher = authenticator.authenticate(readCredential(req));
    } catch (error) {
      sendError(res, error, "Failed to authenticate");
      return;
    }
    next();
  };
}

/**
 * The teacher set by requireTeacher
 */
export function getTeacher(res: Response): TeacherCredential {
  const teacher = res.locals.teacher;
  if (!teacher) {
    throw new UnauthenticatedError();
  }
  return teacher;
}
