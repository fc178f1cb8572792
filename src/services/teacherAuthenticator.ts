import { UnauthenticatedError } from "../domain/errors";
import { TeacherCredential } from "../domain/teacher";
import { TeacherStore } from "../stores/teacherStore";

/**
 * Decides whether a request credential belongs to a teacher.
 *
 * Teacher-only routes depend on this interface only, so a token or
 * session scheme can replace the username lookup without touching them.
 */
export interface TeacherAuthenticator {
  authenticate(credential: string | undefined): TeacherCredential;
}

/**
 * Treats a known username as proof of identity. No secret is checked.
 */
export class UsernameAuthenticator implements TeacherAuthenticator {
  constructor(private readonly teachers: TeacherStore) {}

  authenticate(credential: string | undefined): TeacherCredential {
    if (!credential) {
      throw new UnauthenticatedError("Authentication required for this action");
    }

    const teacher = this.teachers.load(credential);
    if (!teacher) {
      throw new UnauthenticatedError("Invalid teacher credentials");
    }

    return teacher;
  }
}
