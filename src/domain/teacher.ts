/**
 * Teacher Credential Domain Model
 *
 * Teachers are provisioned at seed time and are read-only through the API.
 * The stored password is always a bcrypt hash.
 */

export interface TeacherCredential {
  username: string;
  passwordHash: string;
  displayName?: string;
  /** Older records only carry a plain name */
  name?: string;
  /** Free-form, e.g. "teacher" or "admin" */
  role?: string;
}

/**
 * What login and session check return - never includes the hash
 */
export interface TeacherSession {
  username: string;
  displayName: string;
  role: string;
}

export function toTeacherSession(teacher: TeacherCredential): TeacherSession {
  return {
    username: teacher.username,
    displayName: teacher.displayName ?? teacher.name ?? "",
    role: teacher.role ?? "teacher",
  };
}
