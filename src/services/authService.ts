/**
 * Auth Service
 *
 * Teacher login and the username-only session check.
 *
 * checkSession takes no secret: anyone who knows a username can "check" it.
 * That contract is kept for existing clients; teacher-only endpoints go
 * through TeacherAuthenticator instead.
 */

import { NotFoundError, UnauthenticatedError } from "../domain/errors";
import { TeacherSession, toTeacherSession } from "../domain/teacher";
import { TeacherStore } from "../stores/teacherStore";
import { PasswordHasher } from "./passwordHasher";

const INVALID_LOGIN_MESSAGE = "Invalid username or password";

export class AuthService {
  constructor(
    private readonly teachers: TeacherStore,
    private readonly hasher: PasswordHasher,
    // Compared against when the username is unknown, so both failures cost one hash check
    private readonly dummyHash: string
  ) {}

  /**
   * Build the service, hashing the stand-in password once up front
   */
  static async create(teachers: TeacherStore, hasher: PasswordHasher): Promise<AuthService> {
    const dummyHash = await hasher.hash("not-a-teacher-password");
    return new AuthService(teachers, hasher, dummyHash);
  }

  async login(username: string, password: string): Promise<TeacherSession> {
    const teacher = this.teachers.load(username);

    if (!teacher) {
      await this.hasher.verify(this.dummyHash, password);
      throw new UnauthenticatedError(INVALID_LOGIN_MESSAGE);
    }

    if (!(await this.hasher.verify(teacher.passwordHash, password))) {
      throw new UnauthenticatedError(INVALID_LOGIN_MESSAGE);
    }

    return toTeacherSession(teacher);
  }

  checkSession(username: string): TeacherSession {
    const teacher = this.teachers.load(username);
    if (!teacher) {
      throw new NotFoundError("Teacher not found");
    }
    return toTeacherSession(teacher);
  }
}
