import { TeacherCredential } from "../domain/teacher";

/**
 * TeacherStore - read-only credential store keyed by username
 */
export class TeacherStore {
  private teachers: Map<string, TeacherCredential>;

  constructor(teachers: TeacherCredential[]) {
    this.teachers = new Map(teachers.map((t) => [t.username, t]));
  }

  /**
   * Get a teacher by username
   */
  load(username: string): TeacherCredential | null {
    return this.teachers.get(username) || null;
  }
}
