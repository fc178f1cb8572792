import { ActivityService } from "./activityService";
import { Activity } from "../domain/activity";
import { InvalidRequestError, NotFoundError } from "../domain/errors";
import { ActivityStore } from "../stores/activityStore";

describe("ActivityService", () => {
  const createActivity = (
    name: string,
    days: string[],
    startTime: string,
    endTime: string,
    participants: string[] = []
  ): Activity => ({
    name,
    description: `${name} description`,
    schedule: `${days.join(", ")} ${startTime}-${endTime}`,
    scheduleDetails: { days, startTime, endTime },
    maxParticipants: 10,
    participants,
  });

  let store: ActivityStore;
  let service: ActivityService;

  beforeEach(() => {
    store = new ActivityStore([
      createActivity("Chess Club", ["Monday", "Friday"], "15:15", "16:45", ["lena@example.edu"]),
      createActivity("Morning Run", ["Wednesday", "Monday"], "06:30", "07:30"),
      createActivity("Art Studio", ["Wednesday"], "15:15", "17:00"),
    ]);
    service = new ActivityService(store);
  });

  describe("list", () => {
    it("returns every activity without filters", () => {
      expect(service.list().map((a) => a.name)).toEqual(["Chess Club", "Morning Run", "Art Studio"]);
    });

    it("returns an activity for a day iff the day is in its schedule", () => {
      expect(service.list({ day: "Monday" }).map((a) => a.name)).toEqual(["Chess Club", "Morning Run"]);
      expect(service.list({ day: "Friday" }).map((a) => a.name)).toEqual(["Chess Club"]);
    });

    it("excludes activities that start before start_time", () => {
      expect(service.list({ startTime: "15:00" }).map((a) => a.name)).toEqual(["Chess Club", "Art Studio"]);
    });

    it("excludes activities that end after end_time", () => {
      expect(service.list({ endTime: "16:45" }).map((a) => a.name)).toEqual(["Chess Club", "Morning Run"]);
    });
  });

  describe("availableDays", () => {
    it("returns each day once, alphabetically", () => {
      expect(service.availableDays()).toEqual(["Friday", "Monday", "Wednesday"]);
    });
  });

  describe("signup", () => {
    it("adds the student and returns a confirmation", () => {
      expect(service.signup("Art Studio", "noor@example.edu")).toBe("Signed up noor@example.edu for Art Studio");
      expect(store.load("Art Studio")?.participants).toEqual(["noor@example.edu"]);
    });

    it("succeeds once then rejects the same email", () => {
      service.signup("Art Studio", "noor@example.edu");

      expect(() => service.signup("Art Studio", "noor@example.edu")).toThrow(InvalidRequestError);
      expect(() => service.signup("Art Studio", "noor@example.edu")).toThrow("Already signed up for this activity");
      expect(store.load("Art Studio")?.participants).toEqual(["noor@example.edu"]);
    });

    it("rejects an unknown activity with NotFoundError", () => {
      expect(() => service.signup("Knitting", "noor@example.edu")).toThrow(NotFoundError);
      expect(() => service.signup("Knitting", "noor@example.edu")).toThrow("Activity not found");
    });

    it("does not cap the number of participants", () => {
      for (let i = 0; i < 15; i++) {
        service.signup("Art Studio", `student${i}@example.edu`);
      }
      expect(store.load("Art Studio")?.participants).toHaveLength(15);
    });
  });

  describe("unregister", () => {
    it("removes a student after signup", () => {
      service.signup("Art Studio", "noor@example.edu");

      expect(service.unregister("Art Studio", "noor@example.edu")).toBe(
        "Unregistered noor@example.edu from Art Studio"
      );
      expect(store.load("Art Studio")?.participants).toEqual([]);
    });

    it("rejects a student who is not signed up", () => {
      expect(() => service.unregister("Art Studio", "noor@example.edu")).toThrow(
        "Not registered for this activity"
      );
    });

    it("rejects an unknown activity", () => {
      expect(() => service.unregister("Knitting", "lena@example.edu")).toThrow(NotFoundError);
    });
  });
});
