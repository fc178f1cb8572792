import path from "path";
import { DEFAULT_CORS_ORIGINS, DEFAULT_PORT, DEFAULT_SEED_FILE, loadConfig } from "./config";

describe("loadConfig", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: DEFAULT_PORT,
      seedFile: DEFAULT_SEED_FILE,
      bcryptRounds: 10,
      corsOrigins: DEFAULT_CORS_ORIGINS,
    });
  });

  it("points the default seed file at data/seed.json in the project root", () => {
    expect(DEFAULT_SEED_FILE).toBe(path.join(__dirname, "..", "data", "seed.json"));
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      API_PORT: "8080",
      SEED_FILE: "/srv/school/seed.json",
      BCRYPT_ROUNDS: "12",
      CORS_ORIGINS: "https://school.example.org, https://staff.example.org",
    });

    expect(config).toEqual({
      port: 8080,
      seedFile: "/srv/school/seed.json",
      bcryptRounds: 12,
      corsOrigins: ["https://school.example.org", "https://staff.example.org"],
    });
  });

  it("falls back to defaults for invalid numbers", () => {
    const config = loadConfig({ API_PORT: "not-a-port", BCRYPT_ROUNDS: "2" });

    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.bcryptRounds).toBe(10);
    expect(console.error).toHaveBeenCalledTimes(2);
  });

  it("ignores an empty origin list", () => {
    expect(loadConfig({ CORS_ORIGINS: " , " }).corsOrigins).toEqual(DEFAULT_CORS_ORIGINS);
  });
});
