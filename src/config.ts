import path from "path";
import { DEFAULT_BCRYPT_ROUNDS } from "./services/passwordHasher";

export interface AppConfig {
  port: number;
  seedFile: string;
  bcryptRounds: number;
  corsOrigins: string[];
}

export const DEFAULT_PORT = 3001;
export const DEFAULT_SEED_FILE = path.join(__dirname, "../data/seed.json");
export const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000"];

function parseInteger(value: string | undefined, fallback: number, min: number, max: number): number {
  if (!value) {
    return fallback;
  }
  const n = Number(value);
  if (!Number.isInteger(n) || n < min || n > max) {
    console.error(`Ignoring invalid numeric setting "${value}", using ${fallback}`);
    return fallback;
  }
  return n;
}

/**
 * Read settings from the environment (load .env with dotenv first).
 * Unset or invalid values fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const corsOrigins = (env.CORS_ORIGINS || "")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  return {
    port: parseInteger(env.API_PORT, DEFAULT_PORT, 1, 65535),
    seedFile: env.SEED_FILE ? path.resolve(env.SEED_FILE) : DEFAULT_SEED_FILE,
    bcryptRounds: parseInteger(env.BCRYPT_ROUNDS, DEFAULT_BCRYPT_ROUNDS, 4, 31),
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : DEFAULT_CORS_ORIGINS,
  };
}
