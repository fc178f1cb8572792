import dotenv from "dotenv";

import { loadConfig } from "../config";
import { loadSeedFile } from "../loaders/seedLoader";
import { BcryptPasswordHasher } from "../services/passwordHasher";
import { AppStore } from "../stores/appStore";
import { createApp } from "./app";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const hasher = new BcryptPasswordHasher(config.bcryptRounds);
  const seed = await loadSeedFile(config.seedFile, hasher);
  const store = new AppStore(seed);

  const app = await createApp(store, {
    hasher,
    corsOrigins: config.corsOrigins,
  });

  // Start server
  app.listen(config.port, () => {
    console.log(`API server running on http://localhost:${config.port}`);
    console.log(
      `Loaded ${seed.activities.length} activities, ${seed.teachers.length} teachers, ` +
        `${seed.announcements.length} announcements from ${config.seedFile}`
    );
  });
}

main().catch((error) => {
  console.error("Failed to start API server:", error);
  process.exit(1);
});
