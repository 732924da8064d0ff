/*******************************************************************
 * src/server.ts – starts the SEGY statistics API
 *
 * Run with:
 *   npm run serve
 *
 * Configuration comes from .env (see src/config.ts).
 ******************************************************************/

import dotenv from "dotenv";
import { createApp } from "./app.ts";
import { loadConfig } from "./config.ts";
import { errorMessage } from "./errors.ts";

function main(): void {
  dotenv.config(); // loads .env → process.env
  const config = loadConfig();
  const app = createApp(config);

  app.listen(config.port, () => {
    console.log(`🚀 SEGY API listening on http://localhost:${config.port}`);
    console.log(`🔎 Inventory directory: ${config.dataDir}`);
  });
}

try {
  main();
} catch (err) {
  console.error("❌ Fatal error:", errorMessage(err));
  process.exit(1);
}
