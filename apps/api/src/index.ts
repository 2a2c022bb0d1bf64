import dotenv from "dotenv";
import path from "path";
import fs from "fs";
import { getLogger } from "@core";
import { createApp } from "./app";
import { loadConfig } from "./config";

// Load env from repo root first, then allow app-local overrides
const rootEnv = path.resolve(__dirname, "../../../.env");
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const config = loadConfig();
const logger = getLogger("api");
const app = createApp({ config, logger });

app.listen(config.port, () => {
  logger.info("api.listening", { port: config.port, cors_origins: config.corsOrigins });
});
