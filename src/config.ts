import dotenv from "dotenv";
import path from "path";

dotenv.config();

const PROJECT_ROOT = path.join(__dirname, "..");

export interface AppConfig {
  apiPort: number;
  dataFile: string;
  corsOrigins: string[];
}

/**
 * Read settings from the environment (.env is loaded on import)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number(env.API_PORT);
  const dataFile = env.DATA_FILE || "data/addressbook.json";

  return {
    apiPort: Number.isInteger(port) && port > 0 ? port : 3001,
    dataFile: path.isAbsolute(dataFile) ? dataFile : path.join(PROJECT_ROOT, dataFile),
    corsOrigins: (env.CORS_ORIGINS || "http://localhost:5173,http://localhost:3000")
      .split(",")
      .map(origin => origin.trim())
      .filter(Boolean),
  };
}
