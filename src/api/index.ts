import express from "express";
import cors from "cors";

import { AppConfig, loadConfig } from "../config";
import { CommandService } from "../services/commandService";
import { AddressBookStore } from "../stores/addressBookStore";
import { ModelManager } from "../stores/modelManager";
import { createCommandsRouter } from "./routes/commands";

export function createApp(service: CommandService, config: AppConfig) {
  const app = express();

  // Middleware
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
  }));
  app.use(express.json());

  // Routes
  app.use("/api", createCommandsRouter(service));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return app;
}

if (require.main === module) {
  const config = loadConfig();
  const store = new AddressBookStore(config.dataFile);
  const service = new CommandService(new ModelManager(store.load()), store);

  createApp(service, config).listen(config.apiPort, () => {
    console.log(`API server running on http://localhost:${config.apiPort}`);
    console.log(`Address book: ${config.dataFile}`);
  });
}
