import "dotenv/config";
import { loadConfig } from "./config";
import { createApp } from "./app";
import { createPipelineDeps } from "./services/pipeline";
import { setupDatabase } from "./db/sqlite";

const config = loadConfig();

setupDatabase(config.dbFile);

const app = createApp(config, createPipelineDeps(config));

// Start server
app.listen(config.port, () => {
  console.log(`[server] Inquiry Triage Service started`);
  console.log(`[server] Port: ${config.port}`);
  console.log(`[server] Environment: ${config.nodeEnv}`);
  console.log(`[server] Database: ${config.dbFile}`);
  console.log(`[server] Run trigger: ${config.runApiKey ? "api key required" : "open (no RUN_API_KEY)"}`);
});

export default app;
