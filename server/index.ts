// Main server file
import 'dotenv/config';
import { createServer } from "http";
import { createApp, createContext } from "./app.js";
import { isOpenAIConfigured } from "./lib/openai.js";

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

const context = createContext();
const app = createApp(context);

if (!isOpenAIConfigured()) {
  console.warn("⚠️ No OpenAI credentials configured, AI insights will be unavailable");
}

const cleanupTimer = setInterval(() => context.storage.cleanupExpired(), CLEANUP_INTERVAL_MS);
cleanupTimer.unref();

const server = createServer(app);
server.listen(context.config.port, () => {
  console.log(`🚀 Server running on port ${context.config.port}`);
});

server.on('error', (error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
