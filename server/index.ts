import path from "path";
import { fileURLToPath } from "url";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { HackerNewsClient } from "./hackernews/client.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const config = loadConfig();

const client = new HackerNewsClient({
  baseURL: config.apiUrl,
  timeoutMs: config.requestTimeoutMs,
  firstPartyHosts: config.firstPartyHosts,
});

const app = createApp({
  client,
  topStoriesLimit: config.topStoriesLimit,
  staticDir:
    config.nodeEnv === "production"
      ? path.join(__dirname, "../dist")
      : undefined,
});

app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
  console.log(`Upstream API: ${config.apiUrl}`);
  console.log(`First-party tracing hosts: ${config.firstPartyHosts.join(", ")}`);
});
