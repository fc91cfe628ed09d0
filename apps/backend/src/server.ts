import dotenv from "dotenv";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createServices } from "./services.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenv.config({ path: resolve(__dirname, "../../../.env") });
dotenv.config();

const config = loadConfig();
const services = createServices(config);
const app = createApp(config, services);

app.listen(config.port, () => {
  console.log(`[server] article function listening on http://localhost:${config.port} (provider: ${services.provider.name})`);
});
