import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const emptyDotenvPath = path.join(os.tmpdir(), "rooms-bot-vitest-empty.env");
if (!fs.existsSync(emptyDotenvPath)) {
  fs.writeFileSync(emptyDotenvPath, "", "utf8");
}

// keep a developer's .env out of the tests
process.env.DOTENV_CONFIG_PATH = emptyDotenvPath;
process.env.DOTENV_CONFIG_OVERRIDE = "false";

process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "error";
