// Load environment variables in development
// Production hosts are expected to set them directly

import path from "path";
import fs from "fs";
import { config as loadDotenv } from "dotenv";

if (process.env.NODE_ENV !== "production") {
  const cwd = process.cwd();
  const envLocalPath = path.resolve(cwd, ".env.local");
  const envPath = path.resolve(cwd, ".env");

  if (fs.existsSync(envLocalPath)) {
    loadDotenv({ path: envLocalPath });
  } else if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath });
  }
}

export {};
