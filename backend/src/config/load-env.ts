import { existsSync } from "node:fs";
import { resolve } from "node:path";

import { config } from "dotenv";

const loadIfExists = (filePath: string): void => {
  if (existsSync(filePath)) {
    config({ path: filePath, override: false });
  }
};

/** Earlier files win: variables already set are never overridden. */
export const loadEnvironmentFiles = (cwd: string = process.cwd()): void => {
  const candidates = [resolve(cwd, ".env"), resolve(cwd, "backend/.env"), resolve(cwd, "../.env")];

  for (const filePath of candidates) {
    loadIfExists(filePath);
  }
};
