/**
 * Local digest archive
 * Stores digests under <dataDir>/digests/<date>.md when email is unavailable
 */

import fs from "fs";
import path from "path";
import { logger } from "../logger";

export function digestPath(dataDir: string, date: string): string {
  return path.join(dataDir, "digests", `${date}.md`);
}

export function saveDigestLocally(dataDir: string, date: string, markdown: string): string {
  const filePath = digestPath(dataDir, date);

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, markdown, "utf-8");
  } catch (error) {
    logger.error("Failed to save digest", {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  logger.info("Digest saved locally", { path: filePath, bytes: Buffer.byteLength(markdown) });
  return filePath;
}
