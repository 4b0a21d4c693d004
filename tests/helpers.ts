import os from "node:os";
import path from "node:path";
import { mkdtemp } from "node:fs/promises";
import { initLogger } from "../src/logger.js";

export interface CapturedLogs {
  info: string[];
  warn: string[];
  error: string[];
}

/** Route the logger into arrays for the rest of the test file. */
export function captureLogs(): CapturedLogs {
  const logs: CapturedLogs = { info: [], warn: [], error: [] };
  initLogger(
    {
      info(msg: string) {
        logs.info.push(msg);
      },
      warn(msg: string) {
        logs.warn.push(msg);
      },
      error(msg: string) {
        logs.error.push(msg);
      },
    },
    false,
  );
  return logs;
}

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `campaign-ledger-${label}-`));
}
