import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import type { SyncState } from "../types";
import { parseSyncState, type StateStore } from "./stateStore";

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readStateFile(statePath: string): Promise<SyncState> {
  let raw: string;

  try {
    raw = await readFile(statePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return { bookmarks: {} };
    }

    throw error;
  }

  if (raw.trim().length === 0) {
    return { bookmarks: {} };
  }

  return parseSyncState(JSON.parse(raw));
}

export async function writeStateFile(statePath: string, state: SyncState): Promise<void> {
  await mkdir(path.dirname(statePath), { recursive: true });

  const tempPath = `${statePath}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, "utf8");
  await rename(tempPath, statePath);
}

export function createFileStateStore(statePath: string): StateStore {
  return {
    load(): Promise<SyncState> {
      return readStateFile(statePath);
    },
    async commit(state: SyncState): Promise<void> {
      await writeStateFile(statePath, state);
    }
  };
}
