import { readFileSync, writeFileSync, mkdirSync, unlinkSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { logger } from "../logger";

export const SNAPSHOT_VERSION = 1;

/** Raw payloads of one reconciliation run, as received from the API. */
export interface ChmsSnapshot {
  version: number;
  takenAt: string;
  profileFields: unknown;
  people: unknown;
}

export function createSnapshot(
  profileFields: unknown,
  people: unknown,
  takenAt: Date = new Date()
): ChmsSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    takenAt: takenAt.toISOString(),
    profileFields,
    people,
  };
}

export function saveSnapshot(path: string, snapshot: ChmsSnapshot): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(snapshot));
  logger.info(
    { tag: "Snapshot", path, takenAt: snapshot.takenAt },
    "Profile snapshot saved"
  );
}

function isSnapshotFile(value: unknown): value is ChmsSnapshot {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    typeof value.version === "number" &&
    "takenAt" in value &&
    typeof value.takenAt === "string" &&
    "profileFields" in value &&
    "people" in value
  );
}

export function loadSnapshot(path: string): ChmsSnapshot | null {
  if (!existsSync(path)) {
    logger.info({ tag: "Snapshot", path }, "No snapshot file found");
    return null;
  }

  try {
    const file: unknown = JSON.parse(readFileSync(path, "utf-8"));

    if (!isSnapshotFile(file)) {
      logger.warn({ tag: "Snapshot", path }, "Snapshot file malformed, discarding");
      deleteSnapshot(path);
      return null;
    }

    if (file.version !== SNAPSHOT_VERSION) {
      logger.warn(
        { tag: "Snapshot", expected: SNAPSHOT_VERSION, got: file.version },
        "Snapshot version mismatch, discarding"
      );
      deleteSnapshot(path);
      return null;
    }

    logger.info(
      { tag: "Snapshot", path, takenAt: file.takenAt },
      "Snapshot loaded successfully"
    );
    return file;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    logger.warn(
      { tag: "Snapshot", error: msg },
      "Failed to load snapshot, discarding"
    );
    deleteSnapshot(path);
    return null;
  }
}

export function deleteSnapshot(path: string): void {
  try {
    if (existsSync(path)) {
      unlinkSync(path);
      logger.info({ tag: "Snapshot", path }, "Snapshot file deleted");
    }
  } catch (err) {
    logger.warn({ tag: "Snapshot", path, err }, "Failed to delete snapshot file");
  }
}
