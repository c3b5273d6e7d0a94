import { logger } from "../logger";
import { PayloadValidationError } from "../api/errors";
import { ChmsClient } from "../api/chms-client";
import {
  parsePeople,
  parseProfileFields,
  toRawProfile,
  toSchemaSections,
} from "../api/wire";
import {
  ExtractedSnapshot,
  ProfileSnapshot,
  diffSnapshots,
  extractSnapshot,
} from "../profile/compare";
import { DuplicatePersonError, SchemaError } from "../profile/errors";
import { buildSchemaIndex } from "../profile/schema-index";
import {
  ChmsSnapshot,
  createSnapshot,
  loadSnapshot,
  saveSnapshot,
} from "../persistence/snapshot-manager";
import { PersonDiffReport, ReconcileResult } from "../types/report";

export type ProfileSource = Pick<ChmsClient, "getProfileFields" | "listPeople">;

export interface ReconcileOptions {
  snapshotPath: string;
  peopleLimit?: number;
}

export function toProfileSnapshot(snapshot: ChmsSnapshot): ProfileSnapshot {
  const sections = toSchemaSections(parseProfileFields(snapshot.profileFields));
  return {
    index: buildSchemaIndex(sections),
    people: parsePeople(snapshot.people).map(toRawProfile),
  };
}

function isUnusableSnapshotError(
  err: unknown
): err is PayloadValidationError | SchemaError | DuplicatePersonError {
  return (
    err instanceof PayloadValidationError ||
    err instanceof SchemaError ||
    err instanceof DuplicatePersonError
  );
}

export class ReconcileService {
  private running = false;

  constructor(
    private source: ProfileSource,
    private options: ReconcileOptions
  ) {}

  async run(): Promise<ReconcileResult> {
    return this.withMutex(() => this.doRun());
  }

  private async doRun(): Promise<ReconcileResult> {
    const start = Date.now();
    const [profileFields, people] = await Promise.all([
      this.source.getProfileFields(),
      this.source.listPeople({ details: true, limit: this.options.peopleLimit }),
    ]);
    const current = createSnapshot(profileFields, people);
    // A snapshot is only persisted once it indexes and extracts cleanly.
    const after = extractSnapshot(toProfileSnapshot(current));

    const previous = loadSnapshot(this.options.snapshotPath);
    const reports = previous ? this.compare(previous, after) : null;
    saveSnapshot(this.options.snapshotPath, current);

    const result: ReconcileResult = {
      takenAt: current.takenAt,
      previousTakenAt: reports ? previous?.takenAt ?? null : null,
      baseline: reports === null,
      people: people.length,
      reports: reports ?? [],
    };

    logger.info(
      {
        tag: "Reconcile",
        people: result.people,
        fields: after.index.size,
        changedPeople: result.reports.length,
        baseline: result.baseline,
        durationMs: Date.now() - start,
      },
      result.baseline
        ? `Baseline snapshot of ${result.people} people saved`
        : `${result.reports.length} of ${result.people} people changed since ${result.previousTakenAt}`
    );

    return result;
  }

  private compare(previous: ChmsSnapshot, after: ExtractedSnapshot): PersonDiffReport[] | null {
    let before: ExtractedSnapshot;
    try {
      before = extractSnapshot(toProfileSnapshot(previous));
    } catch (err) {
      if (!isUnusableSnapshotError(err)) throw err;
      logger.warn(
        { tag: "Reconcile", error: err.message },
        "Previous snapshot no longer validates, starting a new baseline"
      );
      return null;
    }
    return diffSnapshots(before, after);
  }

  private async withMutex<T>(fn: () => Promise<T>): Promise<T> {
    if (this.running) {
      throw new ReconcileInProgressError();
    }
    this.running = true;
    try {
      return await fn();
    } finally {
      this.running = false;
    }
  }
}

export class ReconcileInProgressError extends Error {
  constructor() {
    super("A reconciliation run is already in progress");
    this.name = "ReconcileInProgressError";
  }
}
