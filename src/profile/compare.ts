import { NormalizedProfile, RawProfile } from "../types/profile";
import { PersonDiffReport } from "../types/report";
import { diffPeople } from "./diff-reporter";
import { extractAll } from "./profile-extractor";
import { SchemaIndex, mergeFieldNames } from "./schema-index";
import { joinMaps } from "./snapshot-joiner";

export interface ProfileSnapshot {
  index: SchemaIndex;
  people: RawProfile[];
}

export interface ExtractedSnapshot {
  index: SchemaIndex;
  people: Map<string, NormalizedProfile>;
}

/** Throws DuplicatePersonError when a person id repeats. */
export function extractSnapshot(snapshot: ProfileSnapshot): ExtractedSnapshot {
  return { index: snapshot.index, people: extractAll(snapshot.index, snapshot.people) };
}

/** Field names from the current schema win over the previous one. */
export function diffSnapshots(
  previous: ExtractedSnapshot,
  current: ExtractedSnapshot
): PersonDiffReport[] {
  const fieldNameOf = mergeFieldNames(previous.index, current.index);
  return diffPeople(joinMaps(previous.people, current.people), fieldNameOf);
}

/**
 * Report the profile changes between two snapshots, each read with its own
 * schema.
 */
export function compareSnapshots(
  previous: ProfileSnapshot,
  current: ProfileSnapshot
): PersonDiffReport[] {
  return diffSnapshots(extractSnapshot(previous), extractSnapshot(current));
}
