import { FieldValue, NAME_KEY, NormalizedProfile } from "../types/profile";
import { FieldDiff, FieldNameOf, PersonDiffReport } from "../types/report";
import { JoinedMap, joinMaps } from "./snapshot-joiner";

const EMPTY_PROFILE: NormalizedProfile = new Map();

function toList(value: FieldValue | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : value === "" ? [] : [value];
}

/** Order-preserving `a − b`, duplicates collapsed. */
function difference(a: string[], b: string[]): string[] {
  const exclude = new Set(b);
  const out: string[] = [];
  for (const value of a) {
    if (!exclude.has(value)) {
      out.push(value);
      exclude.add(value);
    }
  }
  return out;
}

export function diffFieldValues(
  joined: JoinedMap<string, FieldValue>,
  fieldNameOf: FieldNameOf
): FieldDiff[] {
  const diffs: FieldDiff[] = [];
  for (const [fieldId, [previous, current]] of joined) {
    const before = toList(previous);
    const after = toList(current);
    const removed = difference(before, after);
    const added = difference(after, before);
    if (removed.length === 0 && added.length === 0) continue;
    diffs.push({ fieldName: fieldNameOf(fieldId) ?? fieldId, removed, added });
  }
  return diffs;
}

function displayName(
  personId: string,
  previous: NormalizedProfile | undefined,
  current: NormalizedProfile | undefined
): string {
  const name = current?.get(NAME_KEY) ?? previous?.get(NAME_KEY);
  if (typeof name === "string" && name) return name;
  return personId;
}

/**
 * One report per person whose profile changed between the left (previous)
 * and right (current) snapshot. A person on one side only is compared
 * against an empty profile.
 */
export function diffPeople(
  joined: JoinedMap<string, NormalizedProfile>,
  fieldNameOf: FieldNameOf
): PersonDiffReport[] {
  const reports: PersonDiffReport[] = [];
  for (const [personId, [previous, current]] of joined) {
    if (previous === current) continue;
    const fields = joinMaps(previous ?? EMPTY_PROFILE, current ?? EMPTY_PROFILE);
    const diffs = diffFieldValues(fields, fieldNameOf);
    if (diffs.length === 0) continue;
    reports.push({ personName: displayName(personId, previous, current), diffs });
  }
  return reports;
}
