import { logger } from "../logger";
import {
  FieldValue,
  NAME_KEY,
  NormalizedProfile,
  RawProfile,
} from "../types/profile";
import {
  DuplicatePersonError,
  UnknownFieldError,
  UnsupportedFieldTypeError,
} from "./errors";
import { SchemaIndex } from "./schema-index";
import { formatName, normalizeValue } from "./value-normalizer";

function hasValue(value: FieldValue | undefined): value is FieldValue {
  if (value === undefined) return false;
  return value.length > 0;
}

/**
 * Normalize every field of one raw profile. Fields the schema does not know
 * and values the field type cannot read are skipped; the rest of the profile
 * is still extracted.
 */
export function extractProfile(index: SchemaIndex, raw: RawProfile): NormalizedProfile {
  const result = new Map<string, FieldValue>();

  const fullName = formatName(raw.name);
  if (fullName) result.set(NAME_KEY, fullName);

  for (const [fieldId, rawValue] of raw.fields) {
    if (fieldId === NAME_KEY) continue;
    try {
      const value = normalizeValue(index.lookup(fieldId), rawValue);
      if (hasValue(value)) result.set(fieldId, value);
    } catch (err) {
      if (err instanceof UnknownFieldError || err instanceof UnsupportedFieldTypeError) {
        logger.debug(
          { tag: "Extract", personId: raw.id, fieldId, error: err.message },
          "Skipping field"
        );
        continue;
      }
      throw err;
    }
  }

  return result;
}

export function extractAll(
  index: SchemaIndex,
  raws: Iterable<RawProfile>,
  personIdOf: (raw: RawProfile) => string = (raw) => raw.id
): Map<string, NormalizedProfile> {
  const people = new Map<string, NormalizedProfile>();
  for (const raw of raws) {
    const personId = personIdOf(raw);
    if (people.has(personId)) throw new DuplicatePersonError(personId);
    people.set(personId, extractProfile(index, raw));
  }
  return people;
}

/** Normalized value of one field, found by its `Section:Name` or bare name. */
export function extractField(
  index: SchemaIndex,
  raw: RawProfile,
  fieldName: string
): FieldValue | undefined {
  const schema = index.lookupByName(fieldName);
  if (schema.fieldId === NAME_KEY) return formatName(raw.name);
  const rawValue = raw.fields.get(schema.fieldId);
  if (!rawValue) return undefined;
  const value = normalizeValue(schema, rawValue);
  return hasValue(value) ? value : undefined;
}
