import { z } from "zod";
import { logger } from "../logger";
import {
  FAMILY_KEY,
  FamilyMember,
  NAME_KEY,
  NameParts,
  RawFieldValue,
  RawProfile,
  SchemaSection,
} from "../types/profile";
import { PayloadValidationError } from "./errors";

// --- Payload schemas (the service sends ids as strings, sometimes numbers) ---

const idLike = z.union([z.string(), z.number()]).transform(String);
const text = z.string().nullish();
const flag = z.union([z.string(), z.number(), z.boolean()]).nullish();

const wireOptionSchema = z.object({
  option_id: idLike,
  name: z.string(),
});

const wireFieldSchema = z.object({
  field_id: idLike,
  name: z.string(),
  field_type: z.string(),
  options: z.array(wireOptionSchema).nullish(),
});

const wireSectionSchema = z.object({
  name: z.string(),
  fields: z.array(wireFieldSchema).nullish(),
});

const wireNameSchema = z.object({
  first_name: text,
  last_name: text,
  middle_name: text,
  nick_name: text,
});

const wireFamilyMemberSchema = z.object({
  role_name: text,
  details: wireNameSchema.nullish(),
});

const wirePersonSchema = wireNameSchema.extend({
  id: idLike,
  details: z.record(z.unknown()).nullish(),
  family: z.array(wireFamilyMemberSchema).nullish(),
});

export const profileFieldsSchema = z.array(wireSectionSchema);
export const peopleSchema = z.array(wirePersonSchema);
export const personSchema = wirePersonSchema;

export type WireSection = z.output<typeof wireSectionSchema>;
export type WirePerson = z.output<typeof wirePersonSchema>;

// --- Detail value shapes ---

const phoneEntriesSchema = z.array(
  z.object({
    phone_number: z.string().nullable(),
    phone_type: text,
    is_private: flag,
    do_not_text: flag,
  })
);

const emailEntriesSchema = z.array(
  z.object({
    address: z.string().nullable(),
    field_type: text,
    is_private: flag,
  })
);

const addressEntriesSchema = z.array(
  z.object({
    street_address: z.string().nullable(),
    street_address_2: text,
    city: text,
    state: text,
    zip: text,
  })
);

const selectionsSchema = z.array(
  z.object({
    value: z.union([z.string(), z.number()]).nullable(),
    name: z.string().nullable(),
  })
);

export const BUILTIN_SECTION: SchemaSection = {
  name: "Person",
  fields: [
    { id: NAME_KEY, name: "Name", type: "name" },
    { id: FAMILY_KEY, name: "Family", type: "family" },
  ],
};

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  what: string
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) throw new PayloadValidationError(what, result.error.issues);
  return result.data;
}

export function parseProfileFields(payload: unknown): WireSection[] {
  return parseWith(profileFieldsSchema, payload, "profile fields");
}

export function parsePeople(payload: unknown): WirePerson[] {
  return parseWith(peopleSchema, payload, "people");
}

export function parsePerson(payload: unknown): WirePerson {
  return parseWith(personSchema, payload, "person");
}

function isSet(value: string | number | boolean | null | undefined): boolean {
  return value === true || value === 1 || value === "1";
}

function toNameParts(wire: z.output<typeof wireNameSchema>): NameParts {
  return {
    first: wire.first_name,
    middle: wire.middle_name,
    nick: wire.nick_name,
    last: wire.last_name,
  };
}

export function toSchemaSections(sections: WireSection[]): SchemaSection[] {
  const converted = sections.map((section) => ({
    name: section.name,
    fields: (section.fields ?? []).map((field) => ({
      id: field.field_id,
      name: field.name,
      type: field.field_type,
      options: (field.options ?? []).map((o) => ({ id: o.option_id, name: o.name })),
    })),
  }));
  return [...converted, BUILTIN_SECTION];
}

/** Detail values arrive untagged; their shape decides the variant. */
export function toRawValue(value: unknown): RawFieldValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return { kind: "scalar", value };
  }

  const entries = Array.isArray(value) ? value : [value];

  const phones = phoneEntriesSchema.safeParse(entries);
  if (phones.success && phones.data.length > 0) {
    return {
      kind: "phones",
      entries: phones.data.map((e) => ({
        number: e.phone_number ?? "",
        type: e.phone_type,
        private: isSet(e.is_private),
        noText: isSet(e.do_not_text),
      })),
    };
  }

  const emails = emailEntriesSchema.safeParse(entries);
  if (emails.success && emails.data.length > 0) {
    return {
      kind: "emails",
      entries: emails.data.map((e) => ({
        address: e.address ?? "",
        type: e.field_type?.replace(/^email_/, ""),
        private: isSet(e.is_private),
      })),
    };
  }

  const addresses = addressEntriesSchema.safeParse(entries);
  if (addresses.success && addresses.data.length > 0) {
    return {
      kind: "addresses",
      entries: addresses.data.map((e) => ({
        street: e.street_address,
        street2: e.street_address_2,
        city: e.city,
        state: e.state,
        zip: e.zip,
      })),
    };
  }

  const selections = selectionsSchema.safeParse(entries);
  if (selections.success) {
    return {
      kind: "options",
      selected: selections.data.map((s) => ({
        id: s.value === null ? null : String(s.value),
        name: s.name,
      })),
    };
  }

  return undefined;
}

export function toRawProfile(person: WirePerson): RawProfile {
  const fields = new Map<string, RawFieldValue>();

  for (const [fieldId, value] of Object.entries(person.details ?? {})) {
    const raw = toRawValue(value);
    if (raw) {
      fields.set(fieldId, raw);
    } else {
      logger.debug(
        { tag: "Ingress", personId: person.id, fieldId },
        "Unrecognized detail value shape, dropped"
      );
    }
  }

  const members: FamilyMember[] = (person.family ?? []).map((member) => ({
    name: member.details ? toNameParts(member.details) : {},
    role: member.role_name,
  }));
  if (members.length > 0) {
    fields.set(FAMILY_KEY, { kind: "family", members });
  }

  return { id: person.id, name: toNameParts(person), fields };
}
