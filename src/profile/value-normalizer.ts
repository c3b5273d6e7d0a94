import {
  AddressEntry,
  EmailEntry,
  FieldSchema,
  FieldValue,
  KnownFieldType,
  NameParts,
  OptionSelection,
  PhoneEntry,
  RawFieldValue,
  isKnownFieldType,
} from "../types/profile";
import { UnsupportedFieldTypeError } from "./errors";

type Normalizer = (schema: FieldSchema, raw: RawFieldValue) => FieldValue | undefined;

function trimOrUndefined(value: string | number | boolean | null | undefined): string | undefined {
  if (value == null) return undefined;
  const trimmed = String(value).trim();
  return trimmed || undefined;
}

/** One value stays a string, several become a list, none is absent. */
function delist(values: string[]): FieldValue | undefined {
  if (values.length === 0) return undefined;
  return values.length === 1 ? values[0] : values;
}

function unsupported(schema: FieldSchema, raw: RawFieldValue): never {
  throw new UnsupportedFieldTypeError(schema.fieldId, schema.fieldType, raw.kind);
}

function compact(values: (string | undefined)[]): string[] {
  return values.filter((v): v is string => v !== undefined);
}

export function formatName(parts: NameParts): string | undefined {
  const first = trimOrUndefined(parts.first);
  let nick = trimOrUndefined(parts.nick);
  if (nick === first) nick = undefined;

  const words = compact([
    first,
    trimOrUndefined(parts.middle),
    nick && `(${nick})`,
    trimOrUndefined(parts.last),
  ]);
  return words.length > 0 ? words.join(" ") : undefined;
}

export function formatPhone(entry: PhoneEntry): string | undefined {
  let phone = trimOrUndefined(entry.number);
  if (!phone) return undefined;
  if (entry.private) phone += "(private)";
  if (entry.noText) phone += "(no_text)";
  const type = trimOrUndefined(entry.type);
  return type && type !== "primary" ? `${type}:${phone}` : phone;
}

export function formatEmail(entry: EmailEntry): string | undefined {
  let email = trimOrUndefined(entry.address);
  if (!email) return undefined;
  if (entry.private) email += "(private)";
  const type = trimOrUndefined(entry.type);
  return type && type !== "primary" ? `${type}:${email}` : email;
}

export function formatAddress(entry: AddressEntry): string | undefined {
  const lines = [entry.street, entry.street2]
    .flatMap((street) => (street ? street.split("<br />") : []))
    .map((line) => trimOrUndefined(line));
  const cityStateZip = compact([
    trimOrUndefined(entry.city),
    trimOrUndefined(entry.state),
    trimOrUndefined(entry.zip),
  ]).join(" ");

  const parts = compact([...lines, trimOrUndefined(cityStateZip)]);
  return parts.length > 0 ? parts.join(";") : undefined;
}

function findOption(schema: FieldSchema, selection: OptionSelection) {
  const id = trimOrUndefined(selection.id);
  const name = trimOrUndefined(selection.name);
  return (
    (id !== undefined ? schema.options.find((o) => o.id === id) : undefined) ??
    (name !== undefined ? schema.options.find((o) => o.name === name) : undefined)
  );
}

function selectionsOf(raw: RawFieldValue): OptionSelection[] | undefined {
  if (raw.kind === "options") return raw.selected;
  if (raw.kind === "scalar") {
    const name = trimOrUndefined(raw.value);
    return name ? [{ name }] : [];
  }
  return undefined;
}

const scalar: Normalizer = (schema, raw) => {
  if (raw.kind !== "scalar") return unsupported(schema, raw);
  return trimOrUndefined(raw.value);
};

const phone: Normalizer = (schema, raw) => {
  if (raw.kind === "scalar") return trimOrUndefined(raw.value);
  if (raw.kind !== "phones") return unsupported(schema, raw);
  return delist(compact(raw.entries.map(formatPhone)));
};

const email: Normalizer = (schema, raw) => {
  if (raw.kind === "scalar") return trimOrUndefined(raw.value);
  if (raw.kind !== "emails") return unsupported(schema, raw);
  return delist(compact(raw.entries.map(formatEmail)));
};

const address: Normalizer = (schema, raw) => {
  if (raw.kind === "scalar") return trimOrUndefined(raw.value);
  if (raw.kind !== "addresses") return unsupported(schema, raw);
  return delist(compact(raw.entries.map(formatAddress)));
};

// Declared options come first, in schema order; selections that match no
// declared option follow in input order.
const checkbox: Normalizer = (schema, raw) => {
  const selected = selectionsOf(raw);
  if (!selected) return unsupported(schema, raw);

  const picked = new Set<string>();
  const undeclared: string[] = [];
  for (const selection of selected) {
    const option = findOption(schema, selection);
    if (option) {
      picked.add(option.id);
      continue;
    }
    const name = trimOrUndefined(selection.name);
    if (name && !undeclared.includes(name)) undeclared.push(name);
  }

  const names: string[] = [];
  for (const option of schema.options) {
    const name = trimOrUndefined(option.name);
    if (picked.has(option.id) && name && !names.includes(name)) names.push(name);
  }
  for (const name of undeclared) {
    if (!names.includes(name)) names.push(name);
  }
  return names.length > 0 ? names : undefined;
};

const singleSelect: Normalizer = (schema, raw) => {
  const selected = selectionsOf(raw);
  if (!selected) return unsupported(schema, raw);

  for (const selection of selected) {
    const name = trimOrUndefined(selection.name) ?? trimOrUndefined(findOption(schema, selection)?.name);
    if (name) return name;
  }
  return undefined;
};

const name: Normalizer = (schema, raw) => {
  if (raw.kind === "scalar") return trimOrUndefined(raw.value);
  if (raw.kind !== "name") return unsupported(schema, raw);
  return formatName(raw.parts);
};

const family: Normalizer = (schema, raw) => {
  if (raw.kind !== "family") return unsupported(schema, raw);
  const members = compact(
    raw.members.map((member) => {
      const role = trimOrUndefined(member.role);
      const words = compact([formatName(member.name), role && `(${role})`]);
      return words.length > 0 ? words.join(" ") : undefined;
    })
  );
  return members.length > 0 ? members : undefined;
};

const NORMALIZERS: Record<KnownFieldType, Normalizer> = {
  text: scalar,
  single_line: scalar,
  notes: scalar,
  date: scalar,
  birthdate: scalar,
  grade: scalar,
  number: scalar,
  email,
  phone,
  address,
  checkbox,
  dropdown: singleSelect,
  multiple_choice: singleSelect,
  radio: singleSelect,
  name,
  family,
};

/**
 * Canonical string form of one field value. Returns undefined when the value
 * is empty; throws UnsupportedFieldTypeError when the field type cannot
 * interpret the value's shape.
 */
export function normalizeValue(
  schema: FieldSchema,
  raw: RawFieldValue
): FieldValue | undefined {
  if (isKnownFieldType(schema.fieldType)) {
    return NORMALIZERS[schema.fieldType](schema, raw);
  }
  if (raw.kind === "scalar") return trimOrUndefined(raw.value);
  return unsupported(schema, raw);
}
