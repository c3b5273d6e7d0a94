export const KNOWN_FIELD_TYPES = [
  "text",
  "single_line",
  "notes",
  "date",
  "birthdate",
  "grade",
  "number",
  "email",
  "phone",
  "address",
  "checkbox",
  "dropdown",
  "multiple_choice",
  "radio",
  "name",
  "family",
] as const;

export type KnownFieldType = (typeof KNOWN_FIELD_TYPES)[number];

export function isKnownFieldType(type: string): type is KnownFieldType {
  return (KNOWN_FIELD_TYPES as readonly string[]).includes(type);
}

export interface FieldOption {
  id: string;
  name: string;
}

export interface FieldSpec {
  id: string;
  name: string;
  type: string;
  options?: FieldOption[];
}

export interface SchemaSection {
  name: string;
  fields: FieldSpec[];
}

export interface FieldSchema {
  readonly fieldId: string;
  readonly name: string;
  readonly sectionName: string;
  /** `${sectionName}:${name}` */
  readonly qualifiedName: string;
  readonly fieldType: string;
  readonly options: readonly FieldOption[];
}

// --- Raw values (already validated at ingress) ---

export interface NameParts {
  first?: string | null;
  middle?: string | null;
  nick?: string | null;
  last?: string | null;
}

export interface OptionSelection {
  id?: string | null;
  name?: string | null;
}

export interface PhoneEntry {
  number: string;
  type?: string | null;
  private?: boolean;
  noText?: boolean;
}

export interface EmailEntry {
  address: string;
  type?: string | null;
  private?: boolean;
}

export interface AddressEntry {
  street?: string | null;
  street2?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
}

export interface FamilyMember {
  name: NameParts;
  role?: string | null;
}

export type RawFieldValue =
  | { kind: "scalar"; value: string | number | boolean | null }
  | { kind: "options"; selected: OptionSelection[] }
  | { kind: "phones"; entries: PhoneEntry[] }
  | { kind: "emails"; entries: EmailEntry[] }
  | { kind: "addresses"; entries: AddressEntry[] }
  | { kind: "name"; parts: NameParts }
  | { kind: "family"; members: FamilyMember[] };

export type RawValueKind = RawFieldValue["kind"];

export interface RawProfile {
  id: string;
  name: NameParts;
  fields: ReadonlyMap<string, RawFieldValue>;
}

// --- Normalized output ---

export type FieldValue = string | string[];

/** Field id → value. The reserved key `name` holds the person's full name. */
export type NormalizedProfile = ReadonlyMap<string, FieldValue>;

export const NAME_KEY = "name";
export const FAMILY_KEY = "family";
