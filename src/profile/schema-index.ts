import { FieldSchema, SchemaSection } from "../types/profile";
import { FieldNameOf } from "../types/report";
import { SchemaError, UnknownFieldError } from "./errors";

/** Read-only field lookups; entries are frozen copies of what it was built from. */
export class SchemaIndex implements Iterable<FieldSchema> {
  private readonly byId = new Map<string, FieldSchema>();
  private readonly byName = new Map<string, FieldSchema[]>();

  constructor(fields: Iterable<FieldSchema>) {
    for (const field of fields) {
      const options = Object.freeze(field.options.map((o) => Object.freeze({ ...o })));
      const frozen = Object.freeze({ ...field, options });
      this.byId.set(frozen.fieldId, frozen);
      this.byName.set(frozen.name, [...(this.byName.get(frozen.name) ?? []), frozen]);
    }
  }

  get size(): number {
    return this.byId.size;
  }

  lookup(fieldId: string): FieldSchema {
    const schema = this.byId.get(fieldId);
    if (!schema) throw new UnknownFieldError(fieldId);
    return schema;
  }

  /**
   * Find a field by its qualified `Section:Name`, or by its bare name when
   * only one section declares it.
   */
  lookupByName(name: string): FieldSchema {
    for (const schema of this.byId.values()) {
      if (schema.qualifiedName === name) return schema;
    }
    const matches = this.byName.get(name) ?? [];
    if (matches.length > 1) {
      throw new SchemaError(
        `Field name ${name} is ambiguous (${matches.map((m) => m.qualifiedName).join(", ")})`
      );
    }
    const [schema] = matches;
    if (!schema) throw new UnknownFieldError(name);
    return schema;
  }

  fieldNames(): Map<string, string> {
    const names = new Map<string, string>();
    for (const schema of this) names.set(schema.fieldId, schema.qualifiedName);
    return names;
  }

  [Symbol.iterator](): Iterator<FieldSchema> {
    return this.byId.values();
  }
}

export function buildSchemaIndex(sections: readonly SchemaSection[]): SchemaIndex {
  const fields = new Map<string, FieldSchema>();

  for (const section of sections) {
    for (const spec of section.fields) {
      const existing = fields.get(spec.id);
      if (existing) {
        throw new SchemaError(
          `Field id ${spec.id} declared twice (${existing.qualifiedName}, ${section.name}:${spec.name})`
        );
      }
      fields.set(spec.id, {
        fieldId: spec.id,
        name: spec.name,
        sectionName: section.name,
        qualifiedName: `${section.name}:${spec.name}`,
        fieldType: spec.type,
        options: spec.options ?? [],
      });
    }
  }

  return new SchemaIndex(fields.values());
}

/** Field-name resolver over several schema snapshots; later indexes win. */
export function mergeFieldNames(...indexes: SchemaIndex[]): FieldNameOf {
  const names = new Map<string, string>();
  for (const index of indexes) {
    for (const [id, name] of index.fieldNames()) names.set(id, name);
  }
  return (fieldId) => names.get(fieldId);
}
