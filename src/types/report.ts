export interface FieldDiff {
  fieldName: string;
  /** Values only in the previous snapshot */
  removed: string[];
  /** Values only in the current snapshot */
  added: string[];
}

export interface PersonDiffReport {
  personName: string;
  diffs: FieldDiff[];
}

export interface ReconcileResult {
  takenAt: string;
  previousTakenAt: string | null;
  /** True when no previous snapshot existed and nothing was compared. */
  baseline: boolean;
  people: number;
  reports: PersonDiffReport[];
}

export type FieldNameOf = (fieldId: string) => string | undefined;
