// Shared response schemas

const ErrorResponse = {
  type: "object",
  properties: {
    error: { type: "string" },
  },
} as const;

const FieldDiffResponse = {
  type: "object",
  properties: {
    fieldName: { type: "string" },
    removed: { type: "array", items: { type: "string" } },
    added: { type: "array", items: { type: "string" } },
  },
} as const;

const ReconcileResultResponse = {
  type: "object",
  properties: {
    takenAt: { type: "string" },
    previousTakenAt: { type: ["string", "null"] },
    baseline: { type: "boolean" },
    people: { type: "number" },
    reports: {
      type: "array",
      items: {
        type: "object",
        properties: {
          personName: { type: "string" },
          diffs: { type: "array", items: FieldDiffResponse },
        },
      },
    },
  },
} as const;

export const healthSchema = {
  tags: ["System"],
  summary: "Health check",
  description: "Returns OK if the server is running",
  response: {
    200: {
      description: "Server is healthy",
      type: "object",
      properties: {
        status: { type: "string", enum: ["ok"] },
      },
    },
  },
};

export const profileChangesSchema = {
  tags: ["Reports"],
  summary: "Run a profile reconciliation",
  description:
    "Fetches the current profile fields and people, compares them with the previous snapshot, saves the new snapshot and returns the changed profiles.",
  security: [{ bearerAuth: [] }],
  response: {
    200: { description: "Reconciliation completed", ...ReconcileResultResponse },
    401: { description: "Unauthorized", ...ErrorResponse },
    409: { description: "A reconciliation is already in progress", ...ErrorResponse },
    500: { description: "Internal server error", ...ErrorResponse },
  },
};
