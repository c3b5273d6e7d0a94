import { describe, it, expect, vi } from "vitest";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { compareSnapshots } from "./compare";
import { buildSchemaIndex } from "./schema-index";
import { RawFieldValue, RawProfile } from "../types/profile";

const previousIndex = buildSchemaIndex([
  {
    name: "Communication",
    fields: [{ id: "11", name: "Phone", type: "phone" }],
  },
  {
    name: "Gifts",
    fields: [
      {
        id: "12",
        name: "Gifts",
        type: "checkbox",
        options: [
          { id: "1", name: "Teaching" },
          { id: "2", name: "Service" },
        ],
      },
    ],
  },
  { name: "Person", fields: [{ id: "name", name: "Name", type: "name" }] },
]);

const currentIndex = buildSchemaIndex([
  {
    name: "Contact",
    fields: [{ id: "11", name: "Phone", type: "phone" }],
  },
  {
    name: "Gifts",
    fields: [
      {
        id: "12",
        name: "Gifts",
        type: "checkbox",
        options: [
          { id: "1", name: "Teaching" },
          { id: "2", name: "Service" },
          { id: "3", name: "Mercy" },
        ],
      },
    ],
  },
  { name: "Person", fields: [{ id: "name", name: "Name", type: "name" }] },
]);

function person(
  id: string,
  name: RawProfile["name"],
  fields: [string, RawFieldValue][]
): RawProfile {
  return { id, name, fields: new Map(fields) };
}

describe("compareSnapshots", () => {
  it("reports changed, new and dropped people", () => {
    const reports = compareSnapshots(
      {
        index: previousIndex,
        people: [
          person("1", { first: "Ann", last: "Alpha" }, [
            ["12", { kind: "options", selected: [{ id: "1" }] }],
          ]),
          person("2", { first: "Ben", last: "Beta" }, [
            ["11", { kind: "phones", entries: [{ number: "555-0100", private: true, noText: true }] }],
          ]),
          person("3", { first: "Cal", last: "Gamma" }, []),
        ],
      },
      {
        index: currentIndex,
        people: [
          person("2", { first: "Ben", last: "Beta" }, [
            ["11", { kind: "phones", entries: [{ number: "555-0100", private: true }] }],
          ]),
          person("1", { first: "Ann", last: "Alpha" }, [
            ["12", { kind: "options", selected: [{ id: "3" }, { id: "1" }] }],
          ]),
          person("4", { first: "Dee", last: "Delta" }, []),
        ],
      }
    );

    expect(reports).toEqual([
      {
        personName: "Ben Beta",
        diffs: [
          {
            fieldName: "Contact:Phone",
            removed: ["555-0100(private)(no_text)"],
            added: ["555-0100(private)"],
          },
        ],
      },
      {
        personName: "Ann Alpha",
        diffs: [{ fieldName: "Gifts:Gifts", removed: [], added: ["Mercy"] }],
      },
      {
        personName: "Dee Delta",
        diffs: [{ fieldName: "Person:Name", removed: [], added: ["Dee Delta"] }],
      },
      {
        personName: "Cal Gamma",
        diffs: [{ fieldName: "Person:Name", removed: ["Cal Gamma"], added: [] }],
      },
    ]);
  });

  it("returns no reports for identical snapshots", () => {
    const people = [
      person("1", { first: "Ann", last: "Alpha" }, [
        ["12", { kind: "options", selected: [{ id: "2" }, { id: "1" }] }],
      ]),
    ];
    expect(
      compareSnapshots({ index: previousIndex, people }, { index: currentIndex, people })
    ).toEqual([]);
  });
});
