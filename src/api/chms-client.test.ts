import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../logger", () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { ChmsClient, ListPeopleOptions } from "./chms-client";
import { ApiClient } from "./http-client";
import { BadParameterError, PayloadValidationError } from "./errors";

function createMockApi() {
  return { get: vi.fn() };
}

describe("ChmsClient", () => {
  let api: ReturnType<typeof createMockApi>;
  let chms: ChmsClient;

  beforeEach(() => {
    api = createMockApi();
    chms = new ChmsClient(api as unknown as ApiClient);
  });

  it("fetches and validates profile fields", async () => {
    api.get.mockResolvedValue([
      { name: "Main", fields: [{ field_id: "1", name: "Notes", field_type: "notes" }] },
    ]);

    const sections = await chms.getProfileFields();

    expect(api.get).toHaveBeenCalledWith("profile");
    expect(sections).toEqual([
      { name: "Main", fields: [{ field_id: "1", name: "Notes", field_type: "notes" }] },
    ]);
  });

  it("lists people with the given options", async () => {
    api.get.mockResolvedValue([{ id: "1", first_name: "Kate" }]);

    const people = await chms.listPeople({ details: true, limit: 50 });

    expect(api.get).toHaveBeenCalledWith("people", { details: true, limit: 50 });
    expect(people).toEqual([{ id: "1", first_name: "Kate" }]);
  });

  it("rejects unknown listPeople parameters", async () => {
    const options = { details: true, sort: "name" } as ListPeopleOptions;

    await expect(chms.listPeople(options)).rejects.toThrow(BadParameterError);
    expect(api.get).not.toHaveBeenCalled();
  });

  it("fetches one person's details", async () => {
    api.get.mockResolvedValue({ id: "42", last_name: "Lee" });

    const person = await chms.getPersonDetails("42");

    expect(api.get).toHaveBeenCalledWith("people/42");
    expect(person.id).toBe("42");
  });

  it("surfaces payloads that fail validation", async () => {
    api.get.mockResolvedValue({ errors: [] });

    await expect(chms.listPeople()).rejects.toThrow(PayloadValidationError);
  });

  it("returns the account summary as received", async () => {
    api.get.mockResolvedValue({ id: "1234", subdomain: "demo" });

    await expect(chms.getAccountSummary()).resolves.toEqual({ id: "1234", subdomain: "demo" });
    expect(api.get).toHaveBeenCalledWith("account/summary");
  });
});
