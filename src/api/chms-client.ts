import { ApiClient, QueryParams } from "./http-client";
import { BadParameterError } from "./errors";
import { WirePerson, WireSection, parsePeople, parsePerson, parseProfileFields } from "./wire";

export const ENDPOINTS = {
  people: "people",
  profileFields: "profile",
  account: "account",
} as const;

const LIST_PEOPLE_PARAMS = new Set(["limit", "offset", "details", "filter_json"]);

export interface ListPeopleOptions {
  limit?: number;
  offset?: number;
  details?: boolean;
  filter_json?: Record<string, unknown>;
}

function checkParams(params: object, allowed: Set<string>): void {
  const bad = Object.keys(params).filter((key) => !allowed.has(key));
  if (bad.length > 0) throw new BadParameterError(bad);
}

/** Read-only calls against the Breeze REST API. */
export class ChmsClient {
  constructor(private readonly client: ApiClient) {}

  async getAccountSummary(): Promise<unknown> {
    return this.client.get(`${ENDPOINTS.account}/summary`);
  }

  /** Profile sections, each with its field specifications. */
  async getProfileFields(): Promise<WireSection[]> {
    return parseProfileFields(await this.client.get(ENDPOINTS.profileFields));
  }

  async listPeople(options: ListPeopleOptions = {}): Promise<WirePerson[]> {
    checkParams(options, LIST_PEOPLE_PARAMS);
    const params: QueryParams = { ...options };
    return parsePeople(await this.client.get(ENDPOINTS.people, params));
  }

  async getPersonDetails(personId: string): Promise<WirePerson> {
    return parsePerson(
      await this.client.get(`${ENDPOINTS.people}/${encodeURIComponent(personId)}`)
    );
  }
}
