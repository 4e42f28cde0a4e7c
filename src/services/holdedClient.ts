import { createTimeoutFetch, FetchLike, parseJsonResponse } from "../utils/http";

const HOLDED_CONTACTS_URL = "https://api.holded.com/api/invoicing/v1/contacts";

export type HoldedAddress = {
  address: string;
  city: string;
  postalCode: string;
  province: string;
  country: string;
  countryCode: string;
};

export type HoldedContactPerson = {
  name: string;
  email: string;
  phone: string;
  job?: string;
};

export type HoldedContactPayload = {
  name: string;
  type: "client";
  code: string;
  email: string;
  phone: string;
  billAddress: HoldedAddress;
  socialNetworks?: { website: string };
  contactPersons?: HoldedContactPerson[];
};

export interface BillingClient {
  createContact(payload: HoldedContactPayload): Promise<string>;
}

export class HoldedError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "HoldedError";
  }
}

type CreateContactResponse = {
  status?: number;
  id?: string;
  info?: string;
};

export function holdedContactUrl(contactId: string): string {
  return `https://app.holded.com/contacts/${contactId}`;
}

export class HoldedClient implements BillingClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly apiKey: string,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? createTimeoutFetch();
  }

  async createContact(payload: HoldedContactPayload): Promise<string> {
    const response = await this.fetchImpl(HOLDED_CONTACTS_URL, {
      method: "POST",
      headers: {
        key: this.apiKey,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      throw new HoldedError(
        `Holded ${response.status}: ${await response.text()}`,
        response.status,
      );
    }

    const data = await parseJsonResponse<CreateContactResponse>(response);
    if (!data.id) {
      throw new HoldedError(`Holded returned no contact id: ${data.info ?? "no detail"}`);
    }
    return data.id;
  }
}
