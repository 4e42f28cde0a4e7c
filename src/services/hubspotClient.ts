import {
  buildUrl,
  createTimeoutFetch,
  FetchInit,
  FetchLike,
  FetchResponseLike,
  parseJsonResponse,
} from "../utils/http";
import { createLogger, describeError } from "../utils/log";

const log = createLogger("hubspot");

const HUBSPOT_API_BASE = "https://api.hubapi.com";
const MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_AFTER_SECONDS = 10;
const SEARCH_PAGE_SIZE = 100;

export const DEAL_PROPERTIES = [
  "dealname",
  "amount",
  "hubspot_owner_id",
  "pipeline",
  "dealstage",
  "closedate",
] as const;

export const COMPANY_PROPERTIES = [
  "name",
  "nif",
  "generic_email",
  "phone",
  "address",
  "city",
  "state",
  "zip",
  "country",
  "website",
  "domain",
  "tl_holded_id",
  "drive_folder_id",
  "drive_folder_url",
] as const;

/** Contact properties that carry an assigned technician id, in CRM order. */
export const TECHNICIAN_PROPERTIES = [
  "tecnico_enisa_asignado",
  "tecnico_subvencion_asignado",
  "cfo_asignado",
  "cfo_asignado_ii",
  "asesor_fiscal_asignado",
  "asesor_laboral_asignado",
  "administrativo_asignado",
] as const;

export const CONTACT_PROPERTIES = [
  "firstname",
  "lastname",
  "nombre_y_apellidos",
  "email",
  "phone",
  "mobilephone",
  "cargo_en_empresa",
  "nif",
  ...TECHNICIAN_PROPERTIES,
] as const;

export type HubSpotProperties = Record<string, string | null | undefined>;

export type HubSpotObject = {
  id: string;
  properties: HubSpotProperties;
};

type SearchResponse = {
  results?: HubSpotObject[];
  paging?: {
    next?: {
      after?: string;
    };
  };
};

type AssociationsResponse = {
  results?: Array<{ toObjectId: string | number }>;
};

/** The slice of the CRM the detector and steps depend on. */
export interface CrmClient {
  searchWonDeals(since: Date): AsyncIterable<HubSpotObject>;
  getDeal(dealId: string): Promise<HubSpotObject>;
  getCompany(companyId: string): Promise<HubSpotObject>;
  getContact(contactId: string): Promise<HubSpotObject>;
  getDealCompanyId(dealId: string): Promise<string | null>;
  getCompanyContactIds(companyId: string): Promise<string[]>;
  updateCompany(companyId: string, properties: Record<string, string>): Promise<void>;
}

export class HubSpotError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
  ) {
    super(message);
    this.name = "HubSpotError";
  }
}

export type HubSpotClientOptions = {
  token: string;
  pipelineId: string;
  wonStageId: string;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class HubSpotClient implements CrmClient {
  private readonly fetchImpl: FetchLike;

  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: HubSpotClientOptions) {
    this.fetchImpl = options.fetchImpl ?? createTimeoutFetch();
    this.sleep = options.sleep ?? defaultSleep;
  }

  async *searchWonDeals(since: Date): AsyncGenerator<HubSpotObject> {
    let after: string | undefined;

    do {
      const body: Record<string, unknown> = {
        filterGroups: [
          {
            filters: [
              { propertyName: "pipeline", operator: "EQ", value: this.options.pipelineId },
              { propertyName: "dealstage", operator: "EQ", value: this.options.wonStageId },
              { propertyName: "closedate", operator: "GTE", value: String(since.getTime()) },
            ],
          },
        ],
        properties: [...DEAL_PROPERTIES],
        limit: SEARCH_PAGE_SIZE,
      };
      if (after) {
        body.after = after;
      }

      const page = await this.request<SearchResponse>("POST", "/crm/v3/objects/deals/search", {
        body,
      });

      for (const result of page.results ?? []) {
        yield result;
      }

      after = page.paging?.next?.after || undefined;
    } while (after);
  }

  async getDeal(dealId: string): Promise<HubSpotObject> {
    return this.request<HubSpotObject>("GET", `/crm/v3/objects/deals/${dealId}`, {
      params: { properties: DEAL_PROPERTIES.join(",") },
    });
  }

  async getCompany(companyId: string): Promise<HubSpotObject> {
    return this.request<HubSpotObject>("GET", `/crm/v3/objects/companies/${companyId}`, {
      params: { properties: COMPANY_PROPERTIES.join(",") },
    });
  }

  async getContact(contactId: string): Promise<HubSpotObject> {
    return this.request<HubSpotObject>("GET", `/crm/v3/objects/contacts/${contactId}`, {
      params: { properties: CONTACT_PROPERTIES.join(",") },
    });
  }

  async getDealCompanyId(dealId: string): Promise<string | null> {
    const data = await this.request<AssociationsResponse>(
      "GET",
      `/crm/v3/objects/deals/${dealId}/associations/companies`,
    );
    const first = data.results?.[0];
    return first ? String(first.toObjectId) : null;
  }

  async getCompanyContactIds(companyId: string): Promise<string[]> {
    const data = await this.request<AssociationsResponse>(
      "GET",
      `/crm/v3/objects/companies/${companyId}/associations/contacts`,
    );
    return (data.results ?? []).map((result) => String(result.toObjectId));
  }

  async updateCompany(
    companyId: string,
    properties: Record<string, string>,
  ): Promise<void> {
    await this.request<HubSpotObject>("PATCH", `/crm/v3/objects/companies/${companyId}`, {
      body: { properties },
    });
  }

  /**
   * Retries network errors and 5xx with 1s/2s/4s backoff, waits out 429s,
   * and gives up after MAX_ATTEMPTS.
   */
  private async request<T>(
    method: string,
    pathname: string,
    options: { params?: Record<string, string>; body?: unknown } = {},
  ): Promise<T> {
    const url = buildUrl(HUBSPOT_API_BASE, pathname, options.params);
    const init: FetchInit = {
      method,
      headers: {
        Authorization: `Bearer ${this.options.token}`,
        "Content-Type": "application/json",
      },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    };

    let lastStatus: number | null = null;

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      let response: FetchResponseLike;
      try {
        response = await this.fetchImpl(url, init);
      } catch (error) {
        log.warn("hubspot_request_error", {
          method,
          path: pathname,
          attempt: attempt + 1,
          error: describeError(error),
        });
        await this.sleep(2 ** attempt * 1000);
        continue;
      }

      if (response.status === 429) {
        lastStatus = 429;
        const retryAfter =
          Number(response.headers.get("retry-after")) || DEFAULT_RETRY_AFTER_SECONDS;
        log.warn("hubspot_rate_limited", { method, path: pathname, retry_after: retryAfter });
        await this.sleep(retryAfter * 1000);
        continue;
      }

      if (response.status >= 500) {
        lastStatus = response.status;
        log.warn("hubspot_server_error", {
          method,
          path: pathname,
          status: response.status,
          attempt: attempt + 1,
        });
        await this.sleep(2 ** attempt * 1000);
        continue;
      }

      if (!response.ok) {
        throw new HubSpotError(
          `HubSpot ${response.status}: ${await response.text()}`,
          response.status,
        );
      }

      return parseJsonResponse<T>(response);
    }

    throw new HubSpotError(
      `HubSpot ${method} ${pathname} failed after ${MAX_ATTEMPTS} attempts.`,
      lastStatus,
    );
  }
}
