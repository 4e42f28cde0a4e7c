import { contactDisplayName } from "../types/deal";
import { createLogger } from "../utils/log";
import {
  BillingClient,
  HoldedContactPayload,
  HoldedContactPerson,
  holdedContactUrl,
} from "../services/holdedClient";
import { CrmClient } from "../services/hubspotClient";
import { BaseStep, StepContext, StepResult, stepCompleted, stepFailed } from "./baseStep";

const log = createLogger("step.create_holded_contact");

const DEFAULT_COUNTRY_CODE = "ES";

const COUNTRY_CODES: Record<string, string> = {
  spain: "ES",
  españa: "ES",
  portugal: "PT",
  france: "FR",
  francia: "FR",
  germany: "DE",
  alemania: "DE",
  italy: "IT",
  italia: "IT",
  "united kingdom": "GB",
  uk: "GB",
  "united states": "US",
  usa: "US",
};

export function countryCode(country: string | null): string {
  if (!country) {
    return DEFAULT_COUNTRY_CODE;
  }
  return COUNTRY_CODES[country.trim().toLowerCase()] ?? DEFAULT_COUNTRY_CODE;
}

export function buildHoldedContactPayload(ctx: StepContext): HoldedContactPayload {
  const { company, contact_person: contact } = ctx;

  const person: HoldedContactPerson = {
    name: contactDisplayName(contact),
    email: contact.email ?? "",
    phone: contact.phone ?? contact.mobile ?? "",
  };
  if (contact.job_title) {
    person.job = contact.job_title;
  }

  const payload: HoldedContactPayload = {
    name: company.name,
    type: "client",
    code: company.nif ?? "",
    email: company.email ?? contact.email ?? "",
    phone: company.phone ?? "",
    billAddress: {
      address: company.address ?? "",
      city: company.city ?? "",
      postalCode: company.zip_code ?? "",
      province: company.state ?? "",
      country: company.country ?? "",
      countryCode: countryCode(company.country),
    },
    contactPersons: [person],
  };

  if (company.website) {
    payload.socialNetworks = { website: company.website };
  }

  return payload;
}

export class CreateHoldedContactStep extends BaseStep {
  readonly name = "create_holded_contact" as const;

  constructor(
    private readonly holded: BillingClient,
    private readonly crm: Pick<CrmClient, "updateCompany">,
  ) {
    super();
  }

  async checkAlreadyDone(ctx: StepContext): Promise<boolean> {
    const holdedId = ctx.company.holded_id;
    if (!holdedId) {
      return false;
    }

    ctx.holded_contact_id = holdedId;
    ctx.holded_contact_url = holdedContactUrl(holdedId);
    return true;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    if (!ctx.company.name.trim()) {
      return stepFailed("Company has no name to bill under.");
    }

    const contactId = await this.holded.createContact(buildHoldedContactPayload(ctx));
    const contactUrl = holdedContactUrl(contactId);

    ctx.holded_contact_id = contactId;
    ctx.holded_contact_url = contactUrl;

    await this.crm.updateCompany(ctx.company.company_id, { tl_holded_id: contactId });

    log.info("holded_contact_created", {
      deal_id: ctx.deal_id,
      holded_id: contactId,
      company_id: ctx.company.company_id,
    });

    return stepCompleted({
      holded_contact_id: contactId,
      holded_contact_url: contactUrl,
    });
  }
}
