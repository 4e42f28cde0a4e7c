import { CompanyInfo, ContactPersonInfo, EnrichedDeal } from "../types/deal";
import { TechnicianInfo } from "../types/onboarding";
import { parseCloseDate } from "../utils/closeDate";
import { DealNameParseError, ParsedDealName, parseDealName } from "../utils/dealName";
import { createLogger } from "../utils/log";
import {
  CrmClient,
  HubSpotObject,
  HubSpotProperties,
  TECHNICIAN_PROPERTIES,
} from "./hubspotClient";
import { OnboardingStore } from "./onboardingStore";

const log = createLogger("detector");

const DAY_MS = 24 * 60 * 60 * 1000;

function prop(properties: HubSpotProperties, name: string): string | null {
  const value = properties[name];
  return value === undefined || value === null || value === "" ? null : value;
}

/** Every non-empty technician property on the contact, in CRM property order. */
export function extractTechnicians(contactProperties: HubSpotProperties): TechnicianInfo[] {
  const technicians: TechnicianInfo[] = [];
  for (const propertyName of TECHNICIAN_PROPERTIES) {
    const value = prop(contactProperties, propertyName);
    if (value) {
      technicians.push({ hubspot_tec_id: value, property_name: propertyName });
    }
  }
  return technicians;
}

export function buildCompanyInfo(company: HubSpotObject): CompanyInfo {
  const props = company.properties;
  return {
    company_id: company.id,
    name: prop(props, "name") ?? "",
    nif: prop(props, "nif"),
    email: prop(props, "generic_email"),
    phone: prop(props, "phone"),
    website: prop(props, "website") ?? prop(props, "domain"),
    address: prop(props, "address"),
    city: prop(props, "city"),
    state: prop(props, "state"),
    zip_code: prop(props, "zip"),
    country: prop(props, "country"),
    holded_id: prop(props, "tl_holded_id"),
    drive_folder_id: prop(props, "drive_folder_id"),
    drive_folder_url: prop(props, "drive_folder_url"),
  };
}

export function buildContactPerson(contact: HubSpotObject): ContactPersonInfo {
  const props = contact.properties;
  return {
    contact_id: contact.id,
    firstname: prop(props, "firstname"),
    lastname: prop(props, "lastname"),
    full_name: prop(props, "nombre_y_apellidos"),
    email: prop(props, "email"),
    phone: prop(props, "phone"),
    mobile: prop(props, "mobilephone"),
    job_title: prop(props, "cargo_en_empresa"),
  };
}

function parseAmount(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const amount = Number(value);
  return Number.isFinite(amount) ? amount : null;
}

export type DealDetectorOptions = {
  lookbackDays: number;
  now?: () => Date;
};

export class DealDetector {
  private readonly now: () => Date;

  constructor(
    private readonly crm: CrmClient,
    private readonly store: Pick<OnboardingStore, "findByDealId">,
    private readonly options: DealDetectorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Won deals closed since `since` that have no onboarding record yet, fully enriched. */
  async detectNewDeals(since?: Date): Promise<EnrichedDeal[]> {
    const from = since ?? new Date(this.now().getTime() - this.options.lookbackDays * DAY_MS);
    const newDeals: EnrichedDeal[] = [];

    log.info("deal_detection_started", { since: from.toISOString() });

    for await (const rawDeal of this.crm.searchWonDeals(from)) {
      if (await this.store.findByDealId(rawDeal.id)) {
        log.debug("deal_already_processed", { deal_id: rawDeal.id });
        continue;
      }

      const enriched = await this.enrich(rawDeal);
      if (enriched) {
        log.info("new_deal_detected", {
          deal_id: enriched.deal_id,
          company: enriched.company_name,
          service: enriched.service_name,
          technicians_count: enriched.technicians.length,
          holded_exists: enriched.company.holded_id !== null,
        });
        newDeals.push(enriched);
      }
    }

    log.info("deal_detection_completed", { new_deals_count: newDeals.length });
    return newDeals;
  }

  /** Re-reads a known deal. Null when its name or company/contact chain no longer holds. */
  async enrichDealById(dealId: string): Promise<EnrichedDeal | null> {
    return this.enrich(await this.crm.getDeal(dealId));
  }

  private async enrich(rawDeal: HubSpotObject): Promise<EnrichedDeal | null> {
    const props = rawDeal.properties;
    const dealName = prop(props, "dealname") ?? "";
    const dealLog = log.child({ deal_id: rawDeal.id, deal_name: dealName });

    let names: ParsedDealName;
    try {
      names = parseDealName(dealName);
    } catch (error) {
      if (error instanceof DealNameParseError) {
        dealLog.warn("deal_name_unparseable");
        return null;
      }
      throw error;
    }

    const companyId = await this.crm.getDealCompanyId(rawDeal.id);
    if (!companyId) {
      dealLog.warn("deal_has_no_company");
      return null;
    }

    const contactIds = await this.crm.getCompanyContactIds(companyId);
    const contactId = contactIds[0];
    if (!contactId) {
      dealLog.warn("company_has_no_contacts", { company_id: companyId });
      return null;
    }
    if (contactIds.length > 1) {
      dealLog.info("company_has_multiple_contacts", {
        company_id: companyId,
        contact_count: contactIds.length,
      });
    }

    const company = await this.crm.getCompany(companyId);
    const contact = await this.crm.getContact(contactId);

    return {
      deal_id: rawDeal.id,
      deal_name: dealName,
      company_name: names.company_name,
      service_name: names.service_name,
      close_date_iso: parseCloseDate(prop(props, "closedate"), this.now).toISOString(),
      hubspot_owner_id: prop(props, "hubspot_owner_id"),
      pipeline: prop(props, "pipeline"),
      dealstage: prop(props, "dealstage"),
      amount: parseAmount(prop(props, "amount")),
      company: buildCompanyInfo(company),
      contact_person: buildContactPerson(contact),
      technicians: extractTechnicians(contact.properties),
    };
  }
}
