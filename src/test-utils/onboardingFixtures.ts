import { CompanyInfo, ContactPersonInfo, EnrichedDeal } from "../types/deal";
import { ServiceEntry, TeamMember } from "../types/team";
import { FakeCrm } from "./fakes";

export const CFO_TECHNICIAN: TeamMember = {
  hubspot_tec_id: "tec-100",
  slack_id: "U-CFO-1",
  email: "laura@example.com",
  full_name: "Laura Gómez",
  short_name: "Laura",
  department: "FI",
  is_responsible: false,
};

export const CFO_RESPONSIBLE: TeamMember = {
  hubspot_tec_id: "tec-101",
  slack_id: "U-CFO-LEAD",
  email: "marta@example.com",
  full_name: "Marta Ruiz",
  short_name: "Marta",
  department: "FI",
  is_responsible: true,
};

export const LEGAL_RESPONSIBLE: TeamMember = {
  hubspot_tec_id: null,
  slack_id: "U-LEGAL-LEAD",
  email: "pablo@example.com",
  full_name: "Pablo Sanz",
  short_name: "Pablo",
  department: "LE",
  is_responsible: true,
};

export const TEAM: TeamMember[] = [CFO_TECHNICIAN, CFO_RESPONSIBLE, LEGAL_RESPONSIBLE];

export const SERVICES: ServiceEntry[] = [
  { name: "CFO", tags: "cfo", department: "FI" },
  { name: "Préstamo ENISA", tags: "enisa", department: "SU" },
  { name: "Contrato marco", tags: null, department: "LE" },
  { name: "Servicio huérfano", tags: null, department: null },
];

export function buildCompany(overrides: Partial<CompanyInfo> = {}): CompanyInfo {
  return {
    company_id: "company-1",
    name: "ACME SL",
    nif: "B12345678",
    email: "info@acme.test",
    phone: "910000000",
    website: "acme.test",
    address: "Calle Mayor 1",
    city: "Madrid",
    state: "Madrid",
    zip_code: "28001",
    country: "Spain",
    holded_id: null,
    drive_folder_id: null,
    drive_folder_url: null,
    ...overrides,
  };
}

export function buildContact(overrides: Partial<ContactPersonInfo> = {}): ContactPersonInfo {
  return {
    contact_id: "contact-1",
    firstname: "Ana",
    lastname: "López",
    full_name: null,
    email: "ana@acme.test",
    phone: "600000000",
    mobile: null,
    job_title: "CEO",
    ...overrides,
  };
}

export function buildEnrichedDeal(overrides: Partial<EnrichedDeal> = {}): EnrichedDeal {
  return {
    deal_id: "deal-1",
    deal_name: "ACME SL - CFO",
    company_name: "ACME SL",
    service_name: "CFO",
    close_date_iso: "2026-03-01T10:00:00.000Z",
    hubspot_owner_id: "owner-1",
    pipeline: "20024183",
    dealstage: "48577422",
    amount: 1200,
    company: buildCompany(),
    contact_person: buildContact(),
    technicians: [{ hubspot_tec_id: "tec-100", property_name: "cfo_asignado" }],
    ...overrides,
  };
}

/** Registers a won deal with one company and one contact on the fake CRM. */
export function seedCrmDeal(
  crm: FakeCrm,
  options: {
    dealId?: string;
    dealName?: string;
    companyId?: string;
    contactId?: string;
    contactProperties?: Record<string, string>;
  } = {},
): void {
  const dealId = options.dealId ?? "deal-1";
  const companyId = options.companyId ?? "company-1";
  const contactId = options.contactId ?? "contact-1";

  crm.deals.push({
    id: dealId,
    properties: {
      dealname: options.dealName ?? "ACME SL - CFO",
      amount: "1200",
      hubspot_owner_id: "owner-1",
      pipeline: "20024183",
      dealstage: "48577422",
      closedate: "1772359200000",
    },
  });
  crm.dealCompany.set(dealId, companyId);
  crm.companies.set(companyId, {
    id: companyId,
    properties: {
      name: "ACME SL",
      nif: "B12345678",
      generic_email: "info@acme.test",
      country: "Spain",
    },
  });
  crm.companyContacts.set(companyId, [contactId]);
  crm.contacts.set(contactId, {
    id: contactId,
    properties: {
      firstname: "Ana",
      lastname: "López",
      email: "ana@acme.test",
      ...(options.contactProperties ?? { cfo_asignado: "tec-100" }),
    },
  });
}
