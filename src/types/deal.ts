import { TechnicianInfo } from "./onboarding";

export type CompanyInfo = {
  company_id: string;
  name: string;
  nif: string | null;
  /** Generic company inbox (`generic_email` in the CRM). */
  email: string | null;
  phone: string | null;
  website: string | null;
  address: string | null;
  city: string | null;
  state: string | null;
  zip_code: string | null;
  country: string | null;
  /** Set once the billing contact exists. */
  holded_id: string | null;
  drive_folder_id: string | null;
  drive_folder_url: string | null;
};

export type ContactPersonInfo = {
  contact_id: string;
  firstname: string | null;
  lastname: string | null;
  full_name: string | null;
  email: string | null;
  phone: string | null;
  mobile: string | null;
  job_title: string | null;
};

export type EnrichedDeal = {
  deal_id: string;
  deal_name: string;
  company_name: string;
  service_name: string;
  close_date_iso: string;
  hubspot_owner_id: string | null;
  pipeline: string | null;
  dealstage: string | null;
  amount: number | null;
  company: CompanyInfo;
  contact_person: ContactPersonInfo;
  technicians: TechnicianInfo[];
};

export function contactDisplayName(contact: ContactPersonInfo): string {
  if (contact.full_name) {
    return contact.full_name;
  }

  const parts = [contact.firstname, contact.lastname].filter(
    (part): part is string => Boolean(part),
  );
  return parts.length > 0 ? parts.join(" ") : contact.email ?? "";
}
