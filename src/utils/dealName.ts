// Most specific first; the bare hyphen is the last resort.
const DEAL_NAME_SEPARATORS = [" - ", " -", "- ", "-"] as const;

export class DealNameParseError extends Error {
  constructor(dealName: string) {
    super(`Could not split deal name into company and service: "${dealName}"`);
    this.name = "DealNameParseError";
  }
}

export type ParsedDealName = {
  company_name: string;
  service_name: string;
};

/**
 * Splits "COMPANY - SERVICE" on the first occurrence of the first separator
 * that leaves two non-empty sides. Later hyphens stay in the service.
 */
export function parseDealName(dealName: string): ParsedDealName {
  for (const separator of DEAL_NAME_SEPARATORS) {
    const index = dealName.indexOf(separator);
    if (index === -1) {
      continue;
    }

    const companyName = dealName.slice(0, index).trim();
    const serviceName = dealName.slice(index + separator.length).trim();
    if (companyName && serviceName) {
      return { company_name: companyName, service_name: serviceName };
    }
  }

  throw new DealNameParseError(dealName);
}
