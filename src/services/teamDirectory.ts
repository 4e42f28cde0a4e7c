import { parseDepartment, ServiceEntry, TeamMember } from "../types/team";
import { createLogger } from "../utils/log";
import { TtlCache } from "../utils/ttlCache";
import { SheetReader, SheetRow } from "./googleSheetsClient";

const log = createLogger("team_directory");

const MIN_STAFF_COLUMNS = 6;

/** Read-only staff and service reference data. */
export interface TeamDirectory {
  members(): Promise<TeamMember[]>;
  services(): Promise<ServiceEntry[]>;
  invalidate(): void;
}

export type SheetTeamDirectoryOptions = {
  usersRange: string;
  servicesRange: string;
  ttlMs: number;
  now?: () => number;
};

function cell(row: SheetRow, index: number): string {
  return (row[index] ?? "").trim();
}

function optionalCell(row: SheetRow, index: number): string | null {
  return cell(row, index) || null;
}

/**
 * Staff columns: technician id, chat id, email, full name, short name,
 * department code, responsible checkbox. The first row is the header.
 */
export function parseTeamMembers(rows: SheetRow[]): TeamMember[] {
  const members: TeamMember[] = [];

  for (const row of rows.slice(1)) {
    if (row.length < MIN_STAFF_COLUMNS) {
      continue;
    }

    const department = parseDepartment(cell(row, 5));
    if (!department) {
      log.warn("unknown_staff_department", { email: cell(row, 2), department: cell(row, 5) });
      continue;
    }

    members.push({
      hubspot_tec_id: optionalCell(row, 0),
      slack_id: optionalCell(row, 1),
      email: cell(row, 2),
      full_name: cell(row, 3),
      short_name: cell(row, 4),
      department,
      is_responsible: cell(row, 6).toUpperCase() === "TRUE",
    });
  }

  return members;
}

/** Service columns: name, tags, department code. */
export function parseServices(rows: SheetRow[]): ServiceEntry[] {
  const services: ServiceEntry[] = [];

  for (const row of rows.slice(1)) {
    const name = cell(row, 0);
    if (!name) {
      continue;
    }

    services.push({
      name,
      tags: optionalCell(row, 1),
      department: parseDepartment(cell(row, 2)),
    });
  }

  return services;
}

export class SheetTeamDirectory implements TeamDirectory {
  private readonly memberCache: TtlCache<TeamMember[]>;

  private readonly serviceCache: TtlCache<ServiceEntry[]>;

  constructor(
    private readonly sheets: SheetReader,
    private readonly options: SheetTeamDirectoryOptions,
  ) {
    this.memberCache = new TtlCache(options.ttlMs, options.now);
    this.serviceCache = new TtlCache(options.ttlMs, options.now);
  }

  async members(): Promise<TeamMember[]> {
    return this.memberCache.getOrLoad(async () => {
      const members = parseTeamMembers(await this.sheets.readRange(this.options.usersRange));
      log.info("team_members_loaded", { count: members.length });
      return members;
    });
  }

  async services(): Promise<ServiceEntry[]> {
    return this.serviceCache.getOrLoad(async () => {
      const services = parseServices(await this.sheets.readRange(this.options.servicesRange));
      log.info("services_loaded", { count: services.length });
      return services;
    });
  }

  invalidate(): void {
    this.memberCache.clear();
    this.serviceCache.clear();
  }
}
