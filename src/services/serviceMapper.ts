import { Department, TeamMember } from "../types/team";
import { TeamDirectory } from "./teamDirectory";

export class ServiceNotFoundError extends Error {
  constructor(readonly serviceName: string) {
    super(`Service not found in the service directory: "${serviceName}".`);
    this.name = "ServiceNotFoundError";
  }
}

export class DepartmentNotAssignedError extends Error {
  constructor(readonly serviceName: string) {
    super(`Service has no department assigned: "${serviceName}".`);
    this.name = "DepartmentNotAssignedError";
  }
}

function normalizeServiceName(value: string): string {
  return value.trim().toLowerCase();
}

export class ServiceMapper {
  constructor(private readonly directory: TeamDirectory) {}

  /** Exact match after trimming and case folding; no fuzzy matching. */
  async resolveDepartment(serviceName: string): Promise<Department> {
    const wanted = normalizeServiceName(serviceName);
    const services = await this.directory.services();
    const entry = services.find((service) => normalizeServiceName(service.name) === wanted);

    if (!entry) {
      throw new ServiceNotFoundError(serviceName);
    }
    if (!entry.department) {
      throw new DepartmentNotAssignedError(serviceName);
    }
    return entry.department;
  }

  async teamMembers(department: Department): Promise<TeamMember[]> {
    const members = await this.directory.members();
    return members.filter((member) => member.department === department);
  }

  async responsible(department: Department): Promise<TeamMember | null> {
    const members = await this.teamMembers(department);
    return members.find((member) => member.is_responsible) ?? null;
  }
}
