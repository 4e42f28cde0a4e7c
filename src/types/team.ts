export const DEPARTMENTS = ["SU", "FI", "AS", "LA", "LE", "DA", "DI"] as const;

export type Department = (typeof DEPARTMENTS)[number];

export const DEPARTMENT_LABELS: Record<Department, string> = {
  SU: "Financiación Pública",
  FI: "CFO",
  AS: "Asesoría fiscal",
  LA: "Asesoría laboral",
  LE: "Legal",
  DA: "Servicios DATA",
  DI: "Diseño",
};

// Contact properties holding the technician id for each department. A
// department missing here is staffed by its responsible member.
export const DEPARTMENT_TECHNICIAN_PROPERTIES: Partial<
  Record<Department, readonly string[]>
> = {
  SU: ["tecnico_enisa_asignado", "tecnico_subvencion_asignado"],
  FI: ["cfo_asignado", "cfo_asignado_ii"],
  AS: ["asesor_fiscal_asignado", "administrativo_asignado"],
  LA: ["asesor_laboral_asignado"],
};

export const DEPARTMENT_DRIVE_SUBFOLDER: Partial<Record<Department, string>> = {
  SU: "03 - Financiación Pública",
  FI: "01 - CFO",
  AS: "02 - Asesoría fiscal, contable y laboral",
  LA: "02 - Asesoría fiscal, contable y laboral",
};

export function parseDepartment(code: string | null | undefined): Department | null {
  const normalized = code?.trim().toUpperCase() ?? "";
  return DEPARTMENTS.find((department) => department === normalized) ?? null;
}

export type TeamMember = {
  hubspot_tec_id: string | null;
  slack_id: string | null;
  email: string;
  full_name: string;
  short_name: string;
  department: Department;
  is_responsible: boolean;
};

export type ServiceEntry = {
  name: string;
  tags: string | null;
  department: Department | null;
};
