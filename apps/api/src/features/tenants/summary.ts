import type { TenantSummary } from "@idbroker/contracts";
import type { TenantRecord } from "../../auth/types.js";

export function toTenantSummary(record: TenantRecord): TenantSummary {
  return {
    tenantId: record.tenantId,
    displayName: record.displayName,
    role: record.role,
    status: record.status,
    source: record.source,
    enabled: record.enabled,
    workspaceConfigured: record.workspace !== null,
    updatedAt: record.updatedAt
  };
}
