import { z } from "zod";
import type { Credential } from "../auth/credential-resolver.js";
import {
  downstreamRejected,
  downstreamUnavailable,
  permissionDenied
} from "../auth/errors.js";
import type { SentinelWorkspace } from "../auth/types.js";

export const INCIDENT_SEVERITIES = ["high", "medium", "low", "informational"] as const;
export const INCIDENT_STATUS_FILTERS = ["active", "closed", "all"] as const;

export type IncidentSeverity = (typeof INCIDENT_SEVERITIES)[number];
export type IncidentStatusFilter = (typeof INCIDENT_STATUS_FILTERS)[number];

const SEVERITY_VALUES: Record<IncidentSeverity, string> = {
  high: "High",
  medium: "Medium",
  low: "Low",
  informational: "Informational"
};

const IncidentListSchema = z.object({
  value: z.array(
    z.object({
      name: z.string(),
      properties: z.object({
        incidentNumber: z.number().int().optional(),
        title: z.string().default(""),
        severity: z.string().default("Unknown"),
        status: z.string().default("Unknown"),
        createdTimeUtc: z.string().optional()
      })
    })
  )
});

export interface IncidentSummary {
  id: string;
  number: number | null;
  title: string;
  severity: string;
  status: string;
  createdAt: string | null;
}

export interface IncidentQuery {
  workspace: SentinelWorkspace;
  severity?: IncidentSeverity;
  status?: IncidentStatusFilter;
  limit: number;
}

export function buildIncidentFilter(query: Pick<IncidentQuery, "severity" | "status">) {
  const clauses: string[] = [];
  if (query.status === "active") {
    clauses.push("properties/status ne 'Closed'");
  } else if (query.status === "closed") {
    clauses.push("properties/status eq 'Closed'");
  }

  if (query.severity) {
    clauses.push(`properties/severity eq '${SEVERITY_VALUES[query.severity]}'`);
  }

  return clauses.length > 0 ? clauses.join(" and ") : null;
}

export interface SentinelClientOptions {
  managementEndpoint: string;
  apiVersion: string;
  timeoutMs: number;
  fetch?: typeof globalThis.fetch;
}

/**
 * Reads Microsoft Sentinel incidents through the Azure management API with a
 * caller-supplied credential.
 */
export class SentinelClient {
  private readonly managementEndpoint: string;
  private readonly apiVersion: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof globalThis.fetch;

  constructor(options: SentinelClientOptions) {
    this.managementEndpoint = options.managementEndpoint.replace(/\/+$/u, "");
    this.apiVersion = options.apiVersion;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  get resource() {
    return this.managementEndpoint;
  }

  incidentsUrl(query: IncidentQuery) {
    const { subscriptionId, resourceGroup, workspaceName } = query.workspace;
    const url = new URL(
      [
        "",
        "subscriptions",
        encodeURIComponent(subscriptionId),
        "resourceGroups",
        encodeURIComponent(resourceGroup),
        "providers/Microsoft.OperationalInsights/workspaces",
        encodeURIComponent(workspaceName),
        "providers/Microsoft.SecurityInsights/incidents"
      ].join("/"),
      this.managementEndpoint
    );

    url.searchParams.set("api-version", this.apiVersion);
    url.searchParams.set("$top", String(query.limit));
    url.searchParams.set("$orderby", "properties/createdTimeUtc desc");
    const filter = buildIncidentFilter(query);
    if (filter) {
      url.searchParams.set("$filter", filter);
    }

    return url;
  }

  async listIncidents(credential: Credential, query: IncidentQuery): Promise<IncidentSummary[]> {
    const workspaceLabel = query.workspace.workspaceName;
    let response: Response;
    try {
      response = await this.fetchImpl(this.incidentsUrl(query), {
        method: "GET",
        headers: {
          authorization: credential.authorizationHeader(),
          accept: "application/json"
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw downstreamUnavailable(
        `Sentinel workspace ${workspaceLabel} is unreachable`,
        503,
        error
      );
    }

    if (response.status === 401 || response.status === 403) {
      throw permissionDenied(
        `Access to Sentinel workspace ${workspaceLabel} was denied in tenant ${credential.context.tenantId}`
      );
    }

    if (response.status >= 500) {
      throw downstreamUnavailable(
        `Sentinel workspace ${workspaceLabel} returned ${response.status}`,
        502
      );
    }

    if (!response.ok) {
      throw downstreamRejected(
        `Sentinel workspace ${workspaceLabel} rejected the query (${response.status})`
      );
    }

    const payload: unknown = await response.json().catch(() => null);
    const parsed = IncidentListSchema.safeParse(payload);
    if (!parsed.success) {
      throw downstreamRejected(`Sentinel workspace ${workspaceLabel} returned an unexpected payload`);
    }

    return parsed.data.value.map((incident) => ({
      id: incident.name,
      number: incident.properties.incidentNumber ?? null,
      title: incident.properties.title,
      severity: incident.properties.severity,
      status: incident.properties.status,
      createdAt: incident.properties.createdTimeUtc ?? null
    }));
  }
}
