/**
 * Value coercion — raw admin text to sample values and derived labels.
 *
 * Everything here is a pure function so scrapers stay unit-testable
 * without a database.
 */

import type { MetricKind } from "@proxysql-exporter/shared";
import { MalformedValueError, UnknownStatusError } from "../errors.js";

// ---------------------------------------------------------------------------
// Status ordinal
// ---------------------------------------------------------------------------

export type BackendStatus = "ONLINE" | "SHUNNED" | "OFFLINE_SOFT" | "OFFLINE_HARD";

/** Backend status by severity */
export const STATUS_ORDINALS: Readonly<Record<BackendStatus, number>> = {
  ONLINE: 1,
  SHUNNED: 2,
  OFFLINE_SOFT: 3,
  OFFLINE_HARD: 4,
};

function isBackendStatus(raw: string): raw is BackendStatus {
  return Object.hasOwn(STATUS_ORDINALS, raw);
}

export function statusOrdinal(field: string, raw: string | null): number {
  if (raw === null) {
    throw new MalformedValueError(field, raw, "status is NULL");
  }
  const status = raw.trim();
  if (!isBackendStatus(status)) {
    throw new UnknownStatusError(field, raw);
  }
  return STATUS_ORDINALS[status];
}

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

const NUMERIC_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function parseNumeric(field: string, raw: string | null): number {
  if (raw === null) {
    throw new MalformedValueError(field, raw, "value is NULL");
  }
  const text = raw.trim();
  if (!NUMERIC_RE.test(text)) {
    throw new MalformedValueError(field, raw, `"${raw}" is not numeric`);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new MalformedValueError(field, raw, `"${raw}" is out of range`);
  }
  return value;
}

/** parseNumeric plus the counter rule (never negative) */
export function coerceValue(field: string, raw: string | null, kind: MetricKind): number {
  const value = parseNumeric(field, raw);
  if (kind === "counter" && value < 0) {
    throw new MalformedValueError(field, raw, `counter value ${value} is negative`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Connection pool fields
// ---------------------------------------------------------------------------

export const POOL_LABEL_FIELDS = ["hostgroup", "srv_host", "srv_port"] as const;
export type PoolLabelField = (typeof POOL_LABEL_FIELDS)[number];

export type PoolFieldRole = "label" | "status" | "metric";

export function isPoolLabelField(field: string): field is PoolLabelField {
  return (POOL_LABEL_FIELDS as readonly string[]).includes(field);
}

/** Expects the lowercased column name */
export function classifyPoolField(field: string): PoolFieldRole {
  if (isPoolLabelField(field)) return "label";
  if (field === "status") return "status";
  return "metric";
}

export type CoercedField =
  | { role: "label"; value: string }
  | { role: "value"; value: number };

/**
 * Route one connection-pool field: label fields keep their text, status
 * goes through the ordinal table, everything else is numeric.
 */
export function coercePoolField(
  field: string,
  raw: string | null,
  kind: MetricKind = "gauge",
): CoercedField {
  const name = field.toLowerCase();
  switch (classifyPoolField(name)) {
    case "label":
      if (raw === null || raw === "") {
        throw new MalformedValueError(name, raw, "label value is empty");
      }
      return { role: "label", value: raw };
    case "status":
      return { role: "value", value: statusOrdinal(name, raw) };
    case "metric":
      return { role: "value", value: coerceValue(name, raw, kind) };
  }
}

// ---------------------------------------------------------------------------
// Derived labels
// ---------------------------------------------------------------------------

/** host:port, the same everywhere so metrics correlate across groups */
export function endpointLabel(host: string, port: string): string {
  return `${host}:${port}`;
}
